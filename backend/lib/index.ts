export {
    DEFAULT_UPLOAD_URL_TTL_SECONDS,
    getEnvTableName,
    getEnvBucketName,
    getEnvAwsRegion,
    getEnvAllowedFamilyIds,
    getEnvUploadUrlTtlSeconds,
    parseFamilyIdList
} from './env'
export { HttpError, ValidationError, ForbiddenFamilyError, NotFoundError, CollaboratorError } from './errors'
export { FAMILY_ID_HEADER, extractFamilyId } from './family'
export { DynamoPhotoMetadataStore } from './metadata-store'
export type { PhotoMetadataStore } from './metadata-store'
export { getHeader, isJsonObject, parseJsonBody, resolveRoute } from './request'
export type { JsonObject, ResolvedRoute } from './request'
export { createErrorResponse, createRedirectResponse, createSuccessResponse } from './response'
export type { ErrorStatusCode, SuccessStatusCode } from './response'
export { S3PhotoStorage, buildObjectKey, contentTypeToExtension } from './storage'
export type { PhotoStorage } from './storage'
