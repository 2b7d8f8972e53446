export { isPhotoMetadata, isStringArray } from './PhotoMetadata'
export type { PhotoMetadata } from './PhotoMetadata'
export { isUploadUrlResponse } from './UploadUrlResponse'
export type { UploadUrlResponse } from './UploadUrlResponse'
