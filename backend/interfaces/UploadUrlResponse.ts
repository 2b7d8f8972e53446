/**
 * UploadUrlResponse Interface
 *
 * Body of `POST /photos/upload-url`. The client PUTs the file to `uploadUrl`
 * with the same Content-Type, then records metadata with `photoId`.
 */
export interface UploadUrlResponse {
  photoId: string;
  objectKey: string;
  uploadUrl: string;
  contentType: string;
  title?: string;
  /** ISO-8601 time after which S3 rejects the upload */
  expiresAt: string;
  expiresInSeconds: number;
}

/**
 * Type Guard for {@link UploadUrlResponse}
 * @param obj Object to be checked if it conforms to UploadUrlResponse
 * @returns True if obj is UploadUrlResponse, false otherwise
 */
export function isUploadUrlResponse(obj: unknown): obj is UploadUrlResponse {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    ('photoId' in obj && typeof obj.photoId === 'string') &&
    ('objectKey' in obj && typeof obj.objectKey === 'string') &&
    ('uploadUrl' in obj && typeof obj.uploadUrl === 'string') &&
    ('contentType' in obj && typeof obj.contentType === 'string') &&
    ('expiresAt' in obj && typeof obj.expiresAt === 'string') &&
    ('expiresInSeconds' in obj && typeof obj.expiresInSeconds === 'number')
  );
}
