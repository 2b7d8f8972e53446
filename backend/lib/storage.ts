import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/heic': '.heic',
  'image/heif': '.heif',
};

/**
 * Object storage collaborator.
 * Only mints presigned URLs; the bytes never pass through the Lambda.
 */
export interface PhotoStorage {
  /**
   * Presign a PUT bound to the key and content type
   * @returns Presigned HTTPS URL
   */
  createUploadUrl(objectKey: string, contentType: string, expiresInSeconds: number): Promise<string>;

  /**
   * Presign a GET for an existing object
   * @returns Presigned HTTPS URL
   */
  createDownloadUrl(objectKey: string, expiresInSeconds: number): Promise<string>;
}

/**
 * Map a MIME type to the file extension used in object keys
 * @returns Extension with leading dot, or '' for unknown types
 */
export function contentTypeToExtension(contentType: string | undefined): string {
  if (!contentType) {
    return '';
  }
  return CONTENT_TYPE_EXTENSIONS[contentType.toLowerCase()] ?? '';
}

/**
 * Build the S3 key of a photo: `{familyId}/{photoId}{ext}`
 */
export function buildObjectKey(familyId: string, photoId: string, contentType?: string): string {
  return `${familyId}/${photoId}${contentTypeToExtension(contentType)}`;
}

/**
 * {@link PhotoStorage} backed by S3 presigned URLs (AWS SDK v3 getSignedUrl)
 */
export class S3PhotoStorage implements PhotoStorage {
  constructor(
    private readonly s3Client: S3Client,
    private readonly bucketName: string
  ) {}

  async createUploadUrl(objectKey: string, contentType: string, expiresInSeconds: number): Promise<string> {
    /**
     * ContentType becomes a signed header, so S3 rejects a PUT
     * that sends a different Content-Type than the one requested here.
     */
    const command = new PutObjectCommand({
      Bucket: this.bucketName,
      Key: objectKey,
      ContentType: contentType,
    });
    return getSignedUrl(this.s3Client, command, { expiresIn: expiresInSeconds });
  }

  async createDownloadUrl(objectKey: string, expiresInSeconds: number): Promise<string> {
    const command = new GetObjectCommand({
      Bucket: this.bucketName,
      Key: objectKey,
    });
    return getSignedUrl(this.s3Client, command, { expiresIn: expiresInSeconds });
  }
}
