/**
 * PhotoMetadata Interface
 *
 * Represents one photo item stored in DynamoDB.
 * Partition key is `familyId`, sort key is `photoId`.
 */
export interface PhotoMetadata {
  familyId: string;
  photoId: string;
  objectKey: string;
  /** ISO-8601 time the metadata was written, not the time of the S3 upload */
  uploadedAt: string;
  contentType?: string;
  title?: string;
  description?: string;
  takenAt?: string;
  filename?: string;
  tags?: string[];
}

/**
 * Type Guard for {@link PhotoMetadata}
 * @param obj Object to be checked if it conforms to PhotoMetadata
 * @returns True if obj is PhotoMetadata, false otherwise
 */
export function isPhotoMetadata(obj: unknown): obj is PhotoMetadata {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    ('familyId' in obj && typeof obj.familyId === 'string') &&
    ('photoId' in obj && typeof obj.photoId === 'string') &&
    ('objectKey' in obj && typeof obj.objectKey === 'string') &&
    ('uploadedAt' in obj && typeof obj.uploadedAt === 'string') &&
    isOptionalString(obj, 'contentType') &&
    isOptionalString(obj, 'title') &&
    isOptionalString(obj, 'description') &&
    isOptionalString(obj, 'takenAt') &&
    isOptionalString(obj, 'filename') &&
    (!('tags' in obj) || obj.tags === undefined || isStringArray(obj.tags))
  );
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

function isOptionalString(obj: object, field: string): boolean {
  const value: unknown = Reflect.get(obj, field);
  return value === undefined || typeof value === 'string';
}
