import { PhotoMetadata, isStringArray } from '../interfaces';
import { CollaboratorError, ValidationError } from '../lib/errors';
import { JsonObject, parseJsonBody } from '../lib/request';
import { createSuccessResponse } from '../lib/response';
import { buildObjectKey } from '../lib/storage';
import { FamilyRouteHandler } from './types';

const OPTIONAL_STRING_FIELDS = ['contentType', 'title', 'description', 'takenAt', 'filename'] as const;
type OptionalStringField = (typeof OPTIONAL_STRING_FIELDS)[number];

/**
 * POST /photos
 *
 * Writes the metadata item for (familyId, photoId), replacing any previous
 * item with the same key. The S3 object is not checked for existence.
 *
 * Body: `{ photoId, contentType?, objectKey?, title?, description?, takenAt?, filename?, tags? }`
 */
export const handleRecordMetadata: FamilyRouteHandler = async ({ familyId, event }, deps) => {
  const item = buildPhotoMetadata(familyId, parseJsonBody(event), deps.now());

  try {
    await deps.store.put(item);
  } catch (error) {
    throw new CollaboratorError('Unable to save metadata', error);
  }

  console.log(`Recorded metadata for photo ${item.photoId} of family ${familyId}`);
  return createSuccessResponse(item, 201);
};

/**
 * Validate the request body and build the item to store
 * @throws ValidationError on a missing photoId, a mistyped field, or an objectKey outside the family prefix
 */
export function buildPhotoMetadata(familyId: string, payload: JsonObject, now: Date): PhotoMetadata {
  const photoId = typeof payload.photoId === 'string' ? payload.photoId : '';
  if (!photoId.trim()) {
    throw new ValidationError('Missing photoId');
  }
  if (photoId !== photoId.trim()) {
    throw new ValidationError('photoId must not have leading or trailing whitespace');
  }
  if (photoId.includes('/')) {
    throw new ValidationError('photoId must not contain "/"');
  }

  const optional: Partial<Record<OptionalStringField, string>> = {};
  for (const field of OPTIONAL_STRING_FIELDS) {
    const value = payload[field];
    if (value === undefined || value === null || value === '') {
      continue;
    }
    if (typeof value !== 'string') {
      throw new ValidationError(`${field} must be a string`);
    }
    optional[field] = value;
  }

  const tags = isStringArray(payload.tags) ? payload.tags : undefined;
  if (payload.tags !== undefined && payload.tags !== null && tags === undefined) {
    throw new ValidationError('tags must be an array of strings');
  }

  const objectKey = payload.objectKey ?? buildObjectKey(familyId, photoId, optional.contentType);
  if (typeof objectKey !== 'string' || !objectKey.startsWith(`${familyId}/`)) {
    throw new ValidationError('objectKey must be under the family prefix');
  }

  return {
    familyId,
    photoId,
    objectKey,
    uploadedAt: now.toISOString(),
    ...optional,
    ...(tags !== undefined ? { tags } : {}),
  };
}
