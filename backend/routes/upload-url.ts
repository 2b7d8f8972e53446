import { UploadUrlResponse } from '../interfaces';
import { CollaboratorError, ValidationError } from '../lib/errors';
import { parseJsonBody } from '../lib/request';
import { createSuccessResponse } from '../lib/response';
import { buildObjectKey } from '../lib/storage';
import { FamilyRouteHandler } from './types';

export const DEFAULT_CONTENT_TYPE = 'image/jpeg';

/**
 * POST /photos/upload-url
 *
 * Issues a presigned PUT for a fresh photo id under the family prefix.
 * Nothing is written to DynamoDB here; the client records metadata afterwards
 * with the returned photoId.
 *
 * Body (optional): `{ contentType?: string, title?: string }`
 */
export const handleIssueUploadUrl: FamilyRouteHandler = async ({ familyId, event }, deps) => {
  const payload = parseJsonBody(event);

  const contentType = payload.contentType ?? DEFAULT_CONTENT_TYPE;
  if (typeof contentType !== 'string' || contentType.trim() === '') {
    throw new ValidationError('contentType must be a non-empty string');
  }
  const title = typeof payload.title === 'string' ? payload.title : undefined;
  if (payload.title !== undefined && payload.title !== null && title === undefined) {
    throw new ValidationError('title must be a string');
  }

  const photoId = deps.generatePhotoId();
  const objectKey = buildObjectKey(familyId, photoId, contentType);
  const expiresInSeconds = deps.urlTtlSeconds;

  let uploadUrl: string;
  try {
    uploadUrl = await deps.storage.createUploadUrl(objectKey, contentType, expiresInSeconds);
  } catch (error) {
    throw new CollaboratorError('Unable to create upload URL', error);
  }

  const expiresAt = new Date(deps.now().getTime() + expiresInSeconds * 1000).toISOString();
  console.log(`Issued upload URL for ${objectKey} with ${expiresInSeconds}s expiration`);

  const response: UploadUrlResponse = {
    photoId,
    objectKey,
    uploadUrl,
    contentType,
    ...(title !== undefined ? { title } : {}),
    expiresAt,
    expiresInSeconds,
  };
  return createSuccessResponse(response);
};
