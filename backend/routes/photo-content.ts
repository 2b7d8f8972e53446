import { PhotoMetadata } from '../interfaces';
import { CollaboratorError, NotFoundError, ValidationError } from '../lib/errors';
import { createRedirectResponse } from '../lib/response';
import { FamilyRouteHandler } from './types';

/**
 * GET /photos/{photoId}/content
 *
 * Redirects to a short-lived presigned GET of the photo. Lookups are scoped
 * to the caller's partition, so another family's photoId answers 404.
 */
export const handlePhotoContent: FamilyRouteHandler = async ({ familyId, params }, deps) => {
  const photoId = params.photoId;
  if (!photoId) {
    throw new ValidationError('Missing photoId');
  }

  let item: PhotoMetadata | undefined;
  try {
    item = await deps.store.get(familyId, photoId);
  } catch (error) {
    throw new CollaboratorError('Unable to fetch photo', error);
  }
  if (!item) {
    throw new NotFoundError('Photo not found');
  }

  let downloadUrl: string;
  try {
    downloadUrl = await deps.storage.createDownloadUrl(item.objectKey, deps.urlTtlSeconds);
  } catch (error) {
    throw new CollaboratorError('Unable to fetch photo', error);
  }

  return createRedirectResponse(downloadUrl);
};
