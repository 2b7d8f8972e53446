import { PhotoMetadata } from '../interfaces';
import { CollaboratorError } from '../lib/errors';
import { createSuccessResponse } from '../lib/response';
import { FamilyRouteHandler } from './types';

/**
 * GET /photos
 *
 * Returns `{ items }` with every photo of the caller's family,
 * newest `uploadedAt` first.
 */
export const handleListPhotos: FamilyRouteHandler = async ({ familyId }, deps) => {
  let items: PhotoMetadata[];
  try {
    items = await deps.store.listByFamily(familyId);
  } catch (error) {
    throw new CollaboratorError('Unable to list photos', error);
  }

  console.log(`Retrieved ${items.length} photos for family ${familyId}`);
  return createSuccessResponse({ items: sortNewestFirst(items) });
};

/**
 * Sort by uploadedAt descending, ties by photoId ascending.
 * ISO-8601 UTC timestamps compare correctly as strings.
 */
export function sortNewestFirst(items: readonly PhotoMetadata[]): PhotoMetadata[] {
  return [...items].sort((a, b) => {
    if (a.uploadedAt !== b.uploadedAt) {
      return a.uploadedAt < b.uploadedAt ? 1 : -1;
    }
    if (a.photoId === b.photoId) {
      return 0;
    }
    return a.photoId < b.photoId ? -1 : 1;
  });
}
