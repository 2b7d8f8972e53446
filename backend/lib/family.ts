import { APIGatewayProxyEventV2 } from 'aws-lambda';
import { ForbiddenFamilyError, ValidationError } from './errors';
import { getHeader } from './request';

export const FAMILY_ID_HEADER = 'x-family-id';

/**
 * Extract and authorize the caller's family id.
 *
 * The family id is the only access-control dimension: it scopes every S3 key
 * and every DynamoDB partition. An empty allow-list accepts any non-empty id.
 * @param headers Request headers
 * @param allowedFamilyIds Allow-list loaded at startup
 * @returns The trimmed family id
 * @throws ValidationError if the header is missing, blank or contains "/"
 * @throws ForbiddenFamilyError if the allow-list is non-empty and does not contain the id
 */
export function extractFamilyId(
  headers: APIGatewayProxyEventV2['headers'] | undefined,
  allowedFamilyIds: ReadonlySet<string>
): string {
  const familyId = getHeader(headers, FAMILY_ID_HEADER)?.trim();
  if (!familyId) {
    throw new ValidationError('Missing family identifier');
  }
  // Object keys are `{familyId}/...`; a "/" would let one family's prefix cover another's
  if (familyId.includes('/')) {
    throw new ValidationError('Family identifier must not contain "/"');
  }
  if (allowedFamilyIds.size > 0 && !allowedFamilyIds.has(familyId)) {
    throw new ForbiddenFamilyError();
  }
  return familyId;
}
