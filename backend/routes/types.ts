import { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from 'aws-lambda';
import { PhotoMetadataStore } from '../lib/metadata-store';
import { PhotoStorage } from '../lib/storage';

/**
 * Configuration and collaborators shared by every route.
 * Built once per execution environment and never mutated.
 */
export interface PhotoApiDependencies {
  allowedFamilyIds: ReadonlySet<string>;
  storage: PhotoStorage;
  store: PhotoMetadataStore;
  urlTtlSeconds: number;
  now: () => Date;
  generatePhotoId: () => string;
}

/**
 * Input of a family-scoped route, after the family header passed validation
 */
export interface FamilyRequest {
  familyId: string;
  event: APIGatewayProxyEventV2;
  /** Path parameters captured by the route pattern */
  params: Record<string, string>;
}

export type FamilyRouteHandler = (
  request: FamilyRequest,
  deps: PhotoApiDependencies
) => Promise<APIGatewayProxyStructuredResultV2>;
