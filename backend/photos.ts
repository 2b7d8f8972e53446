import { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2, Context } from 'aws-lambda';
import { S3Client } from '@aws-sdk/client-s3';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { v4 as uuidv4 } from 'uuid';
import {
  DynamoPhotoMetadataStore,
  HttpError,
  NotFoundError,
  S3PhotoStorage,
  ValidationError,
  createErrorResponse,
  extractFamilyId,
  getEnvAllowedFamilyIds,
  getEnvAwsRegion,
  getEnvBucketName,
  getEnvTableName,
  getEnvUploadUrlTtlSeconds,
  resolveRoute,
} from './lib';
import { handleHealth } from './routes/health';
import { handleListPhotos } from './routes/list-photos';
import { handlePhotoContent } from './routes/photo-content';
import { handleRecordMetadata } from './routes/record-metadata';
import { FamilyRouteHandler, PhotoApiDependencies } from './routes/types';
import { handleIssueUploadUrl } from './routes/upload-url';

/**
 * AWS SDK Clients
 *
 * Created once per execution environment and reused across warm invocations.
 * `removeUndefinedValues` lets optional metadata fields be left out of items.
 */
const s3Client = new S3Client({ region: getEnvAwsRegion() });
const ddbClient = new DynamoDBClient({ region: getEnvAwsRegion() });
const dynamoDbClient = DynamoDBDocumentClient.from(ddbClient, {
  marshallOptions: { removeUndefinedValues: true },
});

export type PhotoApiHandler = (
  event: APIGatewayProxyEventV2,
  context: Context
) => Promise<APIGatewayProxyStructuredResultV2>;

interface FamilyRoute {
  method: string;
  pattern: RegExp;
  paramNames: string[];
  handler: FamilyRouteHandler;
}

/**
 * Family-scoped routes; every one of them requires the x-family-id header.
 * GET /health is answered before this table is consulted.
 */
const FAMILY_ROUTES: FamilyRoute[] = [
  { method: 'GET', pattern: /^\/photos$/, paramNames: [], handler: handleListPhotos },
  { method: 'POST', pattern: /^\/photos$/, paramNames: [], handler: handleRecordMetadata },
  { method: 'POST', pattern: /^\/photos\/upload-url$/, paramNames: [], handler: handleIssueUploadUrl },
  { method: 'GET', pattern: /^\/photos\/([^/]+)\/content$/, paramNames: ['photoId'], handler: handlePhotoContent },
];

function matchFamilyRoute(
  method: string,
  path: string
): { route: FamilyRoute; params: Record<string, string> } | undefined {
  for (const route of FAMILY_ROUTES) {
    if (route.method !== method) {
      continue;
    }
    const match = route.pattern.exec(path);
    if (!match) {
      continue;
    }
    const params: Record<string, string> = {};
    route.paramNames.forEach((name, index) => {
      params[name] = decodePathSegment(match[index + 1] ?? '');
    });
    return { route, params };
  }
  return undefined;
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new ValidationError('Malformed path parameter');
  }
}

/**
 * Convert anything a route throws into an error response.
 * {@link HttpError}s keep their status; everything else is a 500.
 */
function toErrorResponse(error: unknown): APIGatewayProxyStructuredResultV2 {
  if (error instanceof HttpError) {
    return createErrorResponse(error.statusCode, error.message, error.cause);
  }
  return createErrorResponse(500, 'Unexpected error handling request', error);
}

/**
 * Build the photo API handler around fixed configuration and collaborators.
 *
 * Routing:
 * - GET  /health                      → 200 { status: 'ok' }
 * - POST /photos/upload-url           → 200 presigned PUT for a new photoId
 * - POST /photos                      → 201 stored metadata item
 * - GET  /photos                      → 200 { items } newest first
 * - GET  /photos/{photoId}/content    → 302 to a presigned GET
 * - anything else                     → 404
 *
 * @param deps Allow-list, TTL and collaborators; never mutated by the handler
 */
export function createPhotoApiHandler(deps: PhotoApiDependencies): PhotoApiHandler {
  return async (event, context) => {
    console.log('Event received', JSON.stringify(event, null, 2));

    const { method, path } = resolveRoute(event);
    console.log(`Request ${context.awsRequestId}: ${method} ${path}`);

    try {
      if (method === 'GET' && path === '/health') {
        return handleHealth();
      }

      const matched = matchFamilyRoute(method, path);
      if (!matched) {
        throw new NotFoundError();
      }

      const familyId = extractFamilyId(event.headers, deps.allowedFamilyIds);
      return await matched.route.handler({ familyId, event, params: matched.params }, deps);
    } catch (error) {
      return toErrorResponse(error);
    }
  };
}

/**
 * Read configuration from the environment and wire the AWS-backed collaborators
 * @throws Error if a required environment variable is missing or invalid
 */
export function loadDependencies(): PhotoApiDependencies {
  return {
    allowedFamilyIds: getEnvAllowedFamilyIds(),
    storage: new S3PhotoStorage(s3Client, getEnvBucketName()),
    store: new DynamoPhotoMetadataStore(dynamoDbClient, getEnvTableName()),
    urlTtlSeconds: getEnvUploadUrlTtlSeconds(),
    now: () => new Date(),
    generatePhotoId: () => uuidv4(),
  };
}

/**
 * Photos Lambda Function Handler (API Gateway HTTP API, payload format 2.0)
 *
 * Configuration is read on every invocation so a misconfigured function
 * answers 500 naming the missing variable instead of failing at init.
 *
 * @param event - API Gateway HTTP API event
 * @param context - Lambda execution context with runtime information
 * @returns API Gateway HTTP API response
 */
export const handler: PhotoApiHandler = async (event, context) => {
  let deps: PhotoApiDependencies;
  try {
    deps = loadDependencies();
  } catch (error) {
    return createErrorResponse(500, error);
  }
  return createPhotoApiHandler(deps)(event, context);
};
