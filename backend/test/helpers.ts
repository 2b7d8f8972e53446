import { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2, Context } from 'aws-lambda';
import { PhotoMetadata } from '../interfaces';
import { PhotoMetadataStore } from '../lib/metadata-store';
import { PhotoStorage } from '../lib/storage';
import { PhotoApiDependencies } from '../routes/types';

interface ApiEventOptions {
  headers?: Record<string, string>;
  body?: unknown;
  rawBody?: string;
  isBase64Encoded?: boolean;
  stage?: string;
}

/**
 * Helper function to create a mock API Gateway HTTP API event
 * @param method HTTP method
 * @param path Raw request path
 * @param options Headers, JSON body (serialized) or raw body, stage
 * @returns Mock APIGatewayProxyEventV2 object
 */
export const createApiEvent = (
  method: string,
  path: string,
  options: ApiEventOptions = {}
): APIGatewayProxyEventV2 => ({
  version: '2.0',
  routeKey: '$default',
  rawPath: path,
  rawQueryString: '',
  headers: {
    'content-type': 'application/json',
    ...options.headers,
  },
  requestContext: {
    accountId: '123456789012',
    apiId: 'test-api-id',
    domainName: 'test-api.execute-api.us-east-1.amazonaws.com',
    domainPrefix: 'test-api',
    http: {
      method,
      path,
      protocol: 'HTTP/1.1',
      sourceIp: '127.0.0.1',
      userAgent: 'test-agent',
    },
    requestId: 'test-request-id',
    routeKey: '$default',
    stage: options.stage ?? '$default',
    time: '01/Jan/2024:00:00:00 +0000',
    timeEpoch: 1704067200000,
  },
  body: options.rawBody ?? (options.body !== undefined ? JSON.stringify(options.body) : undefined),
  isBase64Encoded: options.isBase64Encoded ?? false,
});

/**
 * Helper function to create a mock Lambda Context
 * @returns Mock Context object
 */
export const createMockContext = (): Context => ({
  callbackWaitsForEmptyEventLoop: false,
  functionName: 'test-function',
  functionVersion: '$LATEST',
  invokedFunctionArn: 'arn:aws:lambda:us-east-1:123456789012:function:test-function',
  memoryLimitInMB: '256',
  awsRequestId: 'test-request-id',
  logGroupName: '/aws/lambda/test-function',
  logStreamName: '2024/01/01/[$LATEST]test-stream',
  getRemainingTimeInMillis: () => 30000,
  done: () => {},
  fail: () => {},
  succeed: () => {},
});

/**
 * Parse the JSON body of a handler response
 * @throws Error if the response has no body
 */
export function parseBody(response: APIGatewayProxyStructuredResultV2): unknown {
  if (typeof response.body !== 'string') {
    throw new Error('Response has no body');
  }
  return JSON.parse(response.body);
}

/**
 * In-process stand-in for the DynamoDB table, keyed by (familyId, photoId)
 */
export class InMemoryPhotoMetadataStore implements PhotoMetadataStore {
  readonly items = new Map<string, PhotoMetadata>();
  failWith?: Error;

  async put(item: PhotoMetadata): Promise<void> {
    this.throwIfFailing();
    this.items.set(`${item.familyId}#${item.photoId}`, { ...item });
  }

  async listByFamily(familyId: string): Promise<PhotoMetadata[]> {
    this.throwIfFailing();
    return [...this.items.values()].filter((item) => item.familyId === familyId);
  }

  async get(familyId: string, photoId: string): Promise<PhotoMetadata | undefined> {
    this.throwIfFailing();
    return this.items.get(`${familyId}#${photoId}`);
  }

  private throwIfFailing(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

/**
 * Stand-in for S3 presigning; URLs encode their arguments for assertions
 */
export class FakePhotoStorage implements PhotoStorage {
  failWith?: Error;

  async createUploadUrl(objectKey: string, contentType: string, expiresInSeconds: number): Promise<string> {
    if (this.failWith) {
      throw this.failWith;
    }
    return `https://uploads.test/${objectKey}?type=${encodeURIComponent(contentType)}&ttl=${expiresInSeconds}`;
  }

  async createDownloadUrl(objectKey: string, expiresInSeconds: number): Promise<string> {
    if (this.failWith) {
      throw this.failWith;
    }
    return `https://downloads.test/${objectKey}?ttl=${expiresInSeconds}`;
  }
}

export const FIXED_NOW = new Date('2024-01-01T00:00:00.000Z');

/**
 * Dependencies backed by the in-memory stand-ins.
 * Photo ids are `photo-1`, `photo-2`, … in call order.
 */
export function createTestDependencies(
  overrides: Partial<PhotoApiDependencies> = {}
): PhotoApiDependencies {
  let counter = 0;
  return {
    allowedFamilyIds: new Set<string>(),
    storage: new FakePhotoStorage(),
    store: new InMemoryPhotoMetadataStore(),
    urlTtlSeconds: 900,
    now: () => FIXED_NOW,
    generatePhotoId: () => `photo-${++counter}`,
    ...overrides,
  };
}
