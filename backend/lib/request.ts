import { APIGatewayProxyEventV2 } from 'aws-lambda';
import { ValidationError } from './errors';

/**
 * JSON object body, keys still unvalidated
 */
export type JsonObject = Record<string, unknown>;

/**
 * Method and normalized path of an API Gateway HTTP API request
 */
export interface ResolvedRoute {
  method: string;
  path: string;
}

/**
 * Resolve method and path of the request.
 *
 * Named stages prefix rawPath with `/{stage}`; the prefix is stripped so routes
 * match regardless of the deployment stage. Trailing slashes are ignored.
 * @param event API Gateway HTTP API event
 */
export function resolveRoute(event: APIGatewayProxyEventV2): ResolvedRoute {
  const method = (event.requestContext?.http?.method ?? '').toUpperCase();
  const stage = event.requestContext?.stage;
  let path = event.rawPath || '/';

  if (stage && stage !== '$default') {
    const stagePrefix = `/${stage}`;
    if (path === stagePrefix) {
      path = '/';
    } else if (path.startsWith(`${stagePrefix}/`)) {
      path = path.slice(stagePrefix.length);
    }
  }

  path = path.replace(/\/+$/, '') || '/';
  return { method, path };
}

/**
 * Case-insensitive header lookup.
 * HTTP APIs lower-case header names, direct invocations and tests may not.
 * @returns Header value, or undefined when absent
 */
export function getHeader(
  headers: APIGatewayProxyEventV2['headers'] | undefined,
  name: string
): string | undefined {
  if (!headers) {
    return undefined;
  }
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

/**
 * Parse the request body as a JSON object.
 * An absent or empty body is treated as `{}`.
 * @throws ValidationError if the body is not valid JSON or not a JSON object
 */
export function parseJsonBody(event: APIGatewayProxyEventV2): JsonObject {
  if (!event.body) {
    return {};
  }

  const raw = event.isBase64Encoded
    ? Buffer.from(event.body, 'base64').toString('utf-8')
    : event.body;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    console.warn('Invalid JSON payload:', error instanceof Error ? error.message : String(error));
    throw new ValidationError('Invalid JSON body');
  }

  if (!isJsonObject(parsed)) {
    throw new ValidationError('JSON body must be an object');
  }
  return parsed;
}

/**
 * Type Guard for {@link JsonObject}
 * @param value Parsed JSON value
 * @returns True if value is a plain object (not null, not an array)
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
