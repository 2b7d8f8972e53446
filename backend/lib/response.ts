import { APIGatewayProxyStructuredResultV2 } from 'aws-lambda';

/**
 * CORS Headers
 *
 * Browsers upload straight to S3 and call this API from the family web app,
 * so any origin may read the responses. The allow-list header is the only gate.
 */
const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
};

const SECURITY_HEADERS = {
  'Strict-Transport-Security': 'max-age=63072000; includeSubDomains; preload',
};

const BASE_HEADERS = {
  ...CORS_HEADERS,
  ...SECURITY_HEADERS,
};

export type ErrorStatusCode = 400 | 403 | 404 | 500 | 502;
const ERROR_STATUS_CODE_MESSAGE_MAP: Record<ErrorStatusCode, string> = {
  400: 'Bad request',
  403: 'Forbidden',
  404: 'Not found',
  500: 'Internal server error',
  502: 'Bad gateway',
};

export type SuccessStatusCode = 200 | 201;

/**
 * Create a standardized error response
 * Logs the error message and optional error object to console
 * @param statusCode HTTP status code for the error
 * @param message Detailed error message; can be string or Error object
 * @param error Optional error object for raw logging
 * @returns Standardized error response object
 */
export function createErrorResponse(
  statusCode: ErrorStatusCode,
  message: string | Error | unknown,
  error?: unknown
): APIGatewayProxyStructuredResultV2 {
  const _message = message instanceof Error ? message.message : String(message);
  if (error)
    console.error(`${_message}:`, error);
  else
    console.error(`${_message}`);
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...BASE_HEADERS,
    },
    body: JSON.stringify({ error: ERROR_STATUS_CODE_MESSAGE_MAP[statusCode], message: _message }),
  };
}

/**
 * Create a standardized JSON success response
 * @param data Data to include in the response body as JSON
 * @param statusCode 200 unless told otherwise
 * @returns Standardized success response object
 */
export function createSuccessResponse(
  data: unknown,
  statusCode: SuccessStatusCode = 200
): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...BASE_HEADERS,
    },
    body: JSON.stringify(data),
  };
}

/**
 * Create a 302 redirect to a short-lived URL
 * @param location Absolute URL for the Location header
 * @param maxAgeSeconds How long the browser may reuse the redirect
 */
export function createRedirectResponse(
  location: string,
  maxAgeSeconds = 30
): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode: 302,
    headers: {
      Location: location,
      'Cache-Control': `private, max-age=${maxAgeSeconds}`,
      ...BASE_HEADERS,
    },
  };
}
