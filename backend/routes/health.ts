import { APIGatewayProxyStructuredResultV2 } from 'aws-lambda';
import { createSuccessResponse } from '../lib/response';

/**
 * Liveness probe; needs no family header and touches no collaborator
 */
export function handleHealth(): APIGatewayProxyStructuredResultV2 {
  return createSuccessResponse({ status: 'ok' });
}
