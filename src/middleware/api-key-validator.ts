import { MiddlewareObj, Request } from '@middy/core';
import { APIGatewayProxyEventHeaders, APIGatewayProxyResult } from 'aws-lambda';
import { ReportTriggerEvent, isHttpEvent } from '../types/common/events';
import { apiKeySchema } from '../types/schemas/handlers';
import { handleZodError } from './zod-error-handler';
import { AuthenticationError } from '../utils/errors/app-error';

const BEARER_PREFIX = /^Bearer\s+/i;

const header = (headers: APIGatewayProxyEventHeaders, name: string): string | undefined => {
  const match = Object.keys(headers).find((key) => key.toLowerCase() === name);
  return match ? headers[match] : undefined;
};

/**
 * API key from `x-api-key`, falling back to `Authorization: Bearer <key>`
 */
export const extractApiKey = (headers: APIGatewayProxyEventHeaders | null): string | undefined => {
  if (!headers) {
    return undefined;
  }
  const apiKey = header(headers, 'x-api-key');
  if (apiKey) {
    return apiKey;
  }
  const authorization = header(headers, 'authorization');
  return authorization && BEARER_PREFIX.test(authorization)
    ? authorization.replace(BEARER_PREFIX, '').trim()
    : undefined;
};

/**
 * Middleware to validate the API key of HTTP invocations. Scheduled
 * invocations carry no headers and pass through.
 */
export const apiKeyValidator = (): MiddlewareObj<ReportTriggerEvent, APIGatewayProxyResult> => {
  return {
    before: async (request: Request<ReportTriggerEvent, APIGatewayProxyResult>) => {
      const { event } = request;
      if (!isHttpEvent(event)) {
        return;
      }

      const apiKey = extractApiKey(event.headers);
      const apiKeyResult = apiKeySchema.safeParse(apiKey);

      if (!apiKeyResult.success) {
        throw handleZodError(apiKeyResult.error, 'apiKey');
      }

      const expected = process.env.REPORTS_API_KEY;
      if (!expected || apiKeyResult.data !== expected) {
        throw new AuthenticationError('Invalid API key');
      }
    },
  };
};
