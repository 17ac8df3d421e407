import { MiddlewareObj, Request } from '@middy/core';
import { APIGatewayProxyResult } from 'aws-lambda';
import { ZodType, ZodTypeDef } from 'zod';
import { ReportTriggerEvent, ValidatedContext, isHttpEvent } from '../types/common/events';
import { ValidationError } from '../utils/errors/app-error';
import { handleZodError } from './zod-error-handler';

const readBody = (event: ReportTriggerEvent): unknown => {
  if (!isHttpEvent(event)) {
    return {};
  }
  if (!event.body || event.body.trim().length === 0) {
    return {};
  }

  const raw = event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ValidationError('Request body must be valid JSON', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
};

/**
 * Middleware to validate the JSON body with a Zod schema. The parsed value
 * is placed on `context.validatedBody`; an empty body or a scheduled
 * invocation is validated as `{}`.
 */
export const requestBodyValidator = <T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareObj<ReportTriggerEvent, APIGatewayProxyResult, Error, ValidatedContext<T>> => {
  return {
    before: async (request: Request<ReportTriggerEvent, APIGatewayProxyResult, Error, ValidatedContext<T>>) => {
      const result = schema.safeParse(readBody(request.event));
      if (!result.success) {
        throw handleZodError(result.error);
      }
      request.context.validatedBody = result.data;
    },
  };
};
