import { MiddlewareObj, Request } from '@middy/core';
import { APIGatewayProxyResult, Context } from 'aws-lambda';
import { z } from 'zod';
import { AppError } from '../utils/errors/app-error';

/**
 * Middleware to check successful response bodies against a schema before
 * they leave the handler
 */
export const createResponseValidator = <TEvent, TContext extends Context = Context>(
  schema: z.ZodType,
): MiddlewareObj<TEvent, APIGatewayProxyResult, Error, TContext> => ({
  after: async (request: Request<TEvent, APIGatewayProxyResult, Error, TContext>) => {
    if (!request.response) {
      return;
    }

    const result = schema.safeParse(JSON.parse(request.response.body));
    if (!result.success) {
      throw new AppError('Invalid response format', 500, 'RESPONSE_VALIDATION_ERROR', {
        details: result.error.errors,
      });
    }
  },
});
