import { MiddlewareObj, Request } from '@middy/core';
import { APIGatewayProxyResult, Context } from 'aws-lambda';
import { ZodError } from 'zod';
import { DatabaseError } from '../config/database';
import { HTTP_HEADERS, HTTP_STATUS } from '../constants/http';
import { AppError, ServiceUnavailableError } from '../utils/errors/app-error';
import { TransportError } from '../utils/errors/report-errors';
import { handleZodError } from './zod-error-handler';

const respond = (statusCode: number, body: Record<string, unknown>): APIGatewayProxyResult => ({
  statusCode,
  headers: HTTP_HEADERS,
  body: JSON.stringify({ status: 'error', ...body }),
});

const fromAppError = (error: AppError): APIGatewayProxyResult =>
  respond(error.statusCode, {
    code: error.code,
    message: error.message,
    ...(error.details && { details: error.details }),
  });

/**
 * Maps an error to the JSON error response
 */
export const toErrorResponse = (error: unknown): APIGatewayProxyResult => {
  if (error instanceof AppError) {
    return fromAppError(error);
  }

  if (error instanceof ZodError) {
    return fromAppError(handleZodError(error));
  }

  // The database or the mail provider is unreachable
  if (error instanceof DatabaseError || error instanceof TransportError) {
    return fromAppError(new ServiceUnavailableError(error.message, { cause: error.name }));
  }

  return respond(HTTP_STATUS.INTERNAL_SERVER_ERROR, {
    code: 'INTERNAL_SERVER_ERROR',
    message: 'An unexpected error occurred',
  });
};

/**
 * Middleware to handle errors in a centralized way
 */
export const errorHandler = <TEvent, TContext extends Context = Context>(): MiddlewareObj<
  TEvent,
  APIGatewayProxyResult,
  Error,
  TContext
> => {
  return {
    onError: async (request: Request<TEvent, APIGatewayProxyResult, Error, TContext>) => {
      const { error } = request;
      console.error('Error caught by error handler:', error);

      request.response = toErrorResponse(error);
      return request.response;
    },
  };
};
