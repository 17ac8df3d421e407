import { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import middy from '@middy/core';
import { DatabaseService } from '../config/database';
import { HTTP_HEADERS, HTTP_STATUS } from '../constants/http';
import { errorHandler } from '../middleware/error-handler';
import { createResponseValidator } from '../middleware/response-validator';
import { resolveEmailProvider } from '../repositories/email-repository';
import { healthResponseSchema } from '../types/schemas/responses';
import { ServiceUnavailableError } from '../utils/errors/app-error';
import { describeError } from '../utils/errors/report-errors';
import { attempt } from '../utils/result';

/**
 * GET /health: reports whether the service can reach its database
 */
const healthHandler = async (
  _event: APIGatewayProxyEvent,
  context: Context,
): Promise<APIGatewayProxyResult> => {
  console.log('Request ID:', context.awsRequestId);

  const database = await attempt(async () => (await DatabaseService.getInstance()).healthCheck());
  if (!database.ok) {
    throw new ServiceUnavailableError('Database is unavailable', { error: describeError(database.error) });
  }
  if (!database.value) {
    throw new ServiceUnavailableError('Database is unavailable');
  }

  return {
    statusCode: HTTP_STATUS.OK,
    headers: HTTP_HEADERS,
    body: JSON.stringify({
      status: 'success',
      data: {
        service: 'daily-location-reports',
        database: 'up',
        emailProvider: resolveEmailProvider(),
        timestamp: new Date().toISOString(),
      },
    }),
  };
};

export const handler = middy<APIGatewayProxyEvent, APIGatewayProxyResult>(healthHandler)
  .use(errorHandler<APIGatewayProxyEvent, Context>())
  .use(createResponseValidator<APIGatewayProxyEvent, Context>(healthResponseSchema));
