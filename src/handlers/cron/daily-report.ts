import { APIGatewayProxyResult } from 'aws-lambda';
import middy from '@middy/core';

// Services
import { ReportRunService } from '../../services/report-run-service';

// Middleware
import { apiKeyValidator } from '../../middleware/api-key-validator';
import { requestBodyValidator } from '../../middleware/request-body-validator';
import { errorHandler } from '../../middleware/error-handler';
import { createResponseValidator } from '../../middleware/response-validator';

// Schemas
import { SendReportsBody, sendReportsBodySchema } from '../../types/schemas/handlers';
import { sendReportsResponseSchema } from '../../types/schemas/responses';

// Types
import { ReportTriggerEvent, ValidatedContext, isHttpEvent } from '../../types/common/events';
import { RunRequest } from '../../types/models/run';

// Constants
import { HTTP_HEADERS, HTTP_STATUS } from '../../constants/http';

type SendReportsContext = ValidatedContext<SendReportsBody>;

/**
 * Handler to generate and send the daily location reports of every owner.
 * Runs on a schedule or on demand through POST /send-reports.
 */
const dailyReportHandler = async (
  event: ReportTriggerEvent,
  context: SendReportsContext,
): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const body = context.validatedBody ?? {};
  const request: RunRequest = {
    ...body,
    source: body.source ?? (isHttpEvent(event) ? 'http' : 'scheduled'),
  };

  console.log('Starting daily report generation...', {
    source: request.source,
    date: request.date ?? 'today',
  });

  const runService = await ReportRunService.initialize();
  const summary = await runService.run(request);

  console.log(`Daily reports processed in ${Date.now() - startTime}ms`);

  return {
    statusCode: HTTP_STATUS.OK,
    headers: HTTP_HEADERS,
    body: JSON.stringify({
      status: 'success',
      data: summary,
    }),
  };
};

// Export the handler wrapped with Middy middleware
export const handler = middy<ReportTriggerEvent, APIGatewayProxyResult, Error, SendReportsContext>(
  dailyReportHandler,
)
  .use(apiKeyValidator())
  .use(requestBodyValidator(sendReportsBodySchema))
  .use(errorHandler<ReportTriggerEvent, SendReportsContext>())
  .use(createResponseValidator<ReportTriggerEvent, SendReportsContext>(sendReportsResponseSchema));
