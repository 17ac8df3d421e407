import { APIGatewayProxyEvent, Context, ScheduledEvent } from 'aws-lambda';

/**
 * The report handler is invoked over HTTP or by a schedule rule
 */
export type ReportTriggerEvent = APIGatewayProxyEvent | ScheduledEvent;

export const isHttpEvent = (event: ReportTriggerEvent): event is APIGatewayProxyEvent =>
  'httpMethod' in event;

/**
 * Lambda context carrying the request body once a validator has parsed it
 */
export type ValidatedContext<T> = Context & { validatedBody?: T };
