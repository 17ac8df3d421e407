import { APIGatewayProxyEvent, APIGatewayProxyResult, ScheduledEvent } from 'aws-lambda';
import { handler } from '../cron/daily-report';
import { ReportRunService } from '../../services/report-run-service';
import { RunStatus } from '../../types/common/enums';
import { ReportTriggerEvent } from '../../types/common/events';
import { RunSummary } from '../../types/models/run';
import { TransportError } from '../../utils/errors/report-errors';

const mockRun = jest.fn();

// Mock dependencies
jest.mock('../../services/report-run-service', () => ({
  ReportRunService: { initialize: jest.fn() },
}));

describe('Daily Report Handler', () => {
  const originalEnv = process.env;

  const summary: RunSummary = {
    triggerSource: 'http',
    reportDate: '2024-05-01',
    counts: { sent: 1, skipped: 0, failed: 0, total: 1 },
    totals: { records: 3, amount: 50000 },
    results: [
      {
        ownerId: '1',
        ownerName: 'Asha Rao',
        email: 'asha@example.com',
        status: RunStatus.SENT,
        recordCount: 3,
        amount: 50000,
        locations: ['L1'],
        templateUsed: 2,
        attachments: ['report_2024-05-01_mg-road.csv'],
      },
    ],
    summaryEmailSent: false,
  };

  const httpEvent = (headers: Record<string, string>, body: string | null = null): APIGatewayProxyEvent =>
    ({
      httpMethod: 'POST',
      path: '/send-reports',
      headers,
      body,
      isBase64Encoded: false,
    }) as unknown as APIGatewayProxyEvent;

  const scheduledEvent = {
    source: 'aws.events',
    'detail-type': 'Scheduled Event',
    detail: {},
  } as unknown as ScheduledEvent;

  const invoke = async (event: ReportTriggerEvent): Promise<APIGatewayProxyResult> => {
    const result = await handler(event, { awsRequestId: 'test-request' } as any, null as any);
    if (!result) {
      throw new Error('Handler returned no response');
    }
    return result;
  };

  beforeEach(() => {
    process.env = { ...originalEnv, REPORTS_API_KEY: 'test-secret' };
    (ReportRunService.initialize as jest.Mock).mockResolvedValue({ run: mockRun });
    mockRun.mockResolvedValue(summary);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  describe('authentication', () => {
    it('should return 400 when the API key is missing', async () => {
      const result = await invoke(httpEvent({}));

      expect(result.statusCode).toBe(400);
      expect(JSON.parse(result.body)).toEqual({
        status: 'error',
        code: 'VALIDATION_ERROR',
        message: 'apiKey: API key is required',
        details: {
          validationErrors: [{ field: 'apiKey', message: 'API key is required', code: 'invalid_type' }],
        },
      });
      expect(mockRun).not.toHaveBeenCalled();
    });

    it('should return 401 for a wrong API key', async () => {
      const result = await invoke(httpEvent({ 'x-api-key': 'wrong-secret' }));

      expect(result.statusCode).toBe(401);
      expect(JSON.parse(result.body)).toEqual({
        status: 'error',
        code: 'AUTHENTICATION_ERROR',
        message: 'Invalid API key',
      });
    });

    it('should accept a bearer token', async () => {
      const result = await invoke(httpEvent({ Authorization: 'Bearer test-secret' }));

      expect(result.statusCode).toBe(200);
    });

    it('should not require a key for scheduled invocations', async () => {
      const result = await invoke(scheduledEvent);

      expect(result.statusCode).toBe(200);
      expect(mockRun).toHaveBeenCalledWith({ source: 'scheduled' });
    });
  });

  describe('request body', () => {
    it('should run the reports with the validated options', async () => {
      const body = JSON.stringify({ date: '2024-05-01', ownerIds: [1, '2'], template: 3 });

      const result = await invoke(httpEvent({ 'X-Api-Key': 'test-secret' }, body));

      expect(result.statusCode).toBe(200);
      expect(JSON.parse(result.body)).toEqual({ status: 'success', data: summary });
      expect(mockRun).toHaveBeenCalledWith({
        date: '2024-05-01',
        ownerIds: ['1', '2'],
        template: 3,
        source: 'http',
      });
    });

    it('should decode base64 bodies', async () => {
      const event = {
        ...httpEvent({ 'x-api-key': 'test-secret' }, Buffer.from('{"email":"qa@example.com"}').toString('base64')),
        isBase64Encoded: true,
      };

      await invoke(event);

      expect(mockRun).toHaveBeenCalledWith({ email: 'qa@example.com', source: 'http' });
    });

    it('should reject an unsupported template', async () => {
      const result = await invoke(httpEvent({ 'x-api-key': 'test-secret' }, '{"template":5}'));

      expect(result.statusCode).toBe(400);
      expect(JSON.parse(result.body).message).toBe('template: Template must be 1, 2 or 3');
    });

    it('should reject an impossible date', async () => {
      const result = await invoke(httpEvent({ 'x-api-key': 'test-secret' }, '{"date":"2024-02-30"}'));

      expect(result.statusCode).toBe(400);
      expect(JSON.parse(result.body).message).toBe('date: Date must be a valid YYYY-MM-DD date');
    });

    it('should reject a body that is not JSON', async () => {
      const result = await invoke(httpEvent({ 'x-api-key': 'test-secret' }, '{'));

      expect(result.statusCode).toBe(400);
      expect(JSON.parse(result.body).message).toBe('Request body must be valid JSON');
    });
  });

  describe('failures', () => {
    it('should return 503 when the email provider is unreachable', async () => {
      mockRun.mockRejectedValue(new TransportError('Email provider unavailable: timeout'));

      const result = await invoke(scheduledEvent);

      expect(result.statusCode).toBe(503);
      expect(JSON.parse(result.body)).toEqual({
        status: 'error',
        code: 'SERVICE_UNAVAILABLE_ERROR',
        message: 'Email provider unavailable: timeout',
        details: { cause: 'TransportError' },
      });
    });

    it('should return 500 for unexpected errors', async () => {
      mockRun.mockRejectedValue(new Error('boom'));

      const result = await invoke(scheduledEvent);

      expect(result.statusCode).toBe(500);
      expect(JSON.parse(result.body)).toEqual({
        status: 'error',
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred',
      });
    });
  });
});
