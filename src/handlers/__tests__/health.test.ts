import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { handler } from '../health';
import { DatabaseService } from '../../config/database';

jest.mock('../../config/database', () => ({
  ...jest.requireActual<typeof import('../../config/database')>('../../config/database'),
  DatabaseService: { getInstance: jest.fn() },
}));

describe('Health Handler', () => {
  const originalEnv = process.env;
  const mockHealthCheck = jest.fn();

  const invoke = async (): Promise<APIGatewayProxyResult> => {
    const event = { httpMethod: 'GET', path: '/health', headers: {} } as unknown as APIGatewayProxyEvent;
    const result = await handler(event, { awsRequestId: 'test-request' } as any, null as any);
    if (!result) {
      throw new Error('Handler returned no response');
    }
    return result;
  };

  beforeEach(() => {
    process.env = { ...originalEnv, EMAIL_PROVIDER: 'smtp' };
    (DatabaseService.getInstance as jest.Mock).mockResolvedValue({ healthCheck: mockHealthCheck });
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should report a healthy service', async () => {
    mockHealthCheck.mockResolvedValue(true);

    const result = await invoke();

    expect(result.statusCode).toBe(200);
    expect(JSON.parse(result.body)).toEqual({
      status: 'success',
      data: {
        service: 'daily-location-reports',
        database: 'up',
        emailProvider: 'smtp',
        timestamp: expect.any(String),
      },
    });
  });

  it('should return 503 when the database check fails', async () => {
    mockHealthCheck.mockResolvedValue(false);

    const result = await invoke();

    expect(result.statusCode).toBe(503);
    expect(JSON.parse(result.body)).toEqual({
      status: 'error',
      code: 'SERVICE_UNAVAILABLE_ERROR',
      message: 'Database is unavailable',
    });
  });

  it('should return 503 when the database cannot be reached', async () => {
    (DatabaseService.getInstance as jest.Mock).mockRejectedValue(new Error('connect ECONNREFUSED'));

    const result = await invoke();

    expect(result.statusCode).toBe(503);
    expect(JSON.parse(result.body).details).toEqual({ error: 'connect ECONNREFUSED' });
  });
});
