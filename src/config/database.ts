import dotenv from 'dotenv';
import { Pool, PoolConfig, QueryResult, QueryResultRow } from 'pg';

// Load environment variables
dotenv.config();

/**
 * Raised for any failure talking to Postgres. `code` and `detail` are copied
 * from the pg error when there is one.
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly detail?: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

const pgErrorFields = (error: unknown): { code?: string; detail?: string } => {
  if (typeof error !== 'object' || error === null) {
    return {};
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  const detail = 'detail' in error && typeof error.detail === 'string' ? error.detail : undefined;
  return { code, detail };
};

export const poolConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): PoolConfig => ({
  user: env.DB_USERNAME || 'postgres',
  password: env.DB_PASSWORD || 'postgres',
  database: env.DB_NAME || 'daily_reports_dev',
  host: env.DB_HOST || 'localhost',
  port: parseInt(env.DB_PORT || '5432', 10),
  max: env.NODE_ENV === 'test' ? 5 : 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 10000,
  application_name: 'daily-location-reports',
  statement_timeout: 30000,
  ssl: env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : undefined,
});

/**
 * Shared pg pool for the report reads
 */
export class DatabaseService {
  private static instance: DatabaseService | undefined;
  private readonly pool: Pool;
  private connected = false;

  private constructor(config: PoolConfig) {
    console.log(`Connecting to database at ${config.host}:${config.port}/${config.database}`);
    this.pool = new Pool(config);
    this.pool.on('error', (err) => {
      console.error('Unexpected error on idle client', err);
      this.connected = false;
    });
  }

  public static async getInstance(): Promise<DatabaseService> {
    if (!DatabaseService.instance) {
      const instance = new DatabaseService(poolConfigFromEnv());
      await instance.connect();
      DatabaseService.instance = instance;
    }
    return DatabaseService.instance;
  }

  private async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
      this.connected = true;
    } catch (error) {
      this.connected = false;
      throw new DatabaseError('Failed to connect to database', undefined, undefined, error);
    }
  }

  /**
   * Runs a parameterised query. Reconnects first if the pool reported an
   * error since the last query.
   */
  public async query<T extends QueryResultRow = Record<string, unknown>>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    if (!this.connected) {
      await this.connect();
    }

    try {
      const start = Date.now();
      const res = await this.pool.query<T>({ text, values: params });

      if (process.env.NODE_ENV === 'development') {
        console.log('Executed query', { text, duration: Date.now() - start, rows: res.rowCount });
      }

      return res;
    } catch (error) {
      const { code, detail } = pgErrorFields(error);
      throw new DatabaseError('Error executing query', code, detail, error);
    }
  }

  public async healthCheck(): Promise<boolean> {
    try {
      await this.connect();
      return true;
    } catch (error) {
      console.warn('Database health check failed', {
        error: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  }

  /**
   * Ends the pool. The next `getInstance` call opens a new one.
   */
  public async close(): Promise<void> {
    await this.pool.end();
    this.connected = false;
    if (DatabaseService.instance === this) {
      DatabaseService.instance = undefined;
    }
  }
}
