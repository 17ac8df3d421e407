import { TransactionRepository, quoteIdentifier } from '../transaction-repository';
import { DatabaseService } from '../../config/database';
import { loadReportConfig } from '../../config/report';

describe('TransactionRepository', () => {
  let dbService: jest.Mocked<DatabaseService>;
  let repo: TransactionRepository;
  const tables = loadReportConfig({}).tables;

  beforeEach(() => {
    dbService = {
      query: jest.fn(),
    } as any;
    repo = new TransactionRepository(dbService, tables);
  });

  const mockQueryResult = <T>(rows: T[]): any => ({
    rows,
    command: '',
    rowCount: rows.length,
    oid: 0,
    fields: [],
  });

  describe('quoteIdentifier', () => {
    it('should wrap names in double quotes', () => {
      expect(quoteIdentifier('logs-man')).toBe('"logs-man"');
    });

    it('should double embedded quotes', () => {
      expect(quoteIdentifier('we"ird')).toBe('"we""ird"');
    });
  });

  describe('findApproved', () => {
    const filter = {
      locationIds: ['L1', 'L2'],
      start: new Date('2024-04-30T18:30:00.000Z'),
      end: new Date('2024-05-01T18:30:00.000Z'),
    };

    it('should select approved rows inside the half-open window', async () => {
      const rows = [{ id: 1 }, { id: 2 }];
      dbService.query.mockResolvedValue(mockQueryResult(rows));

      const result = await repo.findApproved(filter);

      expect(result).toEqual(rows);
      expect(dbService.query).toHaveBeenCalledWith(
        'SELECT * FROM "logs-man" WHERE approval_status = $1 AND created_at >= $2 ' +
          'AND created_at < $3 AND loc_id = ANY($4) ORDER BY created_at ASC, id ASC',
        ['approved', '2024-04-30T18:30:00.000Z', '2024-05-01T18:30:00.000Z', ['L1', 'L2']],
      );
    });

    it('should add the customer condition when one is given', async () => {
      dbService.query.mockResolvedValue(mockQueryResult([]));

      await repo.findApproved({ ...filter, customerId: 'C9' });

      const [text, params] = dbService.query.mock.calls[0];
      expect(text).toContain('AND loc_id = ANY($4) AND cust_id = $5 ORDER BY');
      expect(params).toEqual([
        'approved',
        '2024-04-30T18:30:00.000Z',
        '2024-05-01T18:30:00.000Z',
        ['L1', 'L2'],
        'C9',
      ]);
    });

    it('should use the configured table name', async () => {
      repo = new TransactionRepository(dbService, { ...tables, transactions: 'txn_log' });
      dbService.query.mockResolvedValue(mockQueryResult([]));

      await repo.findApproved(filter);

      expect(dbService.query.mock.calls[0][0]).toMatch(/^SELECT \* FROM "txn_log" WHERE/);
    });

    it('should propagate database errors', async () => {
      dbService.query.mockRejectedValue(new Error('connection refused'));

      await expect(repo.findApproved(filter)).rejects.toThrow('connection refused');
    });
  });

  describe('findByIds', () => {
    it('should look up all ids in a single query', async () => {
      const rows = [{ id: '11', name: 'Asha' }];
      dbService.query.mockResolvedValue(mockQueryResult(rows));

      const result = await repo.findByIds('customers', ['11', '12']);

      expect(result).toEqual(rows);
      expect(dbService.query).toHaveBeenCalledTimes(1);
      expect(dbService.query).toHaveBeenCalledWith('SELECT * FROM "customers" WHERE id = ANY($1)', [
        ['11', '12'],
      ]);
    });

    it('should not query when no ids are given', async () => {
      const result = await repo.findByIds('customers', []);

      expect(result).toEqual([]);
      expect(dbService.query).not.toHaveBeenCalled();
    });
  });
});
