import { OwnerRepository, ownerDisplayName } from '../owner-repository';
import { DatabaseService } from '../../config/database';
import { loadReportConfig } from '../../config/report';

describe('OwnerRepository', () => {
  let dbService: jest.Mocked<DatabaseService>;
  let repo: OwnerRepository;

  const mockQueryResult = <T>(rows: T[]): any => ({
    rows,
    command: '',
    rowCount: rows.length,
    oid: 0,
    fields: [],
  });

  beforeEach(() => {
    dbService = {
      query: jest.fn(),
    } as any;
    repo = new OwnerRepository(dbService, loadReportConfig({}).tables);
  });

  describe('listOwners', () => {
    const ownerRows = [
      {
        id: 1,
        email: 'asha@example.com',
        first_name: 'Asha',
        last_name: 'Rao',
        name: null,
        templateno: '2',
        timezone: null,
        assigned_location: null,
      },
      {
        id: 2,
        email: null,
        first_name: null,
        last_name: null,
        name: 'Depot Two',
        templateno: null,
        timezone: 'Asia/Kolkata',
        assigned_location: 30,
      },
    ];
    const locationRows = [
      { id: 10, name: 'Alpha', owner_id: 1 },
      { id: 30, name: null, owner_id: null },
      { id: 20, name: 'Beta', owner_id: 1 },
    ];

    it('should return owners with their preferences and locations', async () => {
      dbService.query
        .mockResolvedValueOnce(mockQueryResult(ownerRows))
        .mockResolvedValueOnce(mockQueryResult(locationRows));

      const owners = await repo.listOwners();

      expect(owners).toEqual([
        {
          ownerId: '1',
          name: 'Asha Rao',
          email: 'asha@example.com',
          templateSelector: 2,
          timezone: null,
          locations: [
            { id: '10', name: 'Alpha' },
            { id: '20', name: 'Beta' },
          ],
        },
        {
          ownerId: '2',
          name: 'Depot Two',
          email: null,
          templateSelector: null,
          timezone: 'Asia/Kolkata',
          locations: [{ id: '30', name: '30' }],
        },
      ]);
    });

    it('should load locations for owned and assigned ids in one query', async () => {
      dbService.query
        .mockResolvedValueOnce(mockQueryResult(ownerRows))
        .mockResolvedValueOnce(mockQueryResult(locationRows));

      await repo.listOwners();

      expect(dbService.query).toHaveBeenCalledTimes(2);
      expect(dbService.query.mock.calls[0]).toEqual([
        'SELECT id, email, first_name, last_name, name, templateno, timezone, assigned_location ' +
          'FROM "users" WHERE role = $1 ORDER BY id ASC',
        ['owner'],
      ]);
      expect(dbService.query.mock.calls[1]).toEqual([
        'SELECT id, name, owner_id FROM "locations" WHERE owner_id = ANY($1) OR id = ANY($2) ' +
          'ORDER BY name ASC, id ASC',
        [
          ['1', '2'],
          ['30'],
        ],
      ]);
    });

    it('should restrict the owner query to the requested ids', async () => {
      dbService.query.mockResolvedValueOnce(mockQueryResult([]));

      await repo.listOwners({ ownerIds: ['7', '8'] });

      expect(dbService.query).toHaveBeenCalledWith(
        'SELECT id, email, first_name, last_name, name, templateno, timezone, assigned_location ' +
          'FROM "users" WHERE role = $1 AND id = ANY($2) ORDER BY id ASC',
        ['owner', ['7', '8']],
      );
    });

    it('should skip the location query when there are no owners', async () => {
      dbService.query.mockResolvedValueOnce(mockQueryResult([]));

      const owners = await repo.listOwners();

      expect(owners).toEqual([]);
      expect(dbService.query).toHaveBeenCalledTimes(1);
    });
  });

  describe('ownerDisplayName', () => {
    const base = {
      id: '5',
      email: null,
      first_name: null,
      last_name: null,
      name: null,
      templateno: null,
      timezone: null,
      assigned_location: null,
    };

    it('should fall back from full name to name, email and id', () => {
      expect(ownerDisplayName({ ...base, first_name: 'Asha', name: 'Shop' })).toBe('Asha');
      expect(ownerDisplayName({ ...base, name: 'Shop', email: 'a@example.com' })).toBe('Shop');
      expect(ownerDisplayName({ ...base, email: 'a@example.com' })).toBe('a@example.com');
      expect(ownerDisplayName(base)).toBe('5');
    });
  });
});
