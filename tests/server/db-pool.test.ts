import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { mockClient, mockPool, outstanding } = vi.hoisted(() => {
  const outstanding = { count: 0 };
  const mockClient = {
    query: vi.fn(),
    release: vi.fn(() => {
      outstanding.count -= 1;
    }),
  };
  const mockPool = {
    connect: vi.fn(async () => {
      outstanding.count += 1;
      return mockClient;
    }),
    query: vi.fn(),
    on: vi.fn(),
    end: vi.fn().mockResolvedValue(undefined),
  };
  return { mockClient, mockPool, outstanding };
});

vi.mock('pg', () => ({
  Pool: function () { return mockPool; },
}));

import {
  closePool,
  createGuardedExecutor,
  fetchColumnTypes,
  getPool,
  healthCheck,
  initPool,
  type PoolSettings,
} from '../../src/server/db/pool';
import { ExecutionFailedError, ExecutionTimeoutError } from '../../src/server/errors';

const settings: PoolSettings = {
  host: 'localhost',
  port: 5432,
  max: 10,
  connectionTimeoutMillis: 5_000,
  idleTimeoutMillis: 30_000,
};

const SQL = 'SELECT id, display_name FROM odoo_replica.stg_res_partner LIMIT 200;';
const OPTIONS = { schema: 'odoo_replica', timeoutMs: 8_000 };

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

beforeEach(() => {
  vi.clearAllMocks();
  outstanding.count = 0;
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.mocked(console.error).mockRestore();
});

describe('pool lifecycle', () => {
  it('should register an idle error handler on init', () => {
    initPool(settings);
    expect(mockPool.on).toHaveBeenCalledWith('error', expect.any(Function));
    expect(getPool()).toBe(mockPool);
  });

  it('should end the pool on close and refuse further use', async () => {
    initPool(settings);
    await closePool();
    expect(mockPool.end).toHaveBeenCalledOnce();
    expect(() => getPool()).toThrow('Database pool has not been initialised');
  });
});

describe('createGuardedExecutor', () => {
  it('should run the statement in a read-only transaction with pinned settings', async () => {
    const rows = [{ id: 1, display_name: 'Acme Ltd' }];
    mockClient.query
      .mockResolvedValueOnce(undefined) // BEGIN READ ONLY
      .mockResolvedValueOnce(undefined) // statement_timeout
      .mockResolvedValueOnce(undefined) // search_path
      .mockResolvedValueOnce({ rows, fields: [{ name: 'id' }, { name: 'display_name' }] })
      .mockResolvedValueOnce(undefined); // COMMIT

    const executor = createGuardedExecutor(initPool(settings));
    const result = await executor.execute(SQL, OPTIONS);

    expect(result.columns).toEqual(['id', 'display_name']);
    expect(result.rows).toEqual(rows);
    expect(result.rowCount).toBe(1);
    expect(result.elapsedMs).toBeGreaterThanOrEqual(0);

    expect(mockClient.query.mock.calls).toEqual([
      ['BEGIN READ ONLY'],
      ['SELECT set_config($1, $2, true)', ['statement_timeout', '8000ms']],
      ['SELECT set_config($1, $2, true)', ['search_path', 'odoo_replica']],
      [SQL, []],
      ['COMMIT'],
    ]);
    expect(mockClient.release).toHaveBeenCalledOnce();
    expect(outstanding.count).toBe(0);
  });

  it('should pass bind parameters to the statement', async () => {
    mockClient.query
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce({ rows: [], fields: [] })
      .mockResolvedValueOnce(undefined);

    const executor = createGuardedExecutor(initPool(settings));
    const sql = 'SELECT id FROM odoo_replica.stg_res_partner WHERE company_id = $1 LIMIT 200;';
    const result = await executor.execute(sql, { ...OPTIONS, params: [5] });

    expect(mockClient.query).toHaveBeenCalledWith(sql, [5]);
    expect(result).toMatchObject({ columns: [], rows: [], rowCount: 0 });
  });

  it('should map a cancelled statement to ExecutionTimeoutError and release the connection', async () => {
    mockClient.query
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(pgError('canceling statement due to statement timeout', '57014'))
      .mockResolvedValueOnce(undefined); // ROLLBACK

    const executor = createGuardedExecutor(initPool(settings));
    const error = await executor.execute(SQL, OPTIONS).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExecutionTimeoutError);
    expect(error).toMatchObject({
      code: 'EXECUTION_TIMEOUT',
      httpStatus: 504,
      message: 'Query exceeded the 8000 ms statement timeout',
    });
    expect(mockClient.query).toHaveBeenLastCalledWith('ROLLBACK');
    expect(mockClient.release).toHaveBeenCalledWith(undefined);
    expect(outstanding.count).toBe(0);
  });

  it('should map other failures to ExecutionFailedError and log them', async () => {
    mockClient.query
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(pgError('relation "stg_res_partner" does not exist', '42P01'))
      .mockResolvedValueOnce(undefined);

    const executor = createGuardedExecutor(initPool(settings));

    await expect(executor.execute(SQL, OPTIONS)).rejects.toThrow(ExecutionFailedError);
    expect(console.error).toHaveBeenCalledWith(
      '[executor] Validated statement failed:',
      'relation "stg_res_partner" does not exist',
    );
    expect(outstanding.count).toBe(0);
  });

  it('should discard the connection when ROLLBACK itself fails', async () => {
    const rollbackError = new Error('connection terminated');
    mockClient.query
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(pgError('division by zero', '22012'))
      .mockRejectedValueOnce(rollbackError);

    const executor = createGuardedExecutor(initPool(settings));

    await expect(executor.execute(SQL, OPTIONS)).rejects.toThrow('Query execution failed: division by zero');
    expect(mockClient.release).toHaveBeenCalledWith(rollbackError);
    expect(outstanding.count).toBe(0);
  });

  it('should fail without releasing when no connection can be acquired', async () => {
    mockPool.connect.mockRejectedValueOnce(new Error('timeout exceeded when trying to connect'));

    const executor = createGuardedExecutor(initPool(settings));

    await expect(executor.execute(SQL, OPTIONS)).rejects.toThrow(
      'Could not acquire a database connection: timeout exceeded when trying to connect',
    );
    expect(mockClient.release).not.toHaveBeenCalled();
    expect(mockClient.query).not.toHaveBeenCalled();
  });
});

describe('fetchColumnTypes', () => {
  it('should group live column types by table', async () => {
    mockClient.query
      .mockResolvedValueOnce(undefined) // BEGIN READ ONLY
      .mockResolvedValueOnce(undefined) // statement_timeout
      .mockResolvedValueOnce({
        rows: [
          { table_name: 'stg_res_partner', column_name: 'id', data_type: 'bigint' },
          { table_name: 'stg_res_partner', column_name: 'email', data_type: 'character varying' },
          { table_name: 'stg_res_company', column_name: 'id', data_type: 'integer' },
        ],
      })
      .mockResolvedValueOnce(undefined); // COMMIT

    const types = await fetchColumnTypes('odoo_replica', 8_000, initPool(settings));

    expect(types.get('stg_res_partner')?.get('email')).toBe('character varying');
    expect(types.get('stg_res_company')?.get('id')).toBe('integer');
    expect(types.size).toBe(2);
  });

  it('should bound the introspection query with a statement timeout', async () => {
    mockClient.query
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce(undefined);

    await fetchColumnTypes('odoo_replica', 2_500, initPool(settings));

    expect(mockClient.query.mock.calls).toEqual([
      ['BEGIN READ ONLY'],
      ['SELECT set_config($1, $2, true)', ['statement_timeout', '2500ms']],
      [expect.stringContaining('information_schema.columns'), ['odoo_replica']],
      ['COMMIT'],
    ]);
    expect(mockPool.query).not.toHaveBeenCalled();
    expect(outstanding.count).toBe(0);
  });

  it('should roll back and release when the introspection times out', async () => {
    mockClient.query
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(pgError('canceling statement due to statement timeout', '57014'))
      .mockResolvedValueOnce(undefined); // ROLLBACK

    await expect(fetchColumnTypes('odoo_replica', 2_500, initPool(settings))).rejects.toThrow(
      'canceling statement due to statement timeout',
    );
    expect(mockClient.query).toHaveBeenLastCalledWith('ROLLBACK');
    expect(outstanding.count).toBe(0);
  });
});

describe('healthCheck', () => {
  it('should return true when SELECT 1 succeeds', async () => {
    mockPool.query.mockResolvedValueOnce({ rows: [{ '?column?': 1 }] });
    expect(await healthCheck(initPool(settings))).toBe(true);
    expect(mockPool.query).toHaveBeenCalledWith('SELECT 1');
  });

  it('should return false when the query fails', async () => {
    mockPool.query.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    expect(await healthCheck(initPool(settings))).toBe(false);
  });
});
