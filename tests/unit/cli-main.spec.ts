jest.mock('../../src/cli/worker', () => ({
  runWorker: jest.fn().mockResolvedValue(undefined),
}));
jest.mock('../../src/cli/generate-migration', () => ({
  ...jest.requireActual('../../src/cli/generate-migration'),
  writeMigration: jest.fn(
    (tableName: string) => `db/migrations/20250101000000_create_${tableName}.sql`,
  ),
}));

import { main } from '../../src/cli/main';
import { writeMigration } from '../../src/cli/generate-migration';
import { runWorker } from '../../src/cli/worker';

describe('main', () => {
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation();
    error = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    jest.clearAllMocks();
  });

  it('should print usage and fail without a command', async () => {
    expect(await main([])).toBe(1);
    expect(log.mock.calls[0][0]).toContain('Usage: event-workflows <command>');
  });

  it('should print usage and succeed for --help', async () => {
    expect(await main(['--help'])).toBe(0);
  });

  it('should reject an unknown command', async () => {
    expect(await main(['frobnicate'])).toBe(1);
    expect(error).toHaveBeenCalledWith('Unknown command: frobnicate');
  });

  it('should require a table name for migrations', async () => {
    expect(await main(['generate-migration'])).toBe(1);
    expect(error).toHaveBeenCalledWith('Error: tableName argument is required.');
    expect(writeMigration).not.toHaveBeenCalled();
  });

  it('should write an instance table migration', async () => {
    expect(await main(['generate-migration', 'workflow_instances'])).toBe(0);

    const [tableName, sql] = jest.mocked(writeMigration).mock.calls[0];
    expect(tableName).toBe('workflow_instances');
    expect(sql).toContain('CREATE TABLE workflow_instances_history (');
    expect(log).toHaveBeenCalledWith(
      'Migration created: db/migrations/20250101000000_create_workflow_instances.sql',
    );
  });

  it('should write a definitions table migration', async () => {
    expect(await main(['generate-definitions-migration', 'workflow_definitions'])).toBe(0);

    const [, sql] = jest.mocked(writeMigration).mock.calls[0];
    expect(sql).toContain('definition JSONB NOT NULL');
  });

  describe('worker', () => {
    const saved = process.env.DATABASE_URL;

    afterEach(() => {
      if (saved === undefined) {
        delete process.env.DATABASE_URL;
      } else {
        process.env.DATABASE_URL = saved;
      }
    });

    it('should run the worker with settings from the environment', async () => {
      process.env.DATABASE_URL = 'postgres://localhost:5432/workflows_test';

      expect(await main(['worker'])).toBe(0);

      expect(runWorker).toHaveBeenCalledWith(
        expect.objectContaining({ databaseUrl: 'postgres://localhost:5432/workflows_test' }),
      );
    });
  });
});
