import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  generateDefinitionsMigration,
  generateMigration,
  writeMigration,
} from '../../src/cli/generate-migration';

describe('generateMigration', () => {
  const sql = generateMigration('workflow_instances');

  describe('instance table', () => {
    it('should create the instance table with correct columns', () => {
      expect(sql).toContain('CREATE TABLE workflow_instances (');
      expect(sql).toContain('id UUID PRIMARY KEY DEFAULT uuidv7()');
      expect(sql).toContain('workflow_id TEXT NOT NULL');
      expect(sql).toContain('event_id TEXT NOT NULL');
      expect(sql).toContain('current_step_id TEXT NOT NULL');
      expect(sql).toContain('status TEXT NOT NULL');
      expect(sql).toContain('context JSONB NOT NULL');
      expect(sql).toContain('failure JSONB,');
    });

    it('should allow one instance per workflow and event', () => {
      expect(sql).toContain(
        'CONSTRAINT uq_workflow_instances_workflow_event UNIQUE (workflow_id, event_id)',
      );
    });

    it('should index status and context', () => {
      expect(sql).toContain('CREATE INDEX idx_workflow_instances_status');
      expect(sql).toContain('ON workflow_instances (status)');
      expect(sql).toContain('CREATE INDEX idx_workflow_instances_context_gin');
      expect(sql).toContain('ON workflow_instances USING gin (context)');
    });
  });

  describe('history table', () => {
    it('should create the history table with FK to the instance table', () => {
      expect(sql).toContain('CREATE TABLE workflow_instances_history (');
      expect(sql).toContain(
        'instance_id UUID NOT NULL REFERENCES workflow_instances(id)',
      );
      expect(sql).toContain('from_step_id TEXT,');
      expect(sql).toContain('to_step_id TEXT NOT NULL');
      expect(sql).toContain(
        'recorded_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP',
      );
    });

    it('should index instance_id and recorded_at', () => {
      expect(sql).toContain('ON workflow_instances_history (instance_id)');
      expect(sql).toContain('ON workflow_instances_history (recorded_at)');
    });
  });

  describe('migrate:down', () => {
    it('should drop history table before the instance table', () => {
      const downIdx = sql.indexOf('-- migrate:down');
      const dropHistoryIdx = sql.indexOf(
        'DROP TABLE IF EXISTS workflow_instances_history;',
      );
      const dropLiveIdx = sql.indexOf('DROP TABLE IF EXISTS workflow_instances;');

      expect(downIdx).toBeGreaterThan(0);
      expect(dropHistoryIdx).toBeGreaterThan(downIdx);
      expect(dropLiveIdx).toBeGreaterThan(dropHistoryIdx);
    });
  });

  describe('table name validation', () => {
    it('should reject invalid table names', () => {
      expect(() => generateMigration('orders; DROP TABLE')).toThrow(
        'Invalid table name',
      );
      expect(() => generateDefinitionsMigration("defs' OR 1=1")).toThrow(
        'Invalid table name',
      );
    });
  });
});

describe('generateDefinitionsMigration', () => {
  const sql = generateDefinitionsMigration('workflow_definitions');

  it('should create the definitions table', () => {
    expect(sql).toContain('CREATE TABLE workflow_definitions (');
    expect(sql).toContain('id TEXT PRIMARY KEY');
    expect(sql).toContain('is_active BOOLEAN NOT NULL DEFAULT TRUE');
    expect(sql).toContain('definition JSONB NOT NULL');
    expect(sql).toContain('ON workflow_definitions (is_active)');
  });

  it('should drop the table on the way down', () => {
    expect(sql.endsWith('DROP TABLE IF EXISTS workflow_definitions;\n')).toBe(true);
  });
});

describe('writeMigration', () => {
  let tmpRoot: string;

  beforeEach(() => {
    tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'migrations-'));
  });

  afterEach(() => {
    fs.rmSync(tmpRoot, { recursive: true, force: true });
  });

  it('should write a timestamped file, creating the directory', () => {
    const dir = path.join(tmpRoot, 'db', 'migrations');

    const filePath = writeMigration(
      'workflow_instances',
      '-- migrate:up\n',
      dir,
      new Date('2025-03-04T05:06:07.000Z'),
    );

    expect(filePath).toBe(
      path.join(dir, '20250304050607_create_workflow_instances.sql'),
    );
    expect(fs.readFileSync(filePath, 'utf-8')).toBe('-- migrate:up\n');
  });
});
