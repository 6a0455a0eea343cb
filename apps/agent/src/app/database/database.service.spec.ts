import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { DatabaseService } from './database.service';

describe('DatabaseService', () => {
  let tmpDir: string;
  let dbPath: string;
  let configService: ConfigService;

  const tableNames = (db: Database.Database): string[] =>
    db
      .prepare<unknown[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name"
      )
      .all()
      .map((row) => row.name);

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'agent-db-test-'));
    dbPath = join(tmpDir, 'nested', 'agent.db');
    configService = {
      get: jest.fn().mockReturnValue(dbPath)
    } as unknown as ConfigService;
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates the database directory and every table on init', () => {
    const service = new DatabaseService(configService);
    service.onModuleInit();

    expect(tableNames(service.getDb())).toEqual([
      'agent_runs',
      'evaluation_scores',
      'schema_version',
      'spans',
      'traces'
    ]);

    service.onModuleDestroy();
  });

  it('records applied migrations and adds their columns', () => {
    const service = new DatabaseService(configService);
    service.onModuleInit();
    const db = service.getDb();

    const versions = db
      .prepare<unknown[], { version: number }>(
        'SELECT version FROM schema_version ORDER BY version'
      )
      .all()
      .map((row) => row.version);
    const runColumns = db
      .prepare<unknown[], { name: string }>("PRAGMA table_info('agent_runs')")
      .all()
      .map((c) => c.name);

    expect(versions).toEqual([1, 2]);
    expect(runColumns).toContain('metadata');

    service.onModuleDestroy();
  });

  it('re-initialises an existing database without re-applying migrations', () => {
    const first = new DatabaseService(configService);
    first.onModuleInit();
    first.onModuleDestroy();

    const second = new DatabaseService(configService);
    expect(() => second.onModuleInit()).not.toThrow();
    const count = second
      .getDb()
      .prepare<unknown[], { n: number }>(
        'SELECT COUNT(*) as n FROM schema_version'
      )
      .get();
    expect(count?.n).toBe(2);

    second.onModuleDestroy();
  });

  it('swallows duplicate-column errors from databases that predate schema_version', () => {
    const service = new DatabaseService(configService);
    service.onModuleInit();
    service.getDb().exec('DELETE FROM schema_version');
    service.onModuleDestroy();

    const again = new DatabaseService(configService);
    expect(() => again.onModuleInit()).not.toThrow();
    again.onModuleDestroy();
  });

  it('enforces one score per (run, metric)', () => {
    const service = new DatabaseService(configService);
    service.onModuleInit();
    const db = service.getDb();
    db.prepare(
      `INSERT INTO agent_runs (id, thread_id, user_id, input, output, status, latency_ms, created_at)
       VALUES ('r1', 't1', 'u1', 'in', 'out', 'success', 10, '2025-01-01T00:00:00.000Z')`
    ).run();
    const insert = db.prepare(
      `INSERT INTO evaluation_scores (id, run_id, metric_name, score, created_at)
       VALUES (?, 'r1', 'correctness', 0.5, '2025-01-01T00:00:00.000Z')`
    );
    insert.run('s1');

    expect(() => insert.run('s2')).toThrow(/UNIQUE constraint failed/);

    service.onModuleDestroy();
  });

  it('closes db on destroy', () => {
    const service = new DatabaseService(configService);
    service.onModuleInit();
    const db = service.getDb();
    service.onModuleDestroy();
    expect(() => db.prepare('SELECT 1').get()).toThrow();
  });

  it('getDb() throws before onModuleInit()', () => {
    const service = new DatabaseService(configService);
    expect(() => service.getDb()).toThrow(
      'Database accessed before onModuleInit()'
    );
  });

  it('onModuleDestroy is safe before onModuleInit', () => {
    const service = new DatabaseService(configService);
    expect(() => service.onModuleDestroy()).not.toThrow();
  });
});
