import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

interface Migration {
  version: number;
  sql: string;
}

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private db: Database.Database | null = null;

  private readonly MIGRATIONS: Migration[] = [
    { version: 1, sql: `ALTER TABLE agent_runs ADD COLUMN metadata TEXT` },
    {
      version: 2,
      sql: `ALTER TABLE evaluation_scores ADD COLUMN source TEXT NOT NULL DEFAULT 'judge'`
    }
  ];

  public constructor(private readonly configService: ConfigService) {}

  public onModuleInit(): void {
    // NOTE: the default path is relative to CWD. Set AGENT_DB_PATH explicitly outside local runs.
    const dbPath = this.configService.get<string>(
      'AGENT_DB_PATH',
      './data/agent.db'
    );

    mkdirSync(dirname(dbPath), { recursive: true });

    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
    db.pragma('foreign_keys = ON');

    this._createTables(db);
    this._runMigrations(db);
    this._createIndexes(db);

    this.db = db;
    this.logger.log(`SQLite connected: ${dbPath}`);
  }

  public onModuleDestroy(): void {
    this.db?.close();
  }

  public getDb(): Database.Database {
    if (!this.db) {
      throw new Error('Database accessed before onModuleInit()');
    }
    return this.db;
  }

  private _createTables(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS agent_runs (
        id                TEXT PRIMARY KEY,
        thread_id         TEXT NOT NULL,
        user_id           TEXT NOT NULL,
        input             TEXT NOT NULL,
        output            TEXT NOT NULL,
        status            TEXT NOT NULL,
        latency_ms        INTEGER NOT NULL,
        trace_id          TEXT,
        prompt_tokens     INTEGER,
        completion_tokens INTEGER,
        truncated         INTEGER NOT NULL DEFAULT 0,
        created_at        TEXT NOT NULL
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS evaluation_scores (
        id          TEXT PRIMARY KEY,
        run_id      TEXT NOT NULL,
        metric_name TEXT NOT NULL,
        score       REAL NOT NULL,
        metadata    TEXT,
        created_at  TEXT NOT NULL,
        UNIQUE (run_id, metric_name),
        FOREIGN KEY (run_id) REFERENCES agent_runs(id) ON DELETE CASCADE
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS traces (
        id         TEXT PRIMARY KEY,
        name       TEXT NOT NULL,
        user_id    TEXT NOT NULL,
        metadata   TEXT,
        started_at TEXT NOT NULL,
        ended_at   TEXT NOT NULL
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS spans (
        id             TEXT PRIMARY KEY,
        trace_id       TEXT NOT NULL,
        parent_span_id TEXT,
        name           TEXT NOT NULL,
        started_at     TEXT NOT NULL,
        ended_at       TEXT NOT NULL,
        duration_ms    INTEGER NOT NULL,
        status         TEXT NOT NULL,
        attributes     TEXT,
        error          TEXT,
        FOREIGN KEY (trace_id) REFERENCES traces(id) ON DELETE CASCADE
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version    INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL
      )
    `);
  }

  private _runMigrations(db: Database.Database): void {
    const maxRow = db
      .prepare<unknown[], { v: number | null }>(
        'SELECT MAX(version) as v FROM schema_version'
      )
      .get();
    const currentVersion = maxRow?.v ?? 0;

    for (const migration of this.MIGRATIONS) {
      if (migration.version <= currentVersion) continue;
      try {
        db.exec(migration.sql);
      } catch (e: unknown) {
        // Pre-version-table databases may already have the column
        const msg = e instanceof Error ? e.message : '';
        if (!msg.includes('duplicate column name')) throw e;
      }
      db.prepare(
        'INSERT INTO schema_version (version, applied_at) VALUES (?, ?)'
      ).run(migration.version, new Date().toISOString());
    }
  }

  private _createIndexes(db: Database.Database): void {
    db.exec(
      `CREATE INDEX IF NOT EXISTS idx_agent_runs_user_created ON agent_runs(user_id, created_at)`
    );
    db.exec(
      `CREATE INDEX IF NOT EXISTS idx_agent_runs_created_at ON agent_runs(created_at)`
    );
    db.exec(
      `CREATE INDEX IF NOT EXISTS idx_agent_runs_thread_id ON agent_runs(thread_id)`
    );
    db.exec(
      `CREATE INDEX IF NOT EXISTS idx_evaluation_scores_run_id ON evaluation_scores(run_id)`
    );
    db.exec(`CREATE INDEX IF NOT EXISTS idx_spans_trace_id ON spans(trace_id)`);
  }
}
