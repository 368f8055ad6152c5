/**
 * SQLite storage implementation.
 *
 * Durable backend on better-sqlite3. Status transitions are a single
 * conditional UPDATE guarded by the legal predecessor statuses, so the
 * transition check and the write cannot be separated by another writer.
 * Driver failures surface as STORE.UNAVAILABLE.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import {
  ProcessError,
  TypedError,
  invalidTransitionError,
  processNotFoundError,
  storeUnavailableError,
} from '../domain/errors';
import { ProcessStatus, StatusUpdate, ValidationProcess, nextTimestamp } from '../domain/process';
import { SubjectRecord, ValidationResult } from '../domain/subject';
import { legalPredecessors } from '../engine/state-machine';
import { logger } from '../logger';
import { newProcessId } from './memory-store';
import { ProcessStore, RecordStore, Store } from './store';

// ============================================================================
// Database Row Types (internal)
// ============================================================================

interface ProcessRow {
  readonly process_id: string;
  readonly subject_id: string;
  readonly status: string;
  readonly created_at: string;
  readonly updated_at: string;
  readonly message: string;
  readonly error_detail_json: string | null;
  readonly result_json: string | null;
}

interface SubjectRow {
  readonly subject_id: string;
  readonly email: string | null;
  readonly phone: string | null;
  readonly verified: number | null;
  readonly attributes_json: string;
}

/** Migration definition */
export interface Migration {
  readonly version: number;
  readonly name: string;
  readonly up: (db: Database.Database) => void;
}

const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'validation_processes',
    up: (db) => {
      db.exec(`
        CREATE TABLE validation_processes (
          process_id TEXT PRIMARY KEY,
          subject_id TEXT NOT NULL,
          status TEXT NOT NULL CHECK (status IN ('pending', 'in_progress', 'completed', 'failed')),
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL,
          message TEXT NOT NULL DEFAULT '',
          error_detail_json TEXT
        );
        CREATE INDEX idx_validation_processes_subject ON validation_processes (subject_id);
      `);
    },
  },
  {
    version: 2,
    name: 'subject_records',
    up: (db) => {
      db.exec(`
        CREATE TABLE subject_records (
          subject_id TEXT PRIMARY KEY,
          email TEXT,
          phone TEXT,
          verified INTEGER,
          attributes_json TEXT NOT NULL DEFAULT '{}'
        );
      `);
    },
  },
  {
    version: 3,
    name: 'validation_process_results',
    up: (db) => {
      db.exec('ALTER TABLE validation_processes ADD COLUMN result_json TEXT');
    },
  },
];

/** Open a database file (or ":memory:") and bring its schema up to date. */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  runMigrations(db);
  return db;
}

/** Apply pending migrations inside one transaction. */
export function runMigrations(db: Database.Database): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    );
  `);
  const row = db.prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations').get();
  const current = row?.version ?? 0;

  const apply = db.transaction(() => {
    for (const migration of MIGRATIONS) {
      if (migration.version > current) {
        migration.up(db);
        db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)').run(migration.version, migration.name);
      }
    }
  });
  apply();

  return MIGRATIONS.reduce((max, m) => Math.max(max, m.version), current);
}

function parseStatus(value: string): ProcessStatus {
  const status = Object.values(ProcessStatus).find((s) => s === value);
  if (!status) throw new Error(`Unknown process status in database: ${value}`);
  return status;
}

function parseErrorDetail(json: string | null): TypedError | undefined {
  if (json === null) return undefined;
  const parsed: TypedError = JSON.parse(json);
  return parsed;
}

function parseResult(json: string | null): ValidationResult | undefined {
  if (json === null) return undefined;
  const parsed: ValidationResult = JSON.parse(json);
  return parsed;
}

function rowToProcess(row: ProcessRow): ValidationProcess {
  const process: ValidationProcess = {
    processId: row.process_id,
    subjectId: row.subject_id,
    status: parseStatus(row.status),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    message: row.message,
  };
  const errorDetail = parseErrorDetail(row.error_detail_json);
  if (errorDetail) process.errorDetail = errorDetail;
  const result = parseResult(row.result_json);
  if (result) process.result = result;
  return process;
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Database.SqliteError && err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}

export class SqliteProcessStore implements ProcessStore {
  private readonly insertStmt: Database.Statement<[string, string, string, string, string]>;
  private readonly selectStmt: Database.Statement<[string], ProcessRow>;

  constructor(private readonly db: Database.Database) {
    this.insertStmt = db.prepare<[string, string, string, string, string]>(
      `INSERT INTO validation_processes (process_id, subject_id, status, created_at, updated_at, message)
       VALUES (?, ?, ?, ?, ?, '')`,
    );
    this.selectStmt = db.prepare<[string], ProcessRow>('SELECT * FROM validation_processes WHERE process_id = ?');
  }

  async create(subjectId: string): Promise<ValidationProcess> {
    const now = new Date().toISOString();
    try {
      for (;;) {
        const processId = newProcessId();
        try {
          this.insertStmt.run(processId, subjectId, ProcessStatus.Pending, now, now);
        } catch (err) {
          if (isUniqueViolation(err)) continue;
          throw err;
        }
        return {
          processId,
          subjectId,
          status: ProcessStatus.Pending,
          createdAt: now,
          updatedAt: now,
          message: '',
        };
      }
    } catch (err) {
      throw new ProcessError(storeUnavailableError('Process store', err));
    }
  }

  async fetch(processId: string): Promise<ValidationProcess> {
    return this.guard(() => {
      const row = this.selectStmt.get(processId);
      if (!row) throw new ProcessError(processNotFoundError(processId));
      return rowToProcess(row);
    });
  }

  async updateStatus(processId: string, status: ProcessStatus, update: StatusUpdate = {}): Promise<ValidationProcess> {
    const predecessors = legalPredecessors(status);
    const errorDetail = status === ProcessStatus.Failed && update.errorDetail
      ? JSON.stringify(update.errorDetail)
      : null;
    const resultJson = status === ProcessStatus.Completed && update.result
      ? JSON.stringify(update.result)
      : null;

    // One transaction: read the current row for the timestamp floor, then a
    // guarded UPDATE; better-sqlite3 runs it synchronously without yielding.
    return this.guard(() => this.db.transaction((): ValidationProcess => {
      const current = this.selectStmt.get(processId);
      if (!current) throw new ProcessError(processNotFoundError(processId));
      if (predecessors.length === 0) {
        throw new ProcessError(invalidTransitionError(processId, current.status, status));
      }

      const placeholders = predecessors.map(() => '?').join(', ');
      const result = this.db
        .prepare(
          `UPDATE validation_processes
           SET status = ?, updated_at = ?, message = COALESCE(?, message), error_detail_json = ?, result_json = ?
           WHERE process_id = ? AND status IN (${placeholders})`,
        )
        .run(
          status,
          nextTimestamp(current.updated_at),
          update.message ?? null,
          errorDetail,
          resultJson,
          processId,
          ...predecessors,
        );

      if (result.changes === 0) {
        throw new ProcessError(invalidTransitionError(processId, current.status, status));
      }
      const updated = this.selectStmt.get(processId);
      if (!updated) throw new ProcessError(processNotFoundError(processId));
      return rowToProcess(updated);
    })());
  }

  /** Run a driver call, mapping driver failures to STORE.UNAVAILABLE. */
  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof ProcessError) throw err;
      throw new ProcessError(storeUnavailableError('Process store', err));
    }
  }
}

export class SqliteRecordStore implements RecordStore {
  private readonly selectStmt: Database.Statement<[string], SubjectRow>;

  constructor(private readonly db: Database.Database) {
    this.selectStmt = db.prepare<[string], SubjectRow>('SELECT * FROM subject_records WHERE subject_id = ?');
  }

  /** Insert or replace a subject record. */
  put(record: SubjectRecord): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO subject_records (subject_id, email, phone, verified, attributes_json)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(
        record.subjectId.toLowerCase(),
        record.email ?? null,
        record.phone ?? null,
        record.verified === undefined ? null : Number(record.verified),
        JSON.stringify(record.attributes),
      );
  }

  async exists(subjectId: string): Promise<boolean> {
    return (await this.fetch(subjectId)) !== null;
  }

  async fetch(subjectId: string): Promise<SubjectRecord | null> {
    try {
      const row = this.selectStmt.get(subjectId.toLowerCase());
      if (!row) return null;

      const attributes: Record<string, unknown> = JSON.parse(row.attributes_json);
      const record: SubjectRecord = { subjectId: row.subject_id, attributes };
      if (row.email !== null) record.email = row.email;
      if (row.phone !== null) record.phone = row.phone;
      if (row.verified !== null) record.verified = row.verified === 1;
      return record;
    } catch (err) {
      throw new ProcessError(storeUnavailableError('Record store', err));
    }
  }
}

/** Create a SQLite-backed store. Pass ":memory:" for a throwaway database. */
export function createSqliteStore(dbPath: string): Store & {
  processes: SqliteProcessStore;
  records: SqliteRecordStore;
} {
  const db = openDatabase(dbPath);
  const ping = db.prepare<[], { ok: number }>('SELECT 1 AS ok');
  return {
    processes: new SqliteProcessStore(db),
    records: new SqliteRecordStore(db),
    async ping() {
      try {
        return ping.get()?.ok === 1;
      } catch (err) {
        logger.warn('Database ping failed', { error: err instanceof Error ? err.message : String(err) });
        return false;
      }
    },
    async close() {
      db.close();
    },
  };
}
