import Database from 'better-sqlite3';
import { ErrorCode, ProcessError, subjectNotFoundError } from '../../src/domain/errors';
import { ProcessStatus } from '../../src/domain/process';
import type { ValidationResult } from '../../src/domain/subject';
import {
  SqliteProcessStore,
  SqliteRecordStore,
  createSqliteStore,
  openDatabase,
  runMigrations,
} from '../../src/storage/sqlite-store';

const SUBJECT = '2a3b4c5d-6e7f-4081-9293-a4b5c6d7e8f9';

const RESULT: ValidationResult = {
  subjectId: SUBJECT,
  email: 'subject@example.com',
  phone: '+15550123',
  studentsCount: 1,
  verified: false,
  validatedAt: '2024-01-01T00:00:05.000Z',
};

describe('SQLite store', () => {
  let db: Database.Database;
  let processes: SqliteProcessStore;
  let records: SqliteRecordStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    processes = new SqliteProcessStore(db);
    records = new SqliteRecordStore(db);
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  describe('migrations', () => {
    it('records applied versions and is idempotent', () => {
      expect(runMigrations(db)).toBe(3);
      const rows = db.prepare<[], { version: number }>('SELECT version FROM schema_migrations ORDER BY version').all();
      expect(rows.map((r) => r.version)).toEqual([1, 2, 3]);
    });

    it('upgrades a database created before results were stored', () => {
      const legacy = new Database(':memory:');
      try {
        legacy.exec(`
          CREATE TABLE schema_migrations (version INTEGER PRIMARY KEY, name TEXT NOT NULL, applied_at TEXT);
          CREATE TABLE validation_processes (
            process_id TEXT PRIMARY KEY, subject_id TEXT NOT NULL, status TEXT NOT NULL,
            created_at TEXT NOT NULL, updated_at TEXT NOT NULL, message TEXT NOT NULL DEFAULT '',
            error_detail_json TEXT
          );
          CREATE TABLE subject_records (
            subject_id TEXT PRIMARY KEY, email TEXT, phone TEXT, verified INTEGER,
            attributes_json TEXT NOT NULL DEFAULT '{}'
          );
          INSERT INTO schema_migrations (version, name) VALUES (1, 'validation_processes'), (2, 'subject_records');
        `);

        expect(runMigrations(legacy)).toBe(3);
        const columns = legacy.prepare<[], { name: string }>('PRAGMA table_info(validation_processes)').all();
        expect(columns.map((c) => c.name)).toContain('result_json');
      } finally {
        legacy.close();
      }
    });
  });

  describe('SqliteProcessStore', () => {
    it('creates and fetches a pending process', async () => {
      const process = await processes.create(SUBJECT);
      expect(process.status).toBe(ProcessStatus.Pending);
      expect(process.message).toBe('');
      expect(process.updatedAt).toBe(process.createdAt);
      await expect(processes.fetch(process.processId)).resolves.toEqual(process);
    });

    it('throws PROCESS.NOT_FOUND for unknown ids', async () => {
      await expect(processes.fetch('proc_missing')).rejects.toMatchObject({ code: ErrorCode.ProcessNotFound });
      await expect(processes.updateStatus('proc_missing', ProcessStatus.InProgress)).rejects.toMatchObject({
        code: ErrorCode.ProcessNotFound,
      });
    });

    it('walks the lifecycle and persists errorDetail on failure', async () => {
      const process = await processes.create(SUBJECT);
      const errorDetail = subjectNotFoundError(SUBJECT);

      const claimed = await processes.updateStatus(process.processId, ProcessStatus.InProgress, { message: 'working' });
      expect(claimed.status).toBe(ProcessStatus.InProgress);
      expect(claimed.message).toBe('working');

      const failed = await processes.updateStatus(process.processId, ProcessStatus.Failed, {
        message: 'Validation process failed',
        errorDetail,
      });
      expect(failed.status).toBe(ProcessStatus.Failed);
      expect(failed.errorDetail).toEqual(errorDetail);
      expect(failed.updatedAt >= failed.createdAt).toBe(true);
      await expect(processes.fetch(process.processId)).resolves.toEqual(failed);
    });

    it('does not store errorDetail on completed processes', async () => {
      const process = await processes.create(SUBJECT);
      await processes.updateStatus(process.processId, ProcessStatus.InProgress);
      const completed = await processes.updateStatus(process.processId, ProcessStatus.Completed, {
        errorDetail: subjectNotFoundError(SUBJECT),
      });
      expect(completed.errorDetail).toBeUndefined();
    });

    it('persists the result on completed processes only', async () => {
      const process = await processes.create(SUBJECT);
      await processes.updateStatus(process.processId, ProcessStatus.InProgress);
      const completed = await processes.updateStatus(process.processId, ProcessStatus.Completed, {
        message: 'done',
        result: RESULT,
      });
      expect(completed.result).toEqual(RESULT);
      await expect(processes.fetch(process.processId)).resolves.toEqual(completed);

      const other = await processes.create(SUBJECT);
      await processes.updateStatus(other.processId, ProcessStatus.InProgress);
      const failed = await processes.updateStatus(other.processId, ProcessStatus.Failed, { result: RESULT });
      expect(failed.result).toBeUndefined();
    });

    it('keeps the previous message when an update omits it', async () => {
      const process = await processes.create(SUBJECT);
      await processes.updateStatus(process.processId, ProcessStatus.InProgress, { message: 'working' });
      const completed = await processes.updateStatus(process.processId, ProcessStatus.Completed);
      expect(completed.message).toBe('working');
    });

    it('rejects a second claim of the same process', async () => {
      const process = await processes.create(SUBJECT);
      await processes.updateStatus(process.processId, ProcessStatus.InProgress);

      const err = await processes.updateStatus(process.processId, ProcessStatus.InProgress).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ProcessError);
      if (err instanceof ProcessError) {
        expect(err.code).toBe(ErrorCode.InvalidTransition);
        expect(err.typedError.details).toEqual({ from: 'in_progress', to: 'in_progress' });
      }
    });

    it('rejects transitions out of terminal statuses', async () => {
      const process = await processes.create(SUBJECT);
      await processes.updateStatus(process.processId, ProcessStatus.InProgress);
      await processes.updateStatus(process.processId, ProcessStatus.Completed);

      await expect(processes.updateStatus(process.processId, ProcessStatus.Failed)).rejects.toMatchObject({
        code: ErrorCode.InvalidTransition,
      });
      await expect(processes.updateStatus(process.processId, ProcessStatus.Pending)).rejects.toMatchObject({
        code: ErrorCode.InvalidTransition,
      });
      expect((await processes.fetch(process.processId)).status).toBe(ProcessStatus.Completed);
    });

    it('reports a corrupt row as STORE.UNAVAILABLE', async () => {
      const process = await processes.create(SUBJECT);
      db.prepare('UPDATE validation_processes SET result_json = ? WHERE process_id = ?').run('{not json', process.processId);

      await expect(processes.fetch(process.processId)).rejects.toMatchObject({
        code: ErrorCode.StoreUnavailable,
        message: expect.stringMatching(/^Process store unavailable/),
      });
    });

    it('maps driver failures to STORE.UNAVAILABLE', async () => {
      const process = await processes.create(SUBJECT);
      db.close();

      await expect(processes.fetch(process.processId)).rejects.toMatchObject({
        code: ErrorCode.StoreUnavailable,
        retryable: true,
      });
      await expect(processes.updateStatus(process.processId, ProcessStatus.InProgress)).rejects.toMatchObject({
        code: ErrorCode.StoreUnavailable,
      });
      await expect(processes.create(SUBJECT)).rejects.toMatchObject({ code: ErrorCode.StoreUnavailable });
    });
  });

  describe('SqliteRecordStore', () => {
    it('round-trips a subject record', async () => {
      records.put({
        subjectId: SUBJECT,
        email: 'subject@example.com',
        verified: true,
        attributes: { cohort: 'fall', siblings: 2 },
      });

      await expect(records.fetch(SUBJECT)).resolves.toEqual({
        subjectId: SUBJECT,
        email: 'subject@example.com',
        verified: true,
        attributes: { cohort: 'fall', siblings: 2 },
      });
    });

    it('matches identifiers case-insensitively', async () => {
      records.put({ subjectId: SUBJECT.toUpperCase(), attributes: {} });
      await expect(records.exists(SUBJECT)).resolves.toBe(true);
      await expect(records.exists('00000000-0000-4000-8000-000000000000')).resolves.toBe(false);
    });

    it('reports corrupt attributes as STORE.UNAVAILABLE', async () => {
      records.put({ subjectId: SUBJECT, attributes: {} });
      db.prepare('UPDATE subject_records SET attributes_json = ? WHERE subject_id = ?').run('[broken', SUBJECT);

      await expect(records.fetch(SUBJECT)).rejects.toMatchObject({
        code: ErrorCode.StoreUnavailable,
        message: expect.stringMatching(/^Record store unavailable/),
      });
    });

    it('maps driver failures to STORE.UNAVAILABLE', async () => {
      db.close();
      await expect(records.fetch(SUBJECT)).rejects.toMatchObject({
        code: ErrorCode.StoreUnavailable,
        message: expect.stringMatching(/^Record store unavailable/),
      });
    });
  });
});

describe('createSqliteStore', () => {
  it('opens an in-memory database and closes it', async () => {
    const store = createSqliteStore(':memory:');
    const process = await store.processes.create(SUBJECT);
    await expect(store.processes.fetch(process.processId)).resolves.toMatchObject({ status: ProcessStatus.Pending });
    await expect(store.ping()).resolves.toBe(true);
    await store.close();
    await expect(store.ping()).resolves.toBe(false);
    await expect(store.processes.fetch(process.processId)).rejects.toMatchObject({ code: ErrorCode.StoreUnavailable });
  });
});
