/**
 * Tests for the in-memory store.
 *
 * Covers compare-and-set transitions, id allocation and copy isolation:
 * mutating a returned record must never change what the store holds.
 */

import { ErrorCode, ProcessError, subjectNotFoundError } from '../../src/domain/errors';
import { ProcessStatus } from '../../src/domain/process';
import type { ValidationResult } from '../../src/domain/subject';
import { MemoryProcessStore, MemoryRecordStore, createMemoryStore } from '../../src/storage/memory-store';

const SUBJECT = '7c6b5a49-3827-4165-a4b3-c2d1e0f9a8b7';

const RESULT: ValidationResult = {
  subjectId: SUBJECT,
  email: 'subject@example.com',
  studentsCount: 2,
  verified: true,
  validatedAt: '2024-01-01T00:00:05.000Z',
};

describe('MemoryProcessStore', () => {
  let store: MemoryProcessStore;

  beforeEach(() => {
    store = new MemoryProcessStore();
  });

  it('creates pending processes with matching timestamps', async () => {
    const process = await store.create(SUBJECT);
    expect(process.status).toBe(ProcessStatus.Pending);
    expect(process.subjectId).toBe(SUBJECT);
    expect(process.message).toBe('');
    expect(process.updatedAt).toBe(process.createdAt);
    expect(process.processId).toMatch(/^proc_[0-9a-f-]{36}$/);
    await expect(store.fetch(process.processId)).resolves.toEqual(process);
  });

  it('issues a distinct id per process', async () => {
    const ids = new Set<string>();
    for (let i = 0; i < 20; i++) ids.add((await store.create(SUBJECT)).processId);
    expect(ids.size).toBe(20);
    expect(store.size()).toBe(20);
  });

  it('throws PROCESS.NOT_FOUND for unknown ids', async () => {
    await expect(store.fetch('proc_nope')).rejects.toMatchObject({ code: ErrorCode.ProcessNotFound });
    await expect(store.updateStatus('proc_nope', ProcessStatus.InProgress)).rejects.toMatchObject({
      code: ErrorCode.ProcessNotFound,
    });
  });

  it('applies a legal transition and keeps updatedAt at or after createdAt', async () => {
    const process = await store.create(SUBJECT);
    const claimed = await store.updateStatus(process.processId, ProcessStatus.InProgress, { message: 'working' });
    expect(claimed.status).toBe(ProcessStatus.InProgress);
    expect(claimed.message).toBe('working');
    expect(claimed.createdAt).toBe(process.createdAt);
    expect(claimed.updatedAt >= claimed.createdAt).toBe(true);
  });

  it('lets exactly one of two concurrent claims win', async () => {
    const process = await store.create(SUBJECT);
    const results = await Promise.allSettled([
      store.updateStatus(process.processId, ProcessStatus.InProgress),
      store.updateStatus(process.processId, ProcessStatus.InProgress),
    ]);

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(rejected?.reason).toBeInstanceOf(ProcessError);
    expect(rejected?.reason).toMatchObject({ code: ErrorCode.InvalidTransition });
  });

  it('rejects illegal transitions and leaves the record unchanged', async () => {
    const process = await store.create(SUBJECT);
    await expect(store.updateStatus(process.processId, ProcessStatus.Completed)).rejects.toMatchObject({
      code: ErrorCode.InvalidTransition,
    });
    await expect(store.fetch(process.processId)).resolves.toEqual(process);
  });

  it('never leaves a terminal status', async () => {
    const process = await store.create(SUBJECT);
    await store.updateStatus(process.processId, ProcessStatus.InProgress);
    await store.updateStatus(process.processId, ProcessStatus.Completed, { message: 'done' });

    await expect(store.updateStatus(process.processId, ProcessStatus.Failed)).rejects.toMatchObject({
      code: ErrorCode.InvalidTransition,
    });
    expect((await store.fetch(process.processId)).status).toBe(ProcessStatus.Completed);
  });

  it('stores errorDetail only on failed processes', async () => {
    const errorDetail = subjectNotFoundError(SUBJECT);
    const a = await store.create(SUBJECT);
    await store.updateStatus(a.processId, ProcessStatus.InProgress);
    const completed = await store.updateStatus(a.processId, ProcessStatus.Completed, { message: 'ok', errorDetail });
    expect(completed.errorDetail).toBeUndefined();

    const b = await store.create(SUBJECT);
    await store.updateStatus(b.processId, ProcessStatus.InProgress);
    const failed = await store.updateStatus(b.processId, ProcessStatus.Failed, { message: 'no', errorDetail });
    expect(failed.errorDetail).toEqual(errorDetail);
  });

  it('stores the result only on completed processes', async () => {
    const a = await store.create(SUBJECT);
    await store.updateStatus(a.processId, ProcessStatus.InProgress);
    await store.updateStatus(a.processId, ProcessStatus.Completed, { message: 'ok', result: RESULT });
    expect((await store.fetch(a.processId)).result).toEqual(RESULT);

    const b = await store.create(SUBJECT);
    await store.updateStatus(b.processId, ProcessStatus.InProgress);
    const failed = await store.updateStatus(b.processId, ProcessStatus.Failed, { message: 'no', result: RESULT });
    expect(failed.result).toBeUndefined();
  });

  it('keeps the previous message when an update omits it', async () => {
    const process = await store.create(SUBJECT);
    await store.updateStatus(process.processId, ProcessStatus.InProgress, { message: 'working' });
    const completed = await store.updateStatus(process.processId, ProcessStatus.Completed);
    expect(completed.message).toBe('working');
  });

  it('isolates returned records from stored state', async () => {
    const process = await store.create(SUBJECT);
    await store.updateStatus(process.processId, ProcessStatus.InProgress);
    const failed = await store.updateStatus(process.processId, ProcessStatus.Failed, {
      errorDetail: { ...subjectNotFoundError(SUBJECT), details: { attempts: 1 } },
    });

    failed.status = ProcessStatus.Pending;
    if (failed.errorDetail?.details) failed.errorDetail.details.attempts = 99;

    const stored = await store.fetch(process.processId);
    expect(stored.status).toBe(ProcessStatus.Failed);
    expect(stored.errorDetail?.details).toEqual({ attempts: 1 });
  });
});

describe('MemoryRecordStore', () => {
  it('looks up records case-insensitively', async () => {
    const records = new MemoryRecordStore([{ subjectId: SUBJECT.toUpperCase(), attributes: {} }]);
    await expect(records.exists(SUBJECT)).resolves.toBe(true);
    await expect(records.exists('00000000-0000-4000-8000-000000000000')).resolves.toBe(false);
  });

  it('copies records on put and fetch', async () => {
    const seed = { subjectId: SUBJECT, attributes: { tags: ['a'] } };
    const records = new MemoryRecordStore([seed]);
    seed.attributes.tags.push('b');

    const fetched = await records.fetch(SUBJECT);
    expect(fetched?.attributes).toEqual({ tags: ['a'] });
  });
});

describe('createMemoryStore', () => {
  it('seeds the record store and closes cleanly', async () => {
    const store = createMemoryStore([{ subjectId: SUBJECT, attributes: {} }]);
    await expect(store.records.exists(SUBJECT)).resolves.toBe(true);
    await expect(store.ping()).resolves.toBe(true);
    await expect(store.close()).resolves.toBeUndefined();
  });
});
