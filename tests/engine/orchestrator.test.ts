import { ErrorCode, ProcessError } from '../../src/domain/errors';
import type { ProcessEventType } from '../../src/domain/events';
import { ProcessStatus } from '../../src/domain/process';
import { ProcessEventPublisher } from '../../src/data-plane/publisher';
import { EngineConfig, ExecutionEngine } from '../../src/engine/execution-engine';
import { Orchestrator } from '../../src/engine/orchestrator';
import { resetLogHandler, setLogHandler } from '../../src/logger';
import { MemoryProcessStore, MemoryRecordStore } from '../../src/storage/memory-store';
import type { RecordStore } from '../../src/storage/store';
import { IdentifierValidator } from '../../src/validation/identifier-validator';
import { ExistenceValidation } from '../../src/validation/validation-logic';

const PRESENT = '0c4f6a1e-8b2d-4c3a-9e5f-1a2b3c4d5e6f';
const ABSENT = '9d8c7b6a-5f4e-4d3c-8b2a-0f1e2d3c4b5a';

function build(records: RecordStore, engineConfig: Partial<EngineConfig> = {}) {
  const store = new MemoryProcessStore();
  const publisher = new ProcessEventPublisher();
  const identifiers = new IdentifierValidator(records);
  const engine = new ExecutionEngine(
    { store, logic: new ExistenceValidation(identifiers), publisher },
    engineConfig,
  );
  const orchestrator = new Orchestrator({ store, identifiers, engine, publisher });
  return { store, publisher, engine, orchestrator };
}

async function expectProcessError(promise: Promise<unknown>, code: ErrorCode): Promise<ProcessError> {
  try {
    await promise;
  } catch (err) {
    expect(err).toBeInstanceOf(ProcessError);
    if (err instanceof ProcessError) {
      expect(err.code).toBe(code);
      return err;
    }
  }
  throw new Error(`Expected ProcessError ${code}`);
}

describe('Orchestrator', () => {
  beforeEach(() => {
    setLogHandler(() => undefined);
  });

  afterEach(() => {
    resetLogHandler();
  });

  it('runs the full lifecycle for present, absent and malformed subjects', async () => {
    const records = new MemoryRecordStore([{ subjectId: PRESENT, email: 'subject@example.com', attributes: {} }]);
    const { store, engine, orchestrator } = build(records);

    const malformed = await expectProcessError(orchestrator.submit('not-a-uuid'), ErrorCode.InvalidFormat);
    expect(malformed.typedError.subjectId).toBe('not-a-uuid');
    expect(store.size()).toBe(0);

    const accepted = await orchestrator.submit(PRESENT);
    expect(accepted.status).toBe(ProcessStatus.Pending);
    expect(accepted.message).toBe('');
    expect(accepted.processId).toMatch(/^proc_/);

    const rejected = await orchestrator.submit(ABSENT);
    expect(rejected.status).toBe(ProcessStatus.Pending);
    expect(rejected.processId).not.toBe(accepted.processId);

    await engine.onIdle();

    const completed = await orchestrator.getStatus(accepted.processId);
    expect(completed.status).toBe(ProcessStatus.Completed);
    expect(completed.message).toBe(`Subject ${PRESENT} found in record store`);

    const failed = await orchestrator.getStatus(rejected.processId);
    expect(failed.status).toBe(ProcessStatus.Failed);
    expect(failed.errorDetail?.code).toBe(ErrorCode.SubjectNotFound);
    expect(failed.errorDetail?.message).toBe(`Subject not found: ${ABSENT}`);
  });

  it('rejects non-string identifiers without creating a process', async () => {
    const { store, orchestrator } = build(new MemoryRecordStore());

    await expectProcessError(orchestrator.submit(42), ErrorCode.InvalidFormat);
    await expectProcessError(orchestrator.submit(undefined), ErrorCode.InvalidFormat);
    expect(store.size()).toBe(0);
  });

  it('returns from submit without waiting on the record store', async () => {
    const hanging: RecordStore = {
      exists: () => new Promise<boolean>(() => undefined),
      fetch: async () => null,
    };
    const { engine, orchestrator } = build(hanging, { timeoutMs: 20 });

    const process = await orchestrator.submit(PRESENT);
    expect(process.status).toBe(ProcessStatus.Pending);

    await engine.onIdle();
    const result = await orchestrator.getStatus(process.processId);
    expect(result.status).toBe(ProcessStatus.Failed);
    expect(result.errorDetail?.code).toBe(ErrorCode.Timeout);
  });

  it('returns from submit while a created-event subscriber is still running', async () => {
    const records = new MemoryRecordStore([{ subjectId: PRESENT, attributes: {} }]);
    const { publisher, engine, orchestrator } = build(records);
    publisher.subscribe({
      id: 'sub_stalled',
      eventTypes: ['process.created'],
      callback: () => new Promise<void>(() => undefined),
    });

    const process = await orchestrator.submit(PRESENT);
    expect(process.status).toBe(ProcessStatus.Pending);
    expect(publisher.pendingDeliveries()).toBe(1);

    await engine.onIdle();
    expect((await orchestrator.getStatus(process.processId)).status).toBe(ProcessStatus.Completed);
  });

  it('reports unknown process ids as not found', async () => {
    const { orchestrator } = build(new MemoryRecordStore());
    const err = await expectProcessError(orchestrator.getStatus('proc_unknown'), ErrorCode.ProcessNotFound);
    expect(err.message).toBe('Validation process not found: proc_unknown');
  });

  it('allows concurrent processes for the same subject', async () => {
    const records = new MemoryRecordStore([{ subjectId: PRESENT, attributes: {} }]);
    const { engine, orchestrator } = build(records);

    const first = await orchestrator.submit(PRESENT);
    const second = await orchestrator.submit(PRESENT);
    await engine.onIdle();

    expect((await orchestrator.getStatus(first.processId)).status).toBe(ProcessStatus.Completed);
    expect((await orchestrator.getStatus(second.processId)).status).toBe(ProcessStatus.Completed);
  });

  it('publishes the full event sequence for a process', async () => {
    const records = new MemoryRecordStore([{ subjectId: PRESENT, attributes: {} }]);
    const { publisher, engine, orchestrator } = build(records);
    const seen: ProcessEventType[] = [];
    publisher.subscribe({ id: 'sub_test', callback: (event) => { seen.push(event.type); } });

    await orchestrator.submit(PRESENT);
    await engine.onIdle();

    expect(seen).toEqual(['process.created', 'process.started', 'process.completed']);
  });
});
