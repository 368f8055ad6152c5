/**
 * Execution engine. Runs validation processes in the background.
 *
 * Each enqueued process is claimed (pending -> in_progress) through the
 * store's compare-and-set, validated under a timeout, and resolved to a
 * terminal status. Claims that lose the race are abandoned, so at most
 * one worker executes a given process. Transient store failures are
 * retried with backoff; definitive validation outcomes are not.
 *
 * At most `maxConcurrency` executions run at once. Excess work waits in
 * a FIFO queue.
 *
 * Known limitation: a crash between the claim and the terminal write
 * leaves the process in_progress. Nothing here reconciles it.
 */

import {
  ErrorCode,
  TypedError,
  createTypedError,
  isProcessError,
  validationTimeoutError,
} from '../domain/errors';
import { ProcessStatus, ValidationProcess } from '../domain/process';
import { ValidationResult } from '../domain/subject';
import { ProcessEventPublisher } from '../data-plane/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { ProcessStore } from '../storage/store';
import { ValidationLogic } from '../validation/validation-logic';
import { BackoffStrategy, TimeoutError, computeBackoff, executeWithTimeout, sleep as defaultSleep } from './retry';

/** Engine configuration. */
export interface EngineConfig {
  /** Maximum number of executions running at once. */
  maxConcurrency: number;
  /** Budget for one validation attempt. */
  timeoutMs: number;
  /** Total attempts (including the first) for transient failures. */
  maxAttempts: number;
  backoffStrategy: BackoffStrategy;
  backoffBaseMs: number;
  /** Upper bound on a single backoff delay. */
  backoffMaxMs: number;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = {
  maxConcurrency: 4,
  timeoutMs: 30_000,
  maxAttempts: 3,
  backoffStrategy: 'exponential',
  backoffBaseMs: 500,
  backoffMaxMs: 30_000,
};

export const STATUS_MESSAGES = {
  inProgress: 'Validation process is in progress',
} as const;

export interface EngineDependencies {
  store: ProcessStore;
  logic: ValidationLogic;
  publisher?: ProcessEventPublisher;
  logger?: Logger;
  /** Delay function used between retries. */
  sleep?: (ms: number) => Promise<void>;
}

/** Snapshot of engine load. */
export interface EngineStats {
  active: number;
  queued: number;
}

interface QueuedTask {
  processId: string;
  subjectId: string;
}

/** Terminal status the engine will write for an execution. */
interface Resolution {
  status: ProcessStatus.Completed | ProcessStatus.Failed;
  message: string;
  errorDetail?: TypedError;
  result?: ValidationResult;
}

export class ExecutionEngine {
  private readonly config: EngineConfig;
  private readonly store: ProcessStore;
  private readonly logic: ValidationLogic;
  private readonly publisher?: ProcessEventPublisher;
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  private queue: QueuedTask[] = [];
  private active = 0;
  private stopped = false;
  private idleWaiters: Array<() => void> = [];

  constructor(deps: EngineDependencies, config?: Partial<EngineConfig>) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
    if (this.config.maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be at least 1, got ${this.config.maxConcurrency}`);
    }
    if (this.config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be at least 1, got ${this.config.maxAttempts}`);
    }
    this.store = deps.store;
    this.logic = deps.logic;
    this.publisher = deps.publisher;
    this.log = (deps.logger ?? rootLogger).child({ component: 'execution-engine' });
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /** Schedule a process for execution. Returns immediately. */
  enqueue(processId: string, subjectId: string): void {
    if (this.stopped) {
      this.log.warn('Engine stopped; process left pending', { processId, subjectId });
      return;
    }
    this.queue.push({ processId, subjectId });
    this.log.debug('Process enqueued', { processId, queued: this.queue.length, active: this.active });
    this.pump();
  }

  stats(): EngineStats {
    return { active: this.active, queued: this.queue.length };
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stop accepting work and wait for queued and running executions. */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.onIdle();
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0;
  }

  private pump(): void {
    while (this.active < this.config.maxConcurrency) {
      const task = this.queue.shift();
      if (!task) break;
      this.active++;
      void this.run(task)
        .catch((err: unknown) => {
          this.log.error('Unhandled execution error', {
            processId: task.processId,
            error: err instanceof Error ? err.message : String(err),
          });
        })
        .finally(() => {
          this.active--;
          this.pump();
          this.notifyIdle();
        });
    }
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private async run(task: QueuedTask): Promise<void> {
    const log = this.log.child({ processId: task.processId, subjectId: task.subjectId });

    const claimed = await this.claim(task, log);
    if (!claimed) return;
    await this.publish(claimed);

    const resolution = await this.execute(task, log);

    let resolved: ValidationProcess;
    try {
      resolved = await this.withStoreRetry(
        () => this.store.updateStatus(task.processId, resolution.status, {
          message: resolution.message,
          errorDetail: resolution.errorDetail,
          result: resolution.result,
        }),
        'resolve',
        log,
      );
    } catch (err) {
      if (isProcessError(err, ErrorCode.InvalidTransition)) {
        log.error('Contract violation: terminal write rejected for a claimed process', {
          target: resolution.status,
          error: err.message,
        });
      } else {
        log.error('Terminal write failed; process remains in_progress', {
          target: resolution.status,
          error: err instanceof Error ? err.message : String(err),
        });
      }
      return;
    }

    log.info('Validation process finished', { status: resolved.status });
    await this.publish(resolved);
  }

  /** pending -> in_progress. Returns null when this worker does not own the process. */
  private async claim(task: QueuedTask, log: Logger): Promise<ValidationProcess | null> {
    try {
      return await this.withStoreRetry(
        () => this.store.updateStatus(task.processId, ProcessStatus.InProgress, { message: STATUS_MESSAGES.inProgress }),
        'claim',
        log,
      );
    } catch (err) {
      if (isProcessError(err, ErrorCode.InvalidTransition)) {
        log.debug('Process already claimed or finished; abandoning');
      } else if (isProcessError(err, ErrorCode.ProcessNotFound)) {
        log.warn('Enqueued process does not exist; abandoning');
      } else {
        log.error('Claim failed; process left pending', {
          error: err instanceof Error ? err.message : String(err),
        });
      }
      return null;
    }
  }

  /** Run the validation logic with timeout and transient-failure retry. */
  private async execute(task: QueuedTask, log: Logger): Promise<Resolution> {
    const { maxAttempts, timeoutMs } = this.config;
    let lastError: TypedError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const outcome = await executeWithTimeout(() => this.logic.validate(task.subjectId), timeoutMs);
        if (outcome.ok) {
          return { status: ProcessStatus.Completed, message: outcome.message, result: outcome.result };
        }
        return this.failure({ ...outcome.error, processId: task.processId });
      } catch (err) {
        if (err instanceof TimeoutError) {
          log.warn('Validation timed out', { timeoutMs, attempt });
          return this.failure(validationTimeoutError(task.processId, timeoutMs));
        }
        if (!isProcessError(err)) {
          return this.failure(createTypedError({
            code: ErrorCode.ExecutionError,
            message: err instanceof Error ? err.message : 'Unknown validation error',
            processId: task.processId,
            subjectId: task.subjectId,
            details: { attempt },
          }));
        }
        if (!err.retryable) {
          return this.failure({ ...err.typedError, processId: task.processId });
        }

        lastError = err.typedError;
        if (attempt < maxAttempts) {
          const delayMs = this.backoff(attempt);
          log.warn('Transient failure during validation; retrying', {
            attempt,
            maxAttempts,
            delayMs,
            error: err.message,
          });
          await this.sleep(delayMs);
        }
      }
    }

    const exhausted = lastError ?? createTypedError({
      code: ErrorCode.ExecutionError,
      message: 'Validation did not run',
      processId: task.processId,
    });
    return this.failure({
      ...exhausted,
      processId: task.processId,
      retryable: false,
      details: { ...exhausted.details, attempts: maxAttempts },
    });
  }

  private failure(errorDetail: TypedError): Resolution {
    return {
      status: ProcessStatus.Failed,
      message: `Validation process failed: ${errorDetail.message}`,
      errorDetail,
    };
  }

  /** Retry a store write on STORE.UNAVAILABLE with the engine's backoff policy. */
  private async withStoreRetry<T>(fn: () => Promise<T>, operation: string, log: Logger): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (!isProcessError(err, ErrorCode.StoreUnavailable) || attempt >= this.config.maxAttempts) {
          throw err;
        }
        const delayMs = this.backoff(attempt);
        log.warn('Process store unavailable; retrying', { operation, attempt, delayMs });
        await this.sleep(delayMs);
      }
    }
  }

  private backoff(attempt: number): number {
    return computeBackoff(
      this.config.backoffStrategy,
      this.config.backoffBaseMs,
      attempt,
      this.config.backoffMaxMs,
    );
  }

  private async publish(process: ValidationProcess): Promise<void> {
    if (!this.publisher) return;
    try {
      await this.publisher.publishTransition(process);
    } catch (err) {
      this.log.warn('Event publication failed', {
        processId: process.processId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
