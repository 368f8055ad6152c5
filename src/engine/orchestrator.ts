/**
 * Orchestrator: the public entry point for validation processes.
 *
 * submit() checks the identifier's format, persists a pending process and
 * hands it to the execution engine without waiting on any validator or
 * record-store I/O. getStatus() is a point-in-time read.
 */

import { ProcessError } from '../domain/errors';
import { ValidationProcess } from '../domain/process';
import { ProcessEventPublisher } from '../data-plane/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { ProcessStore } from '../storage/store';
import { IdentifierValidator } from '../validation/identifier-validator';
import { ExecutionEngine } from './execution-engine';

export interface OrchestratorDependencies {
  store: ProcessStore;
  identifiers: IdentifierValidator;
  engine: ExecutionEngine;
  publisher?: ProcessEventPublisher;
  logger?: Logger;
}

export class Orchestrator {
  private readonly log: Logger;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.log = (deps.logger ?? rootLogger).child({ component: 'orchestrator' });
  }

  /**
   * Start validating a subject.
   *
   * @throws ProcessError SUBJECT.INVALID_FORMAT before any store is touched,
   *   or STORE.UNAVAILABLE when the process cannot be persisted.
   */
  async submit(subjectId: unknown): Promise<ValidationProcess> {
    const format = this.deps.identifiers.checkFormat(subjectId);
    if (!format.ok) {
      this.log.info('Rejected malformed subject identifier');
      throw new ProcessError(format.error);
    }

    const process = await this.deps.store.create(format.subjectId);
    this.log.info('Validation process created', { processId: process.processId, subjectId: process.subjectId });

    if (this.deps.publisher) {
      try {
        await this.deps.publisher.publishTransition(process);
      } catch (err) {
        this.log.warn('Event publication failed', {
          processId: process.processId,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    this.deps.engine.enqueue(process.processId, process.subjectId);
    return process;
  }

  /**
   * Current state of a process.
   *
   * @throws ProcessError PROCESS.NOT_FOUND for unknown ids.
   */
  async getStatus(processId: string): Promise<ValidationProcess> {
    return this.deps.store.fetch(processId);
  }
}
