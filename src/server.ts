/**
 * Express server configuration.
 *
 * Assembles stores, validation logic, the execution engine and the
 * orchestrator from configuration, and mounts the API surface.
 */

import express from 'express';
import { AppConfig, DEFAULT_CONFIG } from './config';
import { ProcessEventPublisher } from './data-plane/publisher';
import { ExecutionEngine } from './engine/execution-engine';
import { Orchestrator } from './engine/orchestrator';
import { WebhookNotifier, WebhookDeliveryFn } from './notifications/webhook';
import { createMemoryStore } from './storage/memory-store';
import { loadSubjectRecords } from './storage/record-seed';
import { createSqliteStore } from './storage/sqlite-store';
import { Store } from './storage/store';
import { IdentifierValidator } from './validation/identifier-validator';
import { ValidationLogic, createValidationLogic } from './validation/validation-logic';
import { errorHandler, handle, requestLogger } from './api/middleware';
import { createValidationRoutes } from './api/validations';
import { logger } from './logger';

export const SERVICE_VERSION = '0.1.0';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: AppConfig;
  store: Store;
  publisher: ProcessEventPublisher;
  logic: ValidationLogic;
  engine: ExecutionEngine;
  orchestrator: Orchestrator;
  webhook?: WebhookNotifier;
}

export interface AppContextOverrides {
  store?: Store;
  logic?: ValidationLogic;
  webhookDelivery?: WebhookDeliveryFn;
}

function createStore(config: AppConfig): Store {
  if (config.storage === 'sqlite') {
    return createSqliteStore(config.sqlitePath);
  }
  const records = config.recordsFile ? loadSubjectRecords(config.recordsFile) : [];
  return createMemoryStore(records);
}

/** Create the application context with all services. */
export function createAppContext(
  config: AppConfig = DEFAULT_CONFIG,
  overrides: AppContextOverrides = {},
): AppContext {
  const store = overrides.store ?? createStore(config);
  const publisher = new ProcessEventPublisher();
  const identifiers = new IdentifierValidator(store.records);
  const logic = overrides.logic ?? createValidationLogic(config.validationMode, {
    identifiers,
    requiredFields: config.requiredFields,
  });
  const engine = new ExecutionEngine({ store: store.processes, logic, publisher }, config.engine);
  const orchestrator = new Orchestrator({ store: store.processes, identifiers, engine, publisher });

  const ctx: AppContext = { config, store, publisher, logic, engine, orchestrator };

  if (config.webhook) {
    ctx.webhook = new WebhookNotifier(config.webhook, overrides.webhookDelivery);
    ctx.webhook.attach(publisher);
  }

  return ctx;
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '100kb' }));
  app.use(requestLogger());

  app.get('/health', handle(async (_req, res) => {
    const connected = await ctx.store.ping();
    res.json({
      status: connected ? 'ok' : 'degraded',
      database: connected ? 'connected' : 'error',
      version: SERVICE_VERSION,
      uptimeMs: Date.now() - startTime,
      storage: ctx.config.storage,
      validationMode: ctx.logic.name,
      engine: ctx.engine.stats(),
    });
  }));

  app.use('/api/v1', createValidationRoutes(ctx.orchestrator));

  app.use(errorHandler);

  return app;
}

/** Stop background work, let pending notifications finish, release the store. */
export async function shutdown(ctx: AppContext): Promise<void> {
  logger.info('Shutting down', { ...ctx.engine.stats(), pendingDeliveries: ctx.publisher.pendingDeliveries() });
  await ctx.engine.stop();
  await ctx.publisher.drain();
  await ctx.store.close();
}
