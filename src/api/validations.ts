/**
 * Validation API routes.
 *
 * POST /validations             start a validation process
 * GET  /validations/:processId  get process status
 */

import { Router } from 'express';
import { requestSchemaError } from '../domain/errors';
import { toStatusView, toSubmittedView } from '../domain/process';
import { Orchestrator } from '../engine/orchestrator';
import { handle, sendError } from './middleware';

export function createValidationRoutes(orchestrator: Orchestrator): Router {
  const router = Router();

  /**
   * POST /validations
   * Body: { subjectId: string }. Responds 201 with the pending process.
   */
  router.post('/validations', handle(async (req, res) => {
    const body: unknown = req.body;
    const subjectId = typeof body === 'object' && body !== null && 'subjectId' in body
      ? body.subjectId
      : undefined;

    if (typeof subjectId !== 'string') {
      sendError(res, requestSchemaError('Request body must include "subjectId" as a string', {
        field: 'subjectId',
      }));
      return;
    }

    const process = await orchestrator.submit(subjectId);
    res.status(201).json({ process: toSubmittedView(process) });
  }));

  /**
   * GET /validations/:processId
   * Point-in-time status read.
   */
  router.get('/validations/:processId', handle(async (req, res) => {
    const process = await orchestrator.getStatus(req.params.processId);
    res.json({ process: toStatusView(process) });
  }));

  return router;
}
