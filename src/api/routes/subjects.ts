import { Router } from 'express';
import type { ClassificationService } from '../../services/ClassificationService.js';
import { asyncHandler, ValidationError } from '../middleware/errorHandler.js';
import { isRecord } from '../../utils/guards.js';

export interface SubjectRouteOptions {
  /**
   * Decisions run concurrently per batch request
   */
  batchConcurrency?: number;
  maxBatchSize?: number;
}

function requireLabel(body: unknown, field: 'material' | 'type'): string {
  const value = isRecord(body) ? body[field] : undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${field} must be a non-empty string`);
  }
  return value.trim();
}

function parseSubjectIds(body: unknown, maxBatchSize: number): string[] {
  const value = isRecord(body) ? body.subjectIds : undefined;
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError('subjectIds must be a non-empty array');
  }
  if (value.length > maxBatchSize) {
    throw new ValidationError(`At most ${maxBatchSize} subjects per request`);
  }
  return value.map((id: unknown, index: number) => {
    if (typeof id !== 'string' || id.trim() === '') {
      throw new ValidationError(`subjectIds[${index}] must be a non-empty string`);
    }
    return id.trim();
  });
}

function parseFlag(value: unknown): boolean {
  return value === true || value === 'true' || value === '1';
}

/**
 * Create subject routes: decisions, records, corrections and confirmations
 */
export function createSubjectRoutes(service: ClassificationService, options: SubjectRouteOptions = {}): Router {
  const router = Router();
  const batchConcurrency = options.batchConcurrency ?? 4;
  const maxBatchSize = options.maxBatchSize ?? 500;

  /**
   * POST /subjects/decisions - Decide several subjects
   */
  router.post('/decisions', asyncHandler(async (req, res) => {
    const subjectIds = parseSubjectIds(req.body, maxBatchSize);
    const forceRefresh = isRecord(req.body) && parseFlag(req.body.forceRefresh);

    const decisions = await service.decideMany(subjectIds, { forceRefresh, concurrency: batchConcurrency });

    res.json({ data: decisions });
  }));

  /**
   * GET /subjects/:id/decision - Decide one subject
   */
  router.get('/:id/decision', asyncHandler(async (req, res) => {
    const decision = await service.decide(req.params.id, { forceRefresh: parseFlag(req.query.refresh) });
    res.json({ data: decision });
  }));

  /**
   * GET /subjects/:id - Stored record
   */
  router.get('/:id', asyncHandler(async (req, res) => {
    const record = await service.getRecord(req.params.id);
    res.json({ data: record });
  }));

  /**
   * POST /subjects/:id/corrections - Record a human correction
   */
  router.post('/:id/corrections', asyncHandler(async (req, res) => {
    const material = requireLabel(req.body, 'material');
    const type = requireLabel(req.body, 'type');

    const outcome = await service.correct(req.params.id, material, type);

    res.status(201).json({ data: outcome });
  }));

  /**
   * POST /subjects/:id/confirmation - Accept the stored answer as correct
   */
  router.post('/:id/confirmation', asyncHandler(async (req, res) => {
    const outcome = await service.confirm(req.params.id);
    res.status(201).json({ data: outcome });
  }));

  return router;
}
