import { Router } from 'express';
import type { ClassificationService } from '../../services/ClassificationService.js';
import type { ConfusionAxis } from '../../calibration/types.js';
import { asyncHandler, ValidationError } from '../middleware/errorHandler.js';

function parseAxis(value: unknown): ConfusionAxis {
  if (value === undefined || value === 'material') return 'material';
  if (value === 'type') return 'type';
  throw new ValidationError('axis must be "material" or "type"');
}

function parseCount(value: unknown, fallback: number): number {
  if (value === undefined) return fallback;
  const n = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(n) || n < 0) {
    throw new ValidationError('n must be a non-negative integer');
  }
  return n;
}

/**
 * Create calibration routes
 */
export function createCalibrationRoutes(service: ClassificationService): Router {
  const router = Router();

  /**
   * GET /calibration - Bins, confusions, trend and prompt hints
   */
  router.get('/', asyncHandler(async (req, res) => {
    const limit = parseCount(req.query.n, 5);
    res.json({ data: await service.calibrationSummary(limit) });
  }));

  /**
   * GET /calibration/confusions?axis=material&n=5
   */
  router.get('/confusions', asyncHandler(async (req, res) => {
    const axis = parseAxis(req.query.axis);
    const n = parseCount(req.query.n, 5);
    res.json({ data: await service.topConfusions(axis, n) });
  }));

  router.get('/trend', asyncHandler(async (_req, res) => {
    res.json({ data: { trend: service.accuracyTrend() } });
  }));

  return router;
}
