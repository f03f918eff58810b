import { Router } from 'express';
import type { ClassificationService, ExportFormat } from '../../services/ClassificationService.js';
import { asyncHandler, ValidationError } from '../middleware/errorHandler.js';

function parseFormat(value: unknown): ExportFormat {
  if (value === undefined || value === 'json') return 'json';
  if (value === 'csv') return 'csv';
  throw new ValidationError('format must be "json" or "csv"');
}

/**
 * Create export and statistics routes
 */
export function createExportRoutes(service: ClassificationService): Router {
  const router = Router();

  /**
   * GET /export?format=json|csv - Every stored record
   */
  router.get('/export', asyncHandler(async (req, res) => {
    const format = parseFormat(req.query.format);
    const body = await service.exportSnapshot(format);

    res
      .type(format === 'csv' ? 'text/csv' : 'application/json')
      .attachment(`subjects.${format}`)
      .send(body);
  }));

  /**
   * GET /stats - Accuracy statistics of the store
   */
  router.get('/stats', asyncHandler(async (_req, res) => {
    res.json({ data: await service.accuracyStats() });
  }));

  return router;
}
