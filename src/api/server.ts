import express from 'express';
import cors from 'cors';
import type { Server } from 'node:http';
import type { ClassificationService } from '../services/ClassificationService.js';
import { logger } from '../utils/logger.js';

// Import route handlers
import { createSubjectRoutes } from './routes/subjects.js';
import { createCalibrationRoutes } from './routes/calibration.js';
import { createExportRoutes } from './routes/export.js';

// Import middleware
import { errorHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import { validateApiKey } from './middleware/auth.js';

export interface ApiServerOptions {
  port?: number;
  host?: string;
  enableCors?: boolean;
  corsOrigins?: string[];
  requireApiKey?: boolean;
  apiKeys?: string[];
  batchConcurrency?: number;
  maxBatchSize?: number;
}

export interface ApiServerDependencies {
  service: ClassificationService;
}

const API_VERSION = '1.0.0';

/**
 * Creates and configures the Express API server
 */
export function createApiServer(
  dependencies: ApiServerDependencies,
  options: ApiServerOptions = {}
): express.Application {
  const app = express();

  const {
    enableCors = true,
    corsOrigins = ['*'],
    requireApiKey = false,
    apiKeys = []
  } = options;

  // Basic middleware
  app.use(express.json({ limit: '1mb' }));

  if (enableCors) {
    app.use(cors({
      origin: corsOrigins.includes('*') ? true : corsOrigins,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key']
    }));
  }

  app.use(requestLogger);

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: API_VERSION
    });
  });

  app.get('/api', (_req, res) => {
    res.json({
      name: 'Pole Classifier API',
      version: API_VERSION,
      description: 'Ensemble classification of pole material and type with pattern learning and calibration',
      endpoints: {
        subjects: '/api/v1/subjects',
        calibration: '/api/v1/calibration',
        export: '/api/v1/export',
        stats: '/api/v1/stats'
      },
      authentication: requireApiKey ? 'API key required (X-API-Key header or Bearer token)' : 'none'
    });
  });

  const apiV1 = express.Router();

  if (requireApiKey) {
    if (apiKeys.length === 0) {
      logger.warn('API key required but no keys configured; every request will be rejected');
    }
    apiV1.use(validateApiKey(apiKeys));
  }

  apiV1.use('/subjects', createSubjectRoutes(dependencies.service, {
    batchConcurrency: options.batchConcurrency,
    maxBatchSize: options.maxBatchSize
  }));
  apiV1.use('/calibration', createCalibrationRoutes(dependencies.service));
  apiV1.use('/', createExportRoutes(dependencies.service));

  app.use('/api/v1', apiV1);

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: `Route ${req.method} ${req.originalUrl} not found`
      }
    });
  });

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}

/**
 * Starts the API server
 */
export async function startApiServer(
  dependencies: ApiServerDependencies,
  options: ApiServerOptions = {}
): Promise<{ app: express.Application; server: Server }> {
  const { port = 3000, host = '0.0.0.0' } = options;

  const app = createApiServer(dependencies, options);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info(`Pole classifier API server started on ${host}:${port}`);
      logger.info(`Health check: http://${host}:${port}/health`);
      resolve({ app, server });
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        logger.error(`Port ${port} is already in use`);
      } else {
        logger.error('Failed to start API server', error);
      }
      reject(error);
    });
  });
}

/**
 * Stops accepting connections and resolves once open ones have closed
 */
export function shutdownApiServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    logger.info('Shutting down API server...');
    server.close(error => {
      if (error) {
        reject(error);
        return;
      }
      logger.info('API server shut down successfully');
      resolve();
    });
  });
}
