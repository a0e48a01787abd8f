import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';
import fs from 'fs';
import path from 'path';
import type { Config } from '../config/index.js';
import { createSubmissionsRoutes } from './routes/submissions.routes.js';
import { createVerificationRoutes } from './routes/verification.routes.js';
import { createBlocksRoutes } from './routes/blocks.routes.js';
import { createStatusRoutes } from './routes/status.routes.js';
import { createAdminRoutes } from './routes/admin.routes.js';
import { errorMiddleware } from './middleware/error.middleware.js';
import { loggingMiddleware } from './middleware/logging.middleware.js';
import { contextMiddleware } from './middleware/context.middleware.js';
import { createAdminAuth } from './middleware/adminAuth.js';
import type { SubmissionsHandler } from '../handlers/submissions.handler.js';
import type { VerificationHandler } from '../handlers/verification.handler.js';
import type { BlocksHandler } from '../handlers/blocks.handler.js';
import type { StatusHandler } from '../handlers/status.handler.js';
import type { AdminHandler } from '../handlers/admin.handler.js';

export const API_PREFIX = '/api/v1';

// Resolved from the working directory so source and compiled runs find the same file
const SWAGGER_PATH = path.join(process.cwd(), 'swagger', 'swagger.yaml');

export interface ServerDependencies {
  submissionsHandler: SubmissionsHandler;
  verificationHandler: VerificationHandler;
  blocksHandler: BlocksHandler;
  statusHandler: StatusHandler;
  adminHandler: AdminHandler;
}

export function createServer(
  config: Pick<Config, 'corsOrigin' | 'nodeEnv' | 'nodeId' | 'port' | 'adminPassword'>,
  dependencies: ServerDependencies
): Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  app.use(
    cors({
      origin: config.corsOrigin,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Correlation-Id'],
    })
  );

  app.use(compression());

  app.use(express.json({ limit: '1mb' }));

  // Context middleware (must be before logging)
  app.use(contextMiddleware);
  app.use(loggingMiddleware);

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
    });
  });

  app.get('/api/version', (_req, res) => {
    res.json({
      version: '1.0.0',
      api: 'Provenance Ledger Node API',
      nodeId: config.nodeId,
    });
  });

  if (fs.existsSync(SWAGGER_PATH)) {
    const swaggerDocument = YAML.load(SWAGGER_PATH);
    swaggerDocument.servers = [
      {
        url: `http://localhost:${config.port}${API_PREFIX}`,
        description: `${config.nodeEnv} server`,
      },
    ];
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerDocument));
  }

  app.use(API_PREFIX, createSubmissionsRoutes(dependencies.submissionsHandler));
  app.use(API_PREFIX, createVerificationRoutes(dependencies.verificationHandler));
  app.use(API_PREFIX, createBlocksRoutes(dependencies.blocksHandler));
  app.use(API_PREFIX, createStatusRoutes(dependencies.statusHandler));
  app.use(
    API_PREFIX,
    createAdminRoutes(dependencies.adminHandler, createAdminAuth(config.adminPassword))
  );

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: {
        message: `Cannot ${req.method} ${req.path}`,
      },
    });
  });

  // Error handling middleware (must be last)
  app.use(errorMiddleware);

  return app;
}
