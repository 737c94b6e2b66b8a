// Load environment variables from .env file
import dotenv from 'dotenv';
dotenv.config();

import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'http';
import { createAPIRouter } from './api/router';
import { createBatchService } from './bootstrap';
import type { BatchService } from './services/batch.service';
import { loadConfig, type GeneratorConfig } from './utils/config';
import { errorHandlingMiddleware } from './utils/error-handler';

export function setupServer(
  batchService: BatchService,
  config: Pick<GeneratorConfig, 'pairCount'>
): Express {
  const app = express();

  // Middleware to parse JSON bodies
  app.use(express.json());

  // Mount API router for client-facing endpoints
  app.use('/api', createAPIRouter(batchService, config.pairCount));

  // Error handling for unknown routes
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: `Route not found: ${req.method} ${req.url}`,
      },
    });
  });

  // Malformed JSON bodies and anything a handler throws
  app.use(errorHandlingMiddleware);

  return app;
}

export function startServer(): Server {
  let config: GeneratorConfig;
  let batchService: BatchService;

  try {
    config = loadConfig();
    batchService = createBatchService(config);
    // eslint-disable-next-line no-console
    console.log('✓ Generator data loaded successfully');
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error(
      '✗ Configuration error:',
      error instanceof Error ? error.message : error
    );
    // eslint-disable-next-line no-console
    console.error('Server cannot start without valid configuration and data.');
    process.exit(1);
  }

  const app = setupServer(batchService, config);
  const { port } = config;

  return app.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Server listening on port ${port}`);
  });
}

if (require.main === module) {
  startServer();
}
