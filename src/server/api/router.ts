/**
 * API Router for the generation endpoints
 *
 * Central router that handles all client-facing endpoints with middleware for:
 * - Request logging (method, path, status, duration)
 * - Error handling and response formatting
 *
 * Endpoints:
 * - POST /api/generate - Generate a batch of unique minimal pairs
 * - POST /api/pair - Fill one supplied sequence pair
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import type { BatchService } from '../services/batch.service';
import { handleGenerate } from './generate.endpoint';
import { handlePair } from './pair.endpoint';
import {
  sendErrorResponse,
  APIErrorCode,
  createAPIError,
} from '../utils/response.formatter';

export const AVAILABLE_ROUTES = [
  'GET /api/health',
  'POST /api/generate',
  'POST /api/pair',
];

/**
 * Creates the API router.
 *
 * @param batchService - Batch orchestrator built from the loaded data
 * @param defaultCount - Pair count used when a generate request has none
 */
export function createAPIRouter(
  batchService: BatchService,
  defaultCount: number
): express.Router {
  const router = express.Router();

  router.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    res.on('finish', () => {
      console.log(
        JSON.stringify({
          operation: 'apiRequest',
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration: `${Date.now() - startTime}ms`,
          timestamp: new Date().toISOString(),
        })
      );
    });

    next();
  });

  router.get('/health', (req: Request, res: Response) => {
    res.json({ ok: true, ts: Date.now() });
  });

  router.post('/generate', (req: Request, res: Response) => {
    handleGenerate(req, res, batchService, defaultCount);
  });

  router.post('/pair', (req: Request, res: Response) => {
    handlePair(req, res, batchService);
  });

  router.use((req: Request, res: Response) => {
    const apiError = createAPIError(
      APIErrorCode.ROUTE_NOT_FOUND,
      `API route not found: ${req.method} ${req.path}`,
      {
        method: req.method,
        path: req.path,
        availableRoutes: AVAILABLE_ROUTES,
      }
    );
    sendErrorResponse(res, apiError);
  });

  return router;
}
