/**
 * Audit API
 *
 * POST /audits - Runs the audit pipeline over an uploaded annual report PDF
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  config,
  logger,
  runWithContext,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  DocumentReadError,
  type ErrorEnvelope,
  type PipelineDependencies,
} from '@governance-audit/shared';
import { auditUploadedPdf } from './lib/upload';

function errorEnvelope(code: string, message: string, correlationId: string): ErrorEnvelope {
  return { error: { code, message, correlation_id: correlationId } };
}

export interface ErrorResponse {
  status: number;
  body: ErrorEnvelope;
}

/** Errors raised by the body parser carry an HTTP status and a `type` tag */
function isHttpError(error: unknown): error is Error & { status: number; type?: unknown } {
  return error instanceof Error && 'status' in error && typeof error.status === 'number';
}

/**
 * Map a failed request to its status code and error envelope
 */
export function toErrorResponse(error: unknown, correlationId: string): ErrorResponse {
  if (error instanceof DocumentReadError) {
    return {
      status: error.statusCode,
      body: errorEnvelope('unreadable_document', error.message, correlationId),
    };
  }

  if (isHttpError(error) && error.type === 'entity.too.large') {
    return {
      status: 413,
      body: errorEnvelope(
        'payload_too_large',
        `Upload exceeds the ${config.maxUploadBytes} byte limit`,
        correlationId
      ),
    };
  }

  if (isHttpError(error) && error.status >= 400 && error.status < 500) {
    return {
      status: error.status,
      body: errorEnvelope('invalid_request', error.message, correlationId),
    };
  }

  return {
    status: 500,
    body: errorEnvelope(
      'internal_error',
      error instanceof Error ? error.message : 'Unknown error',
      correlationId
    ),
  };
}

export function createApp(deps: PipelineDependencies): express.Express {
  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = (typeof header === 'string' && header) || ulid();
    res.setHeader('X-Correlation-Id', correlationId);
    res.locals.correlationId = correlationId;

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  app.use(express.raw({ type: 'application/pdf', limit: config.maxUploadBytes }));

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path = req.route?.path || req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'audit-api',
      model: deps.auditor.settings.model,
      timestamp: new Date().toISOString(),
    });
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * POST /audits
   * Body: the annual report as application/pdf
   */
  app.post('/audits', async (req: Request, res: Response) => {
    const correlationId = String(res.locals.correlationId);

    if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
      res
        .status(400)
        .json(errorEnvelope('invalid_request', 'Request body must be a PDF (Content-Type: application/pdf)', correlationId));
      return;
    }

    try {
      logger.info('Audit requested', { bytes: req.body.length });
      res.status(200).json(await auditUploadedPdf(req.body, deps));
    } catch (error) {
      const { status, body } = toErrorResponse(error, correlationId);
      if (status >= 500) {
        logger.error('Audit failed', error);
      }
      res.status(status).json(body);
    }
  });

  // Errors passed to next(), including body parser rejections
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const { status, body } = toErrorResponse(error, String(res.locals.correlationId));
    if (status >= 500) {
      logger.error('Request failed', error, { path: req.path });
    } else {
      logger.warn('Request rejected', { path: req.path, status, code: body.error.code });
    }
    res.status(status).json(body);
  });

  return app;
}
