import express, {
  type NextFunction,
  type Request,
  type Response,
} from 'express';

import type { AppConfig } from './config/appConfig';
import { DEFAULT_APP_CONFIG } from './config/appConfig';
import { createReadinessRouter } from './modules/readiness/readiness.routes';
import type { ReadinessRepository } from './readiness/ReadinessRepository';
import { validationError } from './reliability/DomainError';
import { mapErrorToApiResponse } from './reliability/FailureHandling';
import { telemetryStore } from './telemetry/TelemetryStore';

const isBodyParseError = (err: unknown): boolean =>
  err instanceof SyntaxError && 'body' in err;

export function createApiApp(args: {
  repository: ReadinessRepository;
  config?: Partial<AppConfig>;
}) {
  const config = { ...DEFAULT_APP_CONFIG, ...args.config };

  const app = express();
  app.use(express.json({ limit: config.jsonBodyLimit }));

  app.use((req, res, next) => {
    const timer = setTimeout(() => {
      if (res.headersSent) return;
      res.status(504).json({ success: false, errorMessage: 'Gateway Timeout' });
    }, config.requestTimeoutMs);

    res.on('finish', () => clearTimeout(timer));
    res.on('close', () => clearTimeout(timer));
    req.setTimeout(config.requestTimeoutMs);
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ ok: true, telemetry: telemetryStore.snapshot(5) });
  });

  app.use('/api', createReadinessRouter(args.repository));

  // Fallback 404 for any unhandled /api route.
  app.use('/api', (_req, res) => {
    res.status(404).json({ success: false, errorMessage: 'Not Found' });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const mapped = mapErrorToApiResponse(
      isBodyParseError(err) ? validationError('Request body is not valid JSON.') : err,
      { operation: `${req.method} ${req.path}` },
    );
    res.status(mapped.status).json(mapped.body);
  });

  return app;
}
