import express, { type NextFunction, type Request, type Response } from 'express';
import { v4 as uuid } from 'uuid';

import { EngineError, describeError, type ErrorContext } from './errors.js';
import { createLogger } from './logger.js';
import { createRouter } from './routes/index.js';
import type { RouteDeps } from './routes/http.js';

const log = createLogger('http');

function statusFor(err: EngineError): number {
  switch (err.code) {
    case 'INVALID_QUERY': return 400;
    case 'UNKNOWN_TREATMENT': return 404;
    case 'LOAD_ERROR': return 500;
  }
}

/** Errors raised by express's body parser carry an http status and a `type`. */
function isClientHttpError(err: unknown): err is Error & { status: number } {
  return err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500;
}

function clientErrorBody(err: Error & { status: number }) {
  const context: ErrorContext = {};
  if ('type' in err && typeof err.type === 'string') context.type = err.type;
  if ('limit' in err && typeof err.limit === 'number') context.limit = err.limit;
  switch (err.status) {
    case 413:
      return {
        error: 'PAYLOAD_TOO_LARGE',
        message: typeof context.limit === 'number' ? `Request body exceeds the ${context.limit}-byte limit` : 'Request body is too large',
        context,
      };
    case 415:
      return { error: 'UNSUPPORTED_MEDIA_TYPE', message: err.message, context };
    default:
      return {
        error: 'INVALID_QUERY',
        message: context.type === 'entity.parse.failed' ? 'Request body is not valid JSON' : err.message,
        context,
      };
  }
}

export function createApp(deps: RouteDeps) {
  const app = express();
  app.use(express.json({ limit: '100kb' }));

  app.use((req, res, next) => {
    const requestId = req.get('x-request-id') ?? uuid();
    res.setHeader('x-request-id', requestId);
    res.locals.requestId = requestId;
    const started = Date.now();
    res.on('finish', () => {
      log.debug(`${requestId} ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - started}ms)`);
    });
    next();
  });

  app.use(createRouter(deps));

  app.use((req, res) => {
    res.status(404).json({ error: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}`, context: {} });
  });

  // express recognises error middleware by its four parameters
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const requestId = String(res.locals.requestId ?? '-');
    if (err instanceof EngineError) {
      const status = statusFor(err);
      (status >= 500 ? log.error : log.warn)(`${requestId} ${describeError(err)}`);
      res.status(status).json({ error: err.code, message: err.message, context: err.context });
      return;
    }
    if (isClientHttpError(err)) {
      log.warn(`${requestId} rejected request body (${err.status}): ${err.message}`);
      res.status(err.status).json(clientErrorBody(err));
      return;
    }
    log.error(`${requestId} ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    res.status(500).json({ error: 'INTERNAL', message: 'Internal Server Error', context: {} });
  });

  return app;
}
