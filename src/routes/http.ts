import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';

import type { DiagnosticEngine } from '../engine.js';
import { InvalidQueryError } from '../errors.js';
import type { ResultCache } from '../resultCache.js';

export type RouteDeps = { engine: DiagnosticEngine; cache: ResultCache };

/** Forwards sync throws and rejected promises to the error middleware. */
export function handle(fn: (req: Request, res: Response) => unknown): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      Promise.resolve(fn(req, res)).catch(next);
    } catch (err) {
      next(err);
    }
  };
}

export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidQueryError(`Invalid request body: ${issue?.message ?? 'malformed'}`, {
      field: issue ? issue.path.join('.') || 'body' : 'body',
    });
  }
  return parsed.data;
}

export function sendCached(res: Response, body: string) {
  res.type('application/json').send(body);
}
