import type { Request, Response, RequestHandler } from 'express';
import type { Database } from '@db/connection';
import type { FailureKind, WorkflowResult } from '@core/result';
import type { ApiResponse } from '@shared/types';
import type { WorkflowContext } from '../services/context';

export const STATUS_BY_KIND: Record<FailureKind, number> = {
  access_denied: 403,
  not_found: 404,
  validation: 400,
  unexpected: 500,
};

export function toResponse<T>(result: WorkflowResult<T>): { status: number; body: ApiResponse<T> } {
  if (result.ok) {
    return {
      status: 200,
      body: { success: true, data: result.data, message: result.message, redirectTo: result.redirectTo },
    };
  }
  return {
    status: STATUS_BY_KIND[result.kind],
    body: {
      success: false,
      kind: result.kind,
      error: result.error,
      ...(result.fieldErrors ? { fieldErrors: result.fieldErrors } : {}),
      ...(result.redirectTo ? { redirectTo: result.redirectTo } : {}),
    },
  };
}

export function contextFor(req: Request, db: Database): WorkflowContext | null {
  if (!req.actor) return null;
  return {
    db,
    actor: req.actor,
    origin: { ipAddress: req.ip ?? null, userAgent: req.get('user-agent') ?? '' },
    now: new Date(),
  };
}

type Operation<T> = (ctx: WorkflowContext, req: Request) => Promise<WorkflowResult<T>>;

/**
 * Express handler around one workflow operation. `successStatus` replaces
 * 200 for operations that create a record.
 */
export function handle<T>(db: Database, operation: Operation<T>, successStatus = 200): RequestHandler {
  return async (req: Request, res: Response, next) => {
    const ctx = contextFor(req, db);
    if (!ctx) {
      res.status(401).json({ success: false, error: 'Authentication required', redirectTo: '/login' });
      return;
    }
    try {
      const result = await operation(ctx, req);
      const { status, body } = toResponse(result);
      res.status(result.ok ? successStatus : status).json(body);
    } catch (err) {
      next(err);
    }
  };
}
