import type { Database } from '@db/connection';
import type { Actor } from '@core/access';
import { toIsoDate } from '@core/dates';
import { invalid, unexpected } from '@core/result';
import type { WorkflowResult } from '@core/result';

export interface RequestOrigin {
  ipAddress: string | null;
  userAgent: string;
}

/** Everything a workflow operation needs, passed explicitly per call. */
export interface WorkflowContext {
  db: Database;
  actor: Actor;
  origin: RequestOrigin;
  now: Date;
}

export function todayOf(ctx: WorkflowContext): string {
  return toIsoDate(ctx.now);
}

function pgErrorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('code' in err && typeof err.code === 'string') return err.code;
  if ('cause' in err) return pgErrorCode(err.cause);
  return undefined;
}

export function isUniqueViolation(err: unknown): boolean {
  return pgErrorCode(err) === '23505';
}

/**
 * Operation boundary. A unique-constraint race becomes a validation failure;
 * anything else thrown is logged and reported without internals.
 */
export async function atBoundary<T>(
  operation: string,
  run: () => Promise<WorkflowResult<T>>,
): Promise<WorkflowResult<T>> {
  try {
    return await run();
  } catch (err) {
    if (isUniqueViolation(err)) {
      return invalid('A record with this identifier already exists.');
    }
    console.error(`[WORKFLOW] ${operation} failed:`, err instanceof Error ? err.message : err);
    return unexpected(`Error while processing ${operation.replace(/_/g, ' ')}. Please try again.`);
  }
}
