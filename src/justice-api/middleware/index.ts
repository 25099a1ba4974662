import type { Request, Response, NextFunction, RequestHandler } from 'express';
import morgan from 'morgan';
import { eq } from 'drizzle-orm';
import type { Database } from '@db/connection';
import { userProfiles, users } from '@db/schema/users';
import type { Actor } from '@core/access';
import { isUuid } from '@core/inputs';

declare global {
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

export const USER_ID_HEADER = 'x-user-id';

export const requestLogger = morgan('dev');

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  console.error('[ERROR]', err.message);
  res.status(500).json({ success: false, error: 'Internal server error' });
}

/**
 * Looks up the user behind a forwarded id. Users without a profile come back
 * with `role: null`.
 */
export async function findActor(db: Database, userId: string): Promise<Actor | null> {
  if (!isUuid(userId)) return null;
  const [row] = await db
    .select({ id: users.id, role: userProfiles.role })
    .from(users)
    .leftJoin(userProfiles, eq(userProfiles.userId, users.id))
    .where(eq(users.id, userId));
  return row ? { id: row.id, role: row.role } : null;
}

/**
 * Turns the authenticated user id forwarded upstream into an Actor. Users
 * without a profile get `role: null` and fail every gate downstream.
 */
export function resolveActor(db: Database): RequestHandler {
  return async (req, res, next) => {
    const userId = req.get(USER_ID_HEADER);
    try {
      const actor = userId ? await findActor(db, userId) : null;
      if (!actor) {
        res.status(401).json({ success: false, error: 'Authentication required', redirectTo: '/login' });
        return;
      }
      req.actor = actor;
      next();
    } catch (err) {
      next(err);
    }
  };
}
