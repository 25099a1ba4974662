import { Router } from 'express';
import type { Database } from '@db/connection';
import { listUsersByRole, updateProfile } from '../services/users';
import { handle } from './respond';

export function usersRouter(db: Database): Router {
  const router = Router();
  router.get('/users', handle(db, (ctx, req) => listUsersByRole(ctx, req.query)));
  router.patch('/profile', handle(db, (ctx, req) => updateProfile(ctx, req.body)));
  return router;
}
