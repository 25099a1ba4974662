import { Router } from 'express';
import type { Database } from '@db/connection';
import { getDashboardStats } from '../services/dashboard';
import { handle } from './respond';

export function dashboardRouter(db: Database): Router {
  const router = Router();
  router.get('/dashboard/stats', handle(db, (ctx) => getDashboardStats(ctx)));
  return router;
}
