import { Router } from 'express';
import type { Database } from '@db/connection';
import { reviewInmateReport } from '../services/inmate-workflow';
import { handle } from './respond';

export function inmateReportsRouter(db: Database): Router {
  const router = Router();
  router.post(
    '/inmate-reports/:id/review',
    handle(db, (ctx, req) => reviewInmateReport(ctx, req.params.id, req.body)),
  );
  return router;
}
