import { Router } from 'express';
import type { Database } from '@db/connection';
import { approveCaseReport } from '../services/case-workflow';
import { handle } from './respond';

export function caseReportsRouter(db: Database): Router {
  const router = Router();
  router.post(
    '/case-reports/:id/approve',
    handle(db, (ctx, req) => approveCaseReport(ctx, req.params.id)),
  );
  return router;
}
