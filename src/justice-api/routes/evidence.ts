import { Router } from 'express';
import type { Database } from '@db/connection';
import { reviewEvidence } from '../services/case-workflow';
import { handle } from './respond';

export function evidenceRouter(db: Database): Router {
  const router = Router();
  router.post(
    '/evidence/:id/review',
    handle(db, (ctx, req) => reviewEvidence(ctx, req.params.id, req.body)),
  );
  return router;
}
