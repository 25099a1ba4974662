import { Router } from 'express';
import type { Database } from '@db/connection';
import {
  addEvidence,
  assignCase,
  createCase,
  editCase,
  getCaseDetail,
  sentenceCase,
  submitCaseReport,
  transitionCase,
} from '../services/case-workflow';
import { handle } from './respond';

export function casesRouter(db: Database): Router {
  const router = Router();

  router.post('/cases', handle(db, (ctx, req) => createCase(ctx, req.body), 201));
  router.get('/cases/:id', handle(db, (ctx, req) => getCaseDetail(ctx, req.params.id)));
  router.patch('/cases/:id', handle(db, (ctx, req) => editCase(ctx, req.params.id, req.body)));

  router.post('/cases/:id/assign', handle(db, (ctx, req) => assignCase(ctx, req.params.id, req.body)));
  router.post('/cases/:id/sentence', handle(db, (ctx, req) => sentenceCase(ctx, req.params.id, req.body)));
  router.post(
    '/cases/:id/transition',
    handle(db, (ctx, req) => transitionCase(ctx, req.params.id, req.body)),
  );

  router.post(
    '/cases/:id/evidence',
    handle(db, (ctx, req) => addEvidence(ctx, req.params.id, req.body), 201),
  );
  router.post(
    '/cases/:id/reports',
    handle(db, (ctx, req) => submitCaseReport(ctx, req.params.id, req.body), 201),
  );

  return router;
}
