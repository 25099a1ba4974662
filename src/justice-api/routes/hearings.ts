import { Router } from 'express';
import type { Database } from '@db/connection';
import {
  cancelHearing,
  completeHearing,
  editHearing,
  scheduleHearing,
} from '../services/case-workflow';
import { handle } from './respond';

export function hearingsRouter(db: Database): Router {
  const router = Router();

  router.post('/hearings', handle(db, (ctx, req) => scheduleHearing(ctx, req.body), 201));
  router.patch('/hearings/:id', handle(db, (ctx, req) => editHearing(ctx, req.params.id, req.body)));
  router.post('/hearings/:id/complete', handle(db, (ctx, req) => completeHearing(ctx, req.params.id)));
  router.post(
    '/hearings/:id/cancel',
    handle(db, (ctx, req) => cancelHearing(ctx, req.params.id, req.body)),
  );

  return router;
}
