import { Router } from 'express';
import type { Database } from '@db/connection';
import {
  assignInmate,
  changeInmateStatus,
  createInmate,
  createInmateReport,
  createProgram,
  getInmateDetail,
  logVisit,
  releaseInmate,
  updateInmate,
} from '../services/inmate-workflow';
import { handle } from './respond';

export function inmatesRouter(db: Database): Router {
  const router = Router();

  router.post('/inmates', handle(db, (ctx, req) => createInmate(ctx, req.body), 201));
  router.get('/inmates/:id', handle(db, (ctx, req) => getInmateDetail(ctx, req.params.id)));
  router.patch('/inmates/:id', handle(db, (ctx, req) => updateInmate(ctx, req.params.id, req.body)));

  router.post('/inmates/:id/assign', handle(db, (ctx, req) => assignInmate(ctx, req.params.id, req.body)));
  router.post(
    '/inmates/:id/status',
    handle(db, (ctx, req) => changeInmateStatus(ctx, req.params.id, req.body)),
  );
  router.post(
    '/inmates/:id/release',
    handle(db, (ctx, req) => releaseInmate(ctx, req.params.id, req.body)),
  );

  router.post(
    '/inmates/:id/reports',
    handle(db, (ctx, req) => createInmateReport(ctx, req.params.id, req.body), 201),
  );
  router.post(
    '/inmates/:id/visitors',
    handle(db, (ctx, req) => logVisit(ctx, req.params.id, req.body), 201),
  );
  router.post(
    '/inmates/:id/programs',
    handle(db, (ctx, req) => createProgram(ctx, req.params.id, req.body), 201),
  );

  return router;
}
