import { Router } from 'express';
import type { Database } from '@db/connection';
import { updateProgram } from '../services/inmate-workflow';
import { handle } from './respond';

export function programsRouter(db: Database): Router {
  const router = Router();
  router.patch('/programs/:id', handle(db, (ctx, req) => updateProgram(ctx, req.params.id, req.body)));
  return router;
}
