import { Router } from 'express';
import type { Database } from '@db/connection';
import { resolveActor } from '../middleware/index';
import healthRouter from './health';
import { casesRouter } from './cases';
import { evidenceRouter } from './evidence';
import { hearingsRouter } from './hearings';
import { caseReportsRouter } from './case-reports';
import { inmatesRouter } from './inmates';
import { inmateReportsRouter } from './inmate-reports';
import { programsRouter } from './programs';
import { notificationsRouter } from './notifications';
import { usersRouter } from './users';
import { dashboardRouter } from './dashboard';

export function createApiRouter(db: Database): Router {
  const router = Router();
  router.use(healthRouter);

  router.use(resolveActor(db));
  router.use(casesRouter(db));
  router.use(evidenceRouter(db));
  router.use(hearingsRouter(db));
  router.use(caseReportsRouter(db));
  router.use(inmatesRouter(db));
  router.use(inmateReportsRouter(db));
  router.use(programsRouter(db));
  router.use(notificationsRouter(db));
  router.use(usersRouter(db));
  router.use(dashboardRouter(db));

  return router;
}
