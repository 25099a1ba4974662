import { Router } from 'express';
import type { Database } from '@db/connection';
import { listNotifications, markNotificationRead } from '../services/notifications';
import { handle } from './respond';

export function notificationsRouter(db: Database): Router {
  const router = Router();
  router.get('/notifications', handle(db, (ctx) => listNotifications(ctx)));
  router.post(
    '/notifications/:id/read',
    handle(db, (ctx, req) => markNotificationRead(ctx, req.params.id)),
  );
  return router;
}
