import { Router } from 'express';
import { connectedUserCount } from '../websocket';

const router = Router();

router.get('/health', (_req, res) => {
  res.json({
    success: true,
    data: {
      status: 'ok',
      service: 'court-custody-api',
      websocketUsers: connectedUserCount(),
      timestamp: new Date().toISOString(),
    },
  });
});

export default router;
