import { createServer } from 'http';
import { API_PREFIX } from '@shared/constants';
import { closeDatabase, db } from '@db/connection';
import { config } from './config';
import { createApp } from './app';
import { initWebSocket } from './websocket';

const app = createApp(db, { logRequests: !config.isProd });
const server = createServer(app);

initWebSocket(server, db);

function shutdown(signal: string) {
  console.warn(`[SERVER] ${signal} received, shutting down`);
  server.close(() => {
    closeDatabase()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('[SERVER] Failed to close database:', err);
        process.exit(1);
      });
  });
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

server.listen(config.port, () => {
  console.warn(`[SERVER] Court & Custody API on port ${config.port}`);
  console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
});

export { app, server };
