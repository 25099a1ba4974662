import type { Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import { WS_EVENTS } from '@shared/constants';
import type { WsMessage } from '@shared/types';
import type { Database } from '@db/connection';
import { config } from './config';
import { USER_ID_HEADER, findActor } from './middleware';

let wss: WebSocketServer | null = null;
const sockets = new Map<string, Set<WebSocket>>();

function encode(event: WsMessage['event'], data: unknown): string {
  const msg: WsMessage = { event, data, timestamp: new Date().toISOString() };
  return JSON.stringify(msg);
}

function register(userId: string, socket: WebSocket): void {
  if (!sockets.has(userId)) sockets.set(userId, new Set());
  sockets.get(userId)?.add(socket);
  socket.send(encode(WS_EVENTS.CONNECTION_ESTABLISHED, { userId }));

  socket.on('close', () => {
    const set = sockets.get(userId);
    set?.delete(socket);
    if (set && set.size === 0) sockets.delete(userId);
  });
}

/**
 * Attaches the notification feed to `server`. A socket is bound to the user
 * named by the upgrade request's `x-user-id` header, or closed with 1008.
 */
export function initWebSocket(server: Server, db: Database): WebSocketServer {
  wss = new WebSocketServer({ server, path: '/ws' });

  wss.on('connection', (socket, req) => {
    socket.on('error', (err) => {
      console.error('[WS] Socket error:', err.message);
    });

    const header = req.headers[USER_ID_HEADER];
    if (typeof header !== 'string') {
      socket.close(1008, 'Authentication required');
      return;
    }

    findActor(db, header)
      .then((actor) => {
        if (socket.readyState !== WebSocket.OPEN) return;
        if (!actor) {
          socket.close(1008, 'Authentication required');
          return;
        }
        register(actor.id, socket);
      })
      .catch((err: unknown) => {
        console.error('[WS] Failed to resolve user:', err instanceof Error ? err.message : err);
        socket.close(1011, 'Internal error');
      });
  });

  const heartbeat = setInterval(() => {
    const payload = encode(WS_EVENTS.HEARTBEAT, null);
    for (const set of sockets.values()) {
      for (const socket of set) {
        if (socket.readyState === WebSocket.OPEN) socket.send(payload);
      }
    }
  }, config.heartbeatMs);
  heartbeat.unref();

  wss.on('close', () => clearInterval(heartbeat));
  console.warn('[WS] Listening on /ws');
  return wss;
}

/** Pushes an event to every open socket of one user. No-op without a server. */
export function sendToUser(userId: string, event: WsMessage['event'], data: unknown): void {
  if (!wss) return;
  const set = sockets.get(userId);
  if (!set) return;
  const payload = encode(event, data);
  for (const socket of set) {
    if (socket.readyState === WebSocket.OPEN) socket.send(payload);
  }
}

export function connectedUserCount(): number {
  return sockets.size;
}
