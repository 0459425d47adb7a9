/**
 * WebSocket notification feed.
 * Relays committed governance events (proposal.created, vote.cast,
 * session.closed, ...) to connected observers. Clients may narrow the feed
 * with `?events=vote.cast,session.closed`.
 */

import type { FastifyInstance } from 'fastify';
import { eventBus, EventType } from '../infra/eventBus.js';
import { isoNow } from '../utils/time.js';

interface WSLike {
  readyState: number;
  send(data: string): void;
  on(event: string, cb: () => void): void;
}

interface FeedClient {
  socket: WSLike;
  /** null means every event. */
  events: Set<string> | null;
}

const clients = new Set<FeedClient>();

/** Number of currently connected WebSocket clients. */
export function connectedClients(): number {
  return clients.size;
}

const parseEventFilter = (query: unknown): Set<string> | null => {
  if (!query || typeof query !== 'object' || !('events' in query)) return null;
  const raw = query.events;
  if (typeof raw !== 'string') return null;

  const events = raw.split(',').map((s) => s.trim()).filter(Boolean);
  return events.length > 0 ? new Set(events) : null;
};

/**
 * Register the WebSocket endpoint and subscribe to the event bus.
 * Must be called AFTER @fastify/websocket is registered on the Fastify instance.
 */
export async function registerWebSocket(app: FastifyInstance): Promise<void> {
  const unsubscribe = eventBus.on('*', (event: EventType, data: unknown) => {
    const message = JSON.stringify({
      type: event,
      data,
      ts: isoNow(),
    });

    for (const client of clients) {
      if (client.socket.readyState !== 1 /* OPEN */) continue;
      if (client.events && !client.events.has(event)) continue;
      client.socket.send(message);
    }
  });

  app.addHook('onClose', async () => {
    unsubscribe();
    clients.clear();
  });

  app.get('/ws', { websocket: true }, (socket: WSLike, request) => {
    const client: FeedClient = { socket, events: parseEventFilter(request.query) };
    clients.add(client);

    socket.send(JSON.stringify({
      type: 'connected',
      data: {
        clients: clients.size,
        events: client.events ? [...client.events] : '*',
      },
      ts: isoNow(),
    }));

    socket.on('close', () => {
      clients.delete(client);
    });

    socket.on('error', () => {
      clients.delete(client);
    });
  });
}
