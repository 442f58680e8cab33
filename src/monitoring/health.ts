import http from 'node:http';
import type { SessionState } from '../smpp/client.js';
import { metricsRegistry } from './metrics.js';
import { logger } from './logger.js';

let sessionState: SessionState = 'connecting';
let stateSince = Date.now();

export function setSessionState(state: SessionState): void {
  if (state === sessionState) return;
  sessionState = state;
  stateSince = Date.now();
}

export interface Readiness {
  status: 200 | 503;
  body: { ready: boolean; state: SessionState; since: string };
}

/** Ready means the SMPP session is bound. */
export function readiness(): Readiness {
  const ready = sessionState === 'bound';
  return {
    status: ready ? 200 : 503,
    body: { ready, state: sessionState, since: new Date(stateSince).toISOString() },
  };
}

export function startHealthServer(port: number, bindAddress: string): http.Server {
  const server = http.createServer(async (req, res) => {
    if (req.url === '/health') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: 'ok' }));
      return;
    }

    if (req.url === '/ready') {
      const { status, body } = readiness();
      res.writeHead(status, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(body));
      return;
    }

    if (req.url === '/metrics') {
      try {
        const metrics = await metricsRegistry.metrics();
        res.writeHead(200, { 'Content-Type': metricsRegistry.contentType });
        res.end(metrics);
      } catch (err) {
        logger.error({ error: String(err) }, 'Failed to collect metrics');
        res.writeHead(500);
        res.end('Error collecting metrics');
      }
      return;
    }

    res.writeHead(404);
    res.end('Not found');
  });

  server.listen(port, bindAddress, () => {
    logger.info({ port, bindAddress }, 'Health/metrics server listening');
  });

  return server;
}
