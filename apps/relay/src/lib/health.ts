/**
 * Relay Health Check Server
 *
 * Simple HTTP server for liveness probes and Prometheus scraping.
 */

import { createServer, IncomingMessage, ServerResponse, type Server } from 'node:http';
import type { Logger } from '@capture-relay/utils';
import type { DetectorStatus } from '../detector.js';

export interface HealthServerOptions {
  port: number;
  // 127.0.0.1 unless set
  host?: string;
  getStatus: () => DetectorStatus;
  destinations: string[];
  logger: Logger;
}

export interface HealthServer {
  port: number;
  close: () => Promise<void>;
}

/**
 * Create and start the health check server
 */
export async function startHealthServer(options: HealthServerOptions): Promise<HealthServer> {
  const startTime = Date.now();
  const uptime = () => Math.floor((Date.now() - startTime) / 1000);
  const { logger } = options;

  const server: Server = createServer((req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url || '/', 'http://localhost');

    try {
      switch (url.pathname) {
        case '/health':
        case '/':
          sendJson(res, 200, {
            status: 'healthy',
            uptime: uptime(),
            timestamp: new Date().toISOString(),
            destinations: options.destinations,
            detector: options.getStatus(),
          });
          break;
        case '/live':
          sendJson(res, 200, { alive: true, uptime: uptime() });
          break;
        case '/metrics':
          res.writeHead(200, { 'Content-Type': 'text/plain' });
          res.end(renderMetrics(options.getStatus(), uptime()));
          break;
        default:
          sendJson(res, 404, { error: 'Not Found' });
      }
    } catch (error) {
      logger.error({ error, path: url.pathname }, 'Health check error');
      sendJson(res, 500, { error: 'Internal Server Error' });
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host ?? '127.0.0.1', () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : options.port;

  logger.info({ port }, 'Health check server started');

  return {
    port,
    close: () => new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    }),
  };
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body, null, 2));
}

/**
 * Prometheus-style metrics
 */
export function renderMetrics(status: DetectorStatus, uptimeSeconds: number): string {
  return `
# HELP relay_uptime_seconds Relay uptime in seconds
# TYPE relay_uptime_seconds gauge
relay_uptime_seconds ${uptimeSeconds}

# HELP relay_queue_size Entries waiting in the upload queue
# TYPE relay_queue_size gauge
relay_queue_size ${status.queueSize}

# HELP relay_queue_capacity Upload queue capacity
# TYPE relay_queue_capacity gauge
relay_queue_capacity ${status.queueCapacity}

# HELP relay_worker_active Whether an upload worker is running
# TYPE relay_worker_active gauge
relay_worker_active ${status.workerActive ? 1 : 0}

# HELP relay_polls_total Detection passes run
# TYPE relay_polls_total counter
relay_polls_total ${status.polls}

# HELP relay_items_queued_total Items queued for upload
# TYPE relay_items_queued_total counter
relay_items_queued_total ${status.queued}

# HELP relay_items_dropped_total Items rejected by a full queue
# TYPE relay_items_dropped_total counter
relay_items_dropped_total ${status.dropped}

# HELP relay_items_delivered_total Items delivered to at least one destination
# TYPE relay_items_delivered_total counter
relay_items_delivered_total ${status.delivered}

# HELP relay_items_failed_total Items no destination accepted
# TYPE relay_items_failed_total counter
relay_items_failed_total ${status.failed}

# HELP nodejs_heap_used_bytes Node.js heap used
# TYPE nodejs_heap_used_bytes gauge
nodejs_heap_used_bytes ${process.memoryUsage().heapUsed}
`.trim();
}
