import { createServer } from 'node:http';
import { register } from './metrics.js';
import logger from './logger.js';
import { getErrorMessage } from './shared/errors.js';

/**
 * Readiness probe for the running process
 *
 * @property isReady - True once the process can do useful work (producer connected, consumer streaming)
 * @property notReadyReason - Reported by /readyz while not ready
 */
export interface Readiness {
  isReady: () => boolean;
  notReadyReason: string;
}

/**
 * Start HTTP health check server for Docker/Kubernetes probes
 *
 * Serves GET /healthz (liveness), GET /readyz (Kafka readiness) and
 * GET /metrics (Prometheus text format).
 *
 * @param port - Port to listen on; 0 picks a free port
 * @returns HTTP server instance (call .close() to stop)
 * @example
 * const server = startHealthServer(3000, {
 *   isReady: isProducerConnected,
 *   notReadyReason: 'kafka producer not connected',
 * });
 */
export function startHealthServer(port: number, readiness: Readiness) {
  const server = createServer((req, res) => {
    if (req.url === '/healthz' && req.method === 'GET') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(
        JSON.stringify({
          status: 'healthy',
          timestamp: new Date().toISOString(),
          uptime: process.uptime(),
        })
      );
    } else if (req.url === '/readyz' && req.method === 'GET') {
      const ready = readiness.isReady();
      const status = ready ? 200 : 503;
      res.writeHead(status, { 'Content-Type': 'application/json' });
      res.end(
        JSON.stringify({
          status: ready ? 'ready' : 'not ready',
          ...(ready ? {} : { error: readiness.notReadyReason }),
        })
      );
    } else if (req.url === '/metrics' && req.method === 'GET') {
      register
        .metrics()
        .then((body) => {
          res.writeHead(200, { 'Content-Type': register.contentType });
          res.end(body);
        })
        .catch((err: unknown) => {
          logger.error(
            { error: getErrorMessage(err) },
            'Metrics collection failed'
          );
          res.writeHead(500);
          res.end(getErrorMessage(err));
        });
    } else {
      res.writeHead(404);
      res.end();
    }
  });

  server.headersTimeout = 10000;
  server.requestTimeout = 10000;
  server.keepAliveTimeout = 30000;

  server.listen(port, () => {
    logger.info({ port }, 'Health check server listening');
  });

  return server;
}
