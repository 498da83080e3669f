import Fastify, { FastifyInstance } from 'fastify';
import type { MetricsController } from '../controllers/metrics.controller';
import { errorMessage } from '../lib/errors';
import logger from '../lib/logger';

const log = logger.child('http');

const LANDING_PAGE = `<!DOCTYPE html>
<html>
<head>
    <title>PBS Exporter</title>
    <style>
        body { font-family: Arial, sans-serif; margin: 40px; }
        h1 { color: #333; }
        a { color: #0066cc; text-decoration: none; }
        a:hover { text-decoration: underline; }
        .info { background: #f0f0f0; padding: 15px; border-radius: 5px; margin: 20px 0; }
    </style>
</head>
<body>
    <h1>PBS Exporter</h1>
    <div class="info">
        <p>Prometheus metrics exporter for Proxmox Backup Server</p>
        <p><strong>Endpoints:</strong></p>
        <ul>
            <li><a href="/metrics">/metrics</a> - Prometheus metrics</li>
            <li><a href="/health">/health</a> - Health check</li>
        </ul>
    </div>
</body>
</html>
`;

export type BuildServerOptions = {
  metrics: Pick<MetricsController, 'collect' | 'render' | 'contentType'>;
};

/**
 * Build the scrape endpoint. Exported separately from `listen()` so tests
 * can use `app.inject()`.
 */
export function buildServer({ metrics }: BuildServerOptions): FastifyInstance {
  const app = Fastify({ logger: false });

  app.addHook('onResponse', async (request, reply) => {
    log.debug('request', {
      method: request.method,
      url: request.url,
      status: reply.statusCode,
      ms: Math.round(reply.elapsedTime),
    });
  });

  app.get('/metrics', async (_request, reply) => {
    log.info('Received metrics scrape request');

    // The controller already logged any failure; a failed collection still
    // serves the registry, with pbs_up at 0.
    try {
      const summary = await metrics.collect();
      for (const failure of summary.failures) {
        log.debug('Partial collection', { ...failure });
      }
    } catch (err) {
      log.debug('Serving metrics after failed collection', { error: errorMessage(err) });
    }

    try {
      const body = await metrics.render();
      return reply.status(200).header('Content-Type', metrics.contentType).send(body);
    } catch (err) {
      log.warn('Failed to encode metrics', { err });
      return reply
        .status(500)
        .header('Content-Type', 'text/plain; charset=utf-8')
        .send(`Failed to encode metrics: ${errorMessage(err)}`);
    }
  });

  app.get('/health', async (_request, reply) => {
    return reply.status(200).header('Content-Type', 'text/plain; charset=utf-8').send('OK');
  });

  app.get('/', async (_request, reply) => {
    return reply.status(200).header('Content-Type', 'text/html; charset=utf-8').send(LANDING_PAGE);
  });

  return app;
}
