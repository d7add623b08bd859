import { FastifyInstance } from 'fastify';
import { frontendErrorSchema } from '../schemas/system.schema.js';
import { getWorkerStatus } from '../jobs/index.js';

export interface SystemRoutesOptions {
  appVersion: string;
  historyMode: 'direct' | 'queue';
}

export async function systemRoutes(
  fastify: FastifyInstance,
  options: SystemRoutesOptions
): Promise<void> {
  const { ledger, sessions, publisher, metrics } = fastify.licenseCore;

  fastify.get('/health', async () => {
    return {
      status: 'ok',
      sessions: sessions.size,
      publisher: publisher.stats(),
      history: options.historyMode,
      workers: getWorkerStatus(),
    };
  });

  // GET /metrics — Prometheus exposition; pool gauges are refreshed per scrape
  fastify.get('/metrics', async (_request, reply) => {
    for (const status of await ledger.statusAll()) {
      metrics.poolChanged(status);
    }
    const body = await metrics.render();
    return reply.type(metrics.contentType).send(body);
  });

  // GET /api/version
  fastify.get('/api/version', async () => {
    return { version: options.appVersion };
  });

  // POST /api/frontend-errors — error reports from the dashboard
  fastify.post<{ Body: unknown }>('/api/frontend-errors', async (request, reply) => {
    const report = frontendErrorSchema.parse(request.body);
    request.log.warn(
      {
        source: report.source,
        lineno: report.lineno,
        colno: report.colno,
        url: report.url,
        userAgent: report.userAgent,
        stack: report.stack,
      },
      `frontend error: ${report.message}`
    );
    return reply.code(200).send({ status: 'ok' });
  });
}
