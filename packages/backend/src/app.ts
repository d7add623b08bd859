import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { registerErrorHandler } from './lib/error-handler.js';
import licenseCorePlugin from './plugins/license-core.plugin.js';
import type { LicenseCore } from './core.js';
import type { EngineLogger } from './engine/logger.js';
import type { HistoryRepository } from './repositories/history.repository.js';
import { licensesRoutes } from './routes/licenses.js';
import { budgetRoutes } from './routes/budget.js';
import { realtimeRoutes } from './routes/realtime.js';
import { systemRoutes } from './routes/system.js';

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  frontendUrl: string;
  appVersion: string;
  historyMode: 'direct' | 'queue';
  repository: HistoryRepository;
  /** Builds the engine once the server logger exists. */
  createCore: (loggerFor: (module: string) => EngineLogger) => LicenseCore;
  startPublisher?: boolean;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? true,
  });

  // CORS with credentials support
  await fastify.register(cors, {
    origin: options.frontendUrl,
    credentials: true,
  });

  registerErrorHandler(fastify);

  const core = options.createCore((module) => fastify.log.child({ module }));
  await fastify.register(licenseCorePlugin, {
    core,
    repository: options.repository,
    startPublisher: options.startPublisher,
  });

  // Register API routes
  await fastify.register(systemRoutes, {
    appVersion: options.appVersion,
    historyMode: options.historyMode,
  });
  await fastify.register(licensesRoutes);
  await fastify.register(budgetRoutes);
  await fastify.register(realtimeRoutes);

  return fastify;
}
