import fp from 'fastify-plugin';
import { FastifyInstance } from 'fastify';
import type { LicenseCore } from '../core.js';
import type { HistoryRepository } from '../repositories/history.repository.js';

export interface LicenseCorePluginOptions {
  core: LicenseCore;
  repository: HistoryRepository;
  /** Start the snapshot timer once the server is ready. Defaults to true. */
  startPublisher?: boolean;
}

declare module 'fastify' {
  interface FastifyInstance {
    licenseCore: LicenseCore;
    historyRepository: HistoryRepository;
  }
}

async function licenseCorePlugin(
  fastify: FastifyInstance,
  options: LicenseCorePluginOptions
): Promise<void> {
  const { core, repository } = options;

  fastify.decorate('licenseCore', core);
  fastify.decorate('historyRepository', repository);

  if (options.startPublisher ?? true) {
    fastify.addHook('onReady', async () => {
      core.publisher.start();
    });
  }

  // Open SSE responses would otherwise keep the server from closing
  fastify.addHook('preClose', async () => {
    core.sessions.closeAll('shutdown');
  });

  fastify.addHook('onClose', async () => {
    core.publisher.stop();
  });
}

export default fp(licenseCorePlugin, {
  name: 'license-core',
});
