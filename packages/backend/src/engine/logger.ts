import type { FastifyBaseLogger } from 'fastify';

/**
 * The slice of Fastify's pino logger the engine writes to. Components get a
 * child logger (`fastify.log.child({ module })`) in the server and plain
 * mocks in tests.
 */
export type EngineLogger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
