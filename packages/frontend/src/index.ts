export * from './types/realtime.js';
export * from './api/client.js';
export * from './api/stream.js';
export * from './lib/backoff.js';
export * from './lib/metrics.js';
export * from './stores/realtime.store.js';
