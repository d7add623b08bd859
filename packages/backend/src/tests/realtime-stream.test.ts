import { describe, it, expect, vi } from 'vitest';
import { formatSseFrame } from '../lib/sse.js';
import type { SnapshotMessage } from '../engine/streaming/snapshot.js';
import { buildTestApp, parseJsonResponse } from './setup.js';

describe('formatSseFrame', () => {
  it('wraps a single-line payload', () => {
    expect(formatSseFrame('{"tick":1}')).toBe('data: {"tick":1}\n\n');
  });

  it('prefixes every line of a multi-line payload', () => {
    expect(formatSseFrame('a\nb')).toBe('data: a\ndata: b\n\n');
  });
});

describe('GET /api/realtime/stream', () => {
  it('sends the current snapshot on connect and each published tick after it', async () => {
    const { app, core } = await buildTestApp();
    await app.listen({ port: 0, host: '127.0.0.1' });

    try {
      const address = app.server.address();
      if (!address || typeof address === 'string') {
        throw new Error('server is not listening on a port');
      }

      const controller = new AbortController();
      const response = await fetch(`http://127.0.0.1:${address.port}/api/realtime/stream`, {
        signal: controller.signal,
      });
      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('text/event-stream');
      if (!response.body) {
        throw new Error('stream has no body');
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      let buffer = '';
      const nextFrame = async (): Promise<SnapshotMessage> => {
        while (!buffer.includes('\n\n')) {
          const { value, done } = await reader.read();
          if (done) {
            throw new Error('stream ended');
          }
          buffer += decoder.decode(value, { stream: true });
        }
        const end = buffer.indexOf('\n\n');
        const frame = buffer.slice(0, end);
        buffer = buffer.slice(end + 2);
        return parseJsonResponse<SnapshotMessage>({ body: frame.slice('data: '.length) });
      };

      const first = await nextFrame();
      expect(first.tick).toBe(0);
      expect(first.tools.map((tool) => tool.tool)).toEqual(['cad-suite']);
      expect(core.sessions.size).toBe(1);

      await core.ledger.borrow('cad-suite', 'alice');
      await core.publisher.tick();

      const second = await nextFrame();
      expect(second.tick).toBe(1);
      expect(second.tools[0].borrowed).toBe(1);

      controller.abort();
      await vi.waitFor(() => {
        expect(core.sessions.size).toBe(0);
      });
    } finally {
      await app.close();
    }
  });
});
