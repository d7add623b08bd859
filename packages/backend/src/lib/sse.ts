import type { OutgoingHttpHeader, ServerResponse } from 'http';
import type { SessionTransport } from '../engine/streaming/stream-session.js';

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no',
} as const;

/** One `data:` frame; multi-line payloads get one `data:` line each. */
export function formatSseFrame(payload: string): string {
  return payload
    .split('\n')
    .map((line) => `data: ${line}`)
    .join('\n')
    .concat('\n\n');
}

/**
 * Wrap a raw HTTP response as a session transport. The caller must have
 * taken the response away from the framework (e.g. `reply.hijack()`), so
 * headers already set on the reply are passed in as `extraHeaders`.
 */
export function createSseTransport(
  raw: ServerResponse,
  extraHeaders: NodeJS.Dict<OutgoingHttpHeader> = {}
): SessionTransport {
  raw.writeHead(200, { ...SSE_HEADERS, ...extraHeaders });
  raw.flushHeaders();

  return {
    send(payload) {
      return new Promise<void>((resolve, reject) => {
        if (raw.writableEnded || raw.destroyed) {
          reject(new Error('stream already closed'));
          return;
        }
        raw.write(formatSseFrame(payload), (err) => {
          if (err) {
            reject(err);
          } else {
            resolve();
          }
        });
      });
    },
    close() {
      if (!raw.writableEnded) {
        raw.end();
      }
    },
    onClose(listener) {
      raw.on('close', listener);
    },
  };
}
