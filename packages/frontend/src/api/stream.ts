import type { Snapshot } from '../types/realtime.js';
import { API_BASE, toApiError } from './client.js';

export const STREAM_URL = `${API_BASE}/realtime/stream`;

/**
 * Incremental parser for `text/event-stream` bodies. Feed it decoded text in
 * whatever chunks the network delivers; it returns the data of each complete
 * event. Comment lines and fields other than `data` are ignored.
 */
export class SseParser {
  private buffer = '';
  private data: string[] = [];

  push(chunk: string): string[] {
    this.buffer += chunk;
    const events: string[] = [];

    let newline = this.buffer.search(/\r\n|\r|\n/);
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline);
      const width = this.buffer.startsWith('\r\n', newline) ? 2 : 1;
      // A lone \r at the end may be the first half of \r\n
      if (width === 1 && this.buffer[newline] === '\r' && newline === this.buffer.length - 1) {
        break;
      }
      this.buffer = this.buffer.slice(newline + width);

      if (line === '') {
        if (this.data.length > 0) {
          events.push(this.data.join('\n'));
          this.data = [];
        }
      } else if (line.startsWith('data:')) {
        const value = line.slice(5);
        this.data.push(value.startsWith(' ') ? value.slice(1) : value);
      }

      newline = this.buffer.search(/\r\n|\r|\n/);
    }

    return events;
  }
}

export function isSnapshot(value: unknown): value is Snapshot {
  return (
    typeof value === 'object' &&
    value !== null &&
    'tick' in value &&
    typeof value.tick === 'number' &&
    'tools' in value &&
    Array.isArray(value.tools) &&
    'tool_metrics' in value &&
    typeof value.tool_metrics === 'object'
  );
}

export interface StreamHandlers {
  /** The server accepted the stream. */
  onOpen(): void;
  onSnapshot(snapshot: Snapshot): void;
  /** A frame that was not a snapshot. The stream stays open. */
  onInvalidFrame?(data: string, error: unknown): void;
}

export interface StreamOptions {
  url?: string;
  signal?: AbortSignal;
  fetchImpl?: typeof fetch;
}

/**
 * Read the snapshot stream until the server ends it. Resolves when the body
 * ends and rejects on a failed response or a network error; aborting through
 * `signal` rejects with the abort error.
 */
export async function readSnapshotStream(handlers: StreamHandlers, options: StreamOptions = {}): Promise<void> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const response = await fetchImpl(options.url ?? STREAM_URL, {
    headers: { Accept: 'text/event-stream' },
    credentials: 'include',
    signal: options.signal,
  });

  if (!response.ok) {
    throw await toApiError(response);
  }
  if (!response.body) {
    throw new Error('Snapshot stream has no body');
  }

  handlers.onOpen();

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  const parser = new SseParser();

  for (;;) {
    const { value, done } = await reader.read();
    if (done) {
      return;
    }
    for (const data of parser.push(decoder.decode(value, { stream: true }))) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(data);
      } catch (err) {
        handlers.onInvalidFrame?.(data, err);
        continue;
      }
      if (isSnapshot(parsed)) {
        handlers.onSnapshot(parsed);
      } else {
        handlers.onInvalidFrame?.(data, new Error('frame is not a snapshot'));
      }
    }
  }
}
