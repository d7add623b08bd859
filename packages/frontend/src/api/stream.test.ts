import { describe, it, expect, vi } from 'vitest';
import { SseParser, isSnapshot, readSnapshotStream } from './stream.js';
import { ApiError } from './client.js';
import type { Snapshot } from '../types/realtime.js';

function snapshot(tick: number): Snapshot {
  return {
    tick,
    generated_at: new Date(Date.UTC(2026, 0, 5, 12, 0, tick)).toISOString(),
    tools: [],
    rates: { borrow_per_min: 0, return_per_min: 0, failure_per_min: 0, overage_percent: 0 },
    recent_events: { borrows: [] },
    tool_metrics: {},
    buffer_stats: { total_events: 0 },
  };
}

function streamOf(chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

describe('SseParser', () => {
  it('waits for the blank line that ends an event', () => {
    const parser = new SseParser();

    expect(parser.push('data: {"ti')).toEqual([]);
    expect(parser.push('ck":1}\n')).toEqual([]);
    expect(parser.push('\n')).toEqual(['{"tick":1}']);
  });

  it('joins multi-line data', () => {
    expect(new SseParser().push('data: a\ndata: b\n\n')).toEqual(['a\nb']);
  });

  it('ignores comments and other fields', () => {
    expect(new SseParser().push(': keep-alive\n\nevent: tick\nid: 7\ndata: x\n\n')).toEqual(['x']);
  });

  it('accepts CRLF line endings split across chunks', () => {
    const parser = new SseParser();

    expect(parser.push('data: y\r')).toEqual([]);
    expect(parser.push('\n\r\n')).toEqual(['y']);
  });
});

describe('isSnapshot', () => {
  it('accepts a snapshot and rejects other JSON', () => {
    expect(isSnapshot(snapshot(1))).toBe(true);
    expect(isSnapshot({ tick: '1', tools: [] })).toBe(false);
    expect(isSnapshot(null)).toBe(false);
  });
});

describe('readSnapshotStream', () => {
  it('delivers each snapshot and reports bad frames', async () => {
    const body = streamOf([
      `data: ${JSON.stringify(snapshot(1))}\n\n`,
      'data: not json\n\n',
      'data: {"hello":1}\n\n',
      `data: ${JSON.stringify(snapshot(2)).slice(0, 10)}`,
      `${JSON.stringify(snapshot(2)).slice(10)}\n\n`,
    ]);
    const fetchImpl = vi.fn(async () => new Response(body, { status: 200 }));
    const onOpen = vi.fn();
    const ticks: number[] = [];
    const invalid: string[] = [];

    await readSnapshotStream(
      {
        onOpen,
        onSnapshot: (s) => ticks.push(s.tick),
        onInvalidFrame: (data) => invalid.push(data),
      },
      { url: '/api/realtime/stream', fetchImpl }
    );

    expect(onOpen).toHaveBeenCalledTimes(1);
    expect(ticks).toEqual([1, 2]);
    expect(invalid).toEqual(['not json', '{"hello":1}']);
  });

  it('rejects with an ApiError when the server refuses the stream', async () => {
    const fetchImpl = vi.fn(
      async () =>
        new Response(JSON.stringify({ error: 'Service Unavailable', message: 'shutting down', statusCode: 503 }), {
          status: 503,
          statusText: 'Service Unavailable',
        })
    );
    const onOpen = vi.fn();

    const result = readSnapshotStream({ onOpen, onSnapshot: vi.fn() }, { fetchImpl });

    await expect(result).rejects.toBeInstanceOf(ApiError);
    await expect(result).rejects.toMatchObject({ status: 503, message: 'shutting down' });
    expect(onOpen).not.toHaveBeenCalled();
  });
});
