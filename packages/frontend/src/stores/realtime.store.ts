import { createStore } from 'zustand/vanilla';
import { readSnapshotStream, type StreamHandlers } from '../api/stream.js';
import { RECONNECT_POLICY, canRetry, reconnectDelay, type ReconnectPolicy } from '../lib/backoff.js';
import { DEFAULT_TIME_RANGE } from '../lib/metrics.js';
import type { Snapshot } from '../types/realtime.js';

export type ConnectionStatus = 'idle' | 'connecting' | 'connected' | 'reconnecting' | 'failed';

export interface RealtimeState {
  status: ConnectionStatus;
  /** Latest snapshot; each message replaces it wholesale. */
  snapshot: Snapshot | null;
  /** Reconnect attempts since the last successful open. */
  attempt: number;
  retryDelayMs: number | null;
  lastError: string | null;
  windowSeconds: number;
  /** Pool shown in the detail charts, or 'all' for the overview. */
  selectedTool: string;

  connect: () => void;
  disconnect: () => void;
  setWindow: (seconds: number) => void;
  selectTool: (tool: string) => void;
}

export type OpenStream = (handlers: StreamHandlers, signal: AbortSignal) => Promise<void>;

export interface RealtimeStoreOptions {
  openStream?: OpenStream;
  policy?: ReconnectPolicy;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createRealtimeStore(options: RealtimeStoreOptions = {}) {
  const openStream: OpenStream =
    options.openStream ?? ((handlers, signal) => readSnapshotStream(handlers, { signal }));
  const policy = options.policy ?? RECONNECT_POLICY;

  let controller: AbortController | null = null;
  let retryTimer: ReturnType<typeof setTimeout> | null = null;

  return createStore<RealtimeState>()((set, get) => {
    const open = () => {
      const current = new AbortController();
      controller = current;
      set({ status: get().attempt === 0 ? 'connecting' : 'reconnecting' });

      const dropped = (err: unknown) => {
        if (current.signal.aborted || controller !== current) {
          return;
        }
        const attempt = get().attempt;
        if (!canRetry(attempt, policy)) {
          controller = null;
          set({ status: 'failed', retryDelayMs: null, lastError: errorMessage(err) });
          return;
        }
        const retryDelayMs = reconnectDelay(attempt + 1, policy);
        set({ status: 'reconnecting', attempt: attempt + 1, retryDelayMs, lastError: errorMessage(err) });
        retryTimer = setTimeout(() => {
          retryTimer = null;
          open();
        }, retryDelayMs);
      };

      void openStream(
        {
          onOpen: () => set({ status: 'connected', attempt: 0, retryDelayMs: null, lastError: null }),
          onSnapshot: (snapshot) => set({ snapshot }),
          onInvalidFrame: (_data, err) => set({ lastError: errorMessage(err) }),
        },
        current.signal
      ).then(
        () => dropped(new Error('stream closed by server')),
        dropped
      );
    };

    return {
      status: 'idle',
      snapshot: null,
      attempt: 0,
      retryDelayMs: null,
      lastError: null,
      windowSeconds: DEFAULT_TIME_RANGE,
      selectedTool: 'all',

      connect: () => {
        if (controller) {
          return;
        }
        set({ attempt: 0 });
        open();
      },

      disconnect: () => {
        if (retryTimer) {
          clearTimeout(retryTimer);
          retryTimer = null;
        }
        controller?.abort();
        controller = null;
        set({ status: 'idle', attempt: 0, retryDelayMs: null });
      },

      setWindow: (seconds) => set({ windowSeconds: seconds }),

      selectTool: (tool) => set({ selectedTool: tool }),
    };
  });
}

export type RealtimeStore = ReturnType<typeof createRealtimeStore>;

export const realtimeStore = createRealtimeStore();
