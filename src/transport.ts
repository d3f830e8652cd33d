import createDebug from 'debug';
import { DEFAULT_TIMEOUT } from './constants.js';
import {
  CancelledError,
  ConfigError,
  TransportError,
  errorMessage,
} from './errors.js';

const debug = createDebug('websupport-dns:http');

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface TransportOptions {
  /** Replaces the global `fetch` */
  fetch?: FetchFn;
  /** Per-request deadline in milliseconds, body included */
  timeout?: number;
}

export interface TransportRequest {
  method: 'GET' | 'POST' | 'DELETE';
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  body: string;
}

export interface Transport {
  readonly timeout: number;
  request(req: TransportRequest): Promise<TransportResponse>;
}

interface LinkedSignal {
  signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
}

/**
 * One signal that fires on the caller's abort or on the deadline, whichever comes first.
 */
function linkSignal(timeout: number, parent?: AbortSignal): LinkedSignal {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`timed out after ${timeout}ms`));
  }, timeout);
  const onAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onAbort, { once: true });

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Create the HTTP transport shared by every operation of one provider.
 *
 * Defaults to the global `fetch` with a 30 second deadline.
 */
export function createTransport(options: TransportOptions = {}): Transport {
  const fetchFn: FetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;

  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new ConfigError(
      `Websupport: timeout must be a positive number, got ${timeout}`
    );
  }

  return {
    timeout,

    async request(req: TransportRequest): Promise<TransportResponse> {
      if (req.signal?.aborted) {
        throw new CancelledError({ cause: req.signal.reason });
      }

      const linked = linkSignal(timeout, req.signal);
      try {
        const res = await fetchFn(req.url, {
          method: req.method,
          headers: req.headers,
          signal: linked.signal,
          ...(req.body !== undefined ? { body: req.body } : {}),
        });
        const body = await res.text();
        debug('%s %s -> %d', req.method, req.url, res.status);
        return { status: res.status, body };
      } catch (err) {
        debug('%s %s failed: %s', req.method, req.url, errorMessage(err));
        if (req.signal?.aborted) {
          throw new CancelledError({ cause: err });
        }
        if (linked.timedOut()) {
          throw new TransportError(
            `Websupport: ${req.method} ${req.url} timed out after ${timeout}ms`,
            { cause: err }
          );
        }
        throw new TransportError(
          `Websupport: ${req.method} ${req.url} failed: ${errorMessage(err)}`,
          { cause: err }
        );
      } finally {
        linked.dispose();
      }
    },
  };
}

/**
 * Resolve after `ms` milliseconds, or reject with `CancelledError` once `signal` aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError({ cause: signal.reason }));
  }
  if (ms <= 0) return Promise.resolve();

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError({ cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
