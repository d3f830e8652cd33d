import { describe, it, expect, vi } from 'vitest';
import { createTransport, delay } from '../src/transport.js';
import { CancelledError, ConfigError, TransportError } from '../src/errors.js';

function textResponse(status: number, body: string) {
  return { status, text: () => Promise.resolve(body) };
}

/** A fetch that only settles when its signal aborts */
function hangingFetch() {
  return vi.fn(
    (_url: string, init: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init.signal?.addEventListener('abort', () =>
          reject(new Error('This operation was aborted'))
        );
      })
  );
}

describe('createTransport', () => {
  it('defaults to a 30 second timeout', () => {
    expect(createTransport({ fetch: vi.fn() }).timeout).toBe(30_000);
  });

  it('rejects a non-positive timeout', () => {
    expect(() => createTransport({ timeout: 0 })).toThrow(ConfigError);
  });

  it('returns the status and body', async () => {
    const fetchFn = vi.fn().mockResolvedValueOnce(textResponse(200, '{"ok":true}'));
    const transport = createTransport({ fetch: fetchFn });

    const res = await transport.request({
      method: 'POST',
      url: 'https://api.test/records',
      headers: { Accept: 'application/json' },
      body: '{}',
    });

    expect(res).toEqual({ status: 200, body: '{"ok":true}' });
    expect(fetchFn).toHaveBeenCalledWith(
      'https://api.test/records',
      expect.objectContaining({
        method: 'POST',
        headers: { Accept: 'application/json' },
        body: '{}',
      })
    );
  });

  it('sends no body when none is given', async () => {
    const fetchFn = vi.fn().mockResolvedValueOnce(textResponse(204, ''));
    const transport = createTransport({ fetch: fetchFn });

    await transport.request({ method: 'DELETE', url: 'https://api.test/records/1', headers: {} });

    expect(fetchFn.mock.calls[0]![1]).not.toHaveProperty('body');
  });

  it('wraps network failures in a TransportError', async () => {
    const fetchFn = vi.fn().mockRejectedValueOnce(new TypeError('fetch failed'));
    const transport = createTransport({ fetch: fetchFn });

    const err = await transport
      .request({ method: 'GET', url: 'https://api.test/records', headers: {} })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).not.toBeInstanceOf(CancelledError);
    expect(err).toMatchObject({
      message: 'Websupport: GET https://api.test/records failed: fetch failed',
    });
  });

  it('times out a request that never answers', async () => {
    const transport = createTransport({ fetch: hangingFetch(), timeout: 20 });

    await expect(
      transport.request({ method: 'GET', url: 'https://api.test/slow', headers: {} })
    ).rejects.toThrow('Websupport: GET https://api.test/slow timed out after 20ms');
  });

  it('reports caller cancellation as CancelledError', async () => {
    const transport = createTransport({ fetch: hangingFetch() });
    const controller = new AbortController();

    const pending = transport.request({
      method: 'GET',
      url: 'https://api.test/slow',
      headers: {},
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('delay', () => {
  it('resolves after the wait', async () => {
    vi.useFakeTimers();
    try {
      const done = vi.fn();
      const pending = delay(1000).then(done);

      await vi.advanceTimersByTimeAsync(999);
      expect(done).not.toHaveBeenCalled();
      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(done).toHaveBeenCalledTimes(1);
    } finally {
      vi.useRealTimers();
    }
  });

  it('rejects when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = delay(60_000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('rejects at once for an aborted signal', async () => {
    await expect(delay(0, AbortSignal.abort())).rejects.toBeInstanceOf(
      CancelledError
    );
  });
});
