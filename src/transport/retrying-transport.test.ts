// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { createRetryingTransport } from './retrying-transport.ts';
import { computeBackoff, DEFAULT_RETRY_POLICY } from './retry.ts';
import { createFetchSender } from './http.ts';
import type { HttpRequest, HttpResponse, HttpSender } from './types.ts';
import type { RetryPolicy } from '../config/schema.ts';
import type { RateLimiter } from '../ratelimit/types.ts';
import type { Clock } from '../timing/clock.ts';
import { abortReason } from '../timing/clock.ts';
import { TransportError } from '../errors/index.ts';

function response(status: number, data?: unknown, headers: Record<string, string> = {}): HttpResponse {
  return {
    status,
    headers,
    text: data === undefined ? '' : JSON.stringify(data),
    data,
  };
}

function connectionRefused(): Error {
  const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:8200'), { code: 'ECONNREFUSED' });
  return new TypeError('fetch failed', { cause });
}

function scriptedSender(script: Array<HttpResponse | Error>): { send: HttpSender; requests: Array<HttpRequest> } {
  const requests: Array<HttpRequest> = [];
  return {
    requests,
    send: async (request) => {
      const step = script[Math.min(requests.length, script.length - 1)];
      requests.push(request);
      if (!step) {
        throw new Error('empty script');
      }
      if (step instanceof Error) {
        throw step;
      }
      return step;
    },
  };
}

function recordingClock(): Clock & { sleeps: Array<number> } {
  let now = 0;
  const sleeps: Array<number> = [];
  return {
    sleeps,
    now: () => now,
    async sleep(ms, signal) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      sleeps.push(ms);
      now += ms;
    },
  };
}

const policy: RetryPolicy = {
  ...DEFAULT_RETRY_POLICY,
  max_attempts: 4,
  base_delay_ms: 100,
  multiplier: 2,
  max_delay_ms: 10_000,
  jitter: 0.2,
};

const GET_ITEMS: HttpRequest = { method: 'GET', url: '/items', idempotent: true };

describe('RetryingTransport', () => {
  describe('attempt accounting', () => {
    it('succeeds after k transient failures and reports k+1 attempts', async () => {
      const { send, requests } = scriptedSender([response(503), response(503), response(200, { ok: true })]);
      const transport = createRetryingTransport({ send, policy, clock: recordingClock(), random: () => 0.5 });

      const result = await transport.execute(GET_ITEMS);

      expect(result.attempts).toBe(3);
      expect(result.response.data).toEqual({ ok: true });
      expect(requests).toHaveLength(3);
    });

    it('fails with TransportError after exactly max_attempts tries', async () => {
      const { send, requests } = scriptedSender([response(503)]);
      const transport = createRetryingTransport({
        send,
        policy: { ...policy, max_attempts: 2 },
        clock: recordingClock(),
        random: () => 0.5,
      });

      const error = await transport.execute(GET_ITEMS).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.attempts).toBe(2);
        expect(error.failure).toBe('unavailable');
        expect(error.status).toBe(503);
        expect(error.elapsed_ms).toBe(100);
        expect(error.message).toBe('GET /items failed: HTTP 503 (unavailable, 2 attempts, 100ms)');
      }
      expect(requests).toHaveLength(2);
    });
  });

  describe('idempotency', () => {
    it('does not retry an ambiguous failure for a non-idempotent request', async () => {
      const { send, requests } = scriptedSender([response(500), response(200)]);
      const transport = createRetryingTransport({ send, policy, clock: recordingClock() });

      const promise = transport.execute({ method: 'POST', url: '/items', body: { name: 'a' } });

      await expect(promise).rejects.toThrow('(server, 1 attempt, 0ms)');
      expect(requests).toHaveLength(1);
    });

    it('sends a non-idempotent request once when the server answers 503', async () => {
      const { send, requests } = scriptedSender([response(503), response(200)]);
      const transport = createRetryingTransport({ send, policy, clock: recordingClock(), random: () => 0.5 });

      const error = await transport.execute({ method: 'POST', url: '/items', body: { name: 'a' } }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.failure).toBe('unavailable');
        expect(error.attempts).toBe(1);
      }
      expect(requests).toHaveLength(1);
    });

    it('retries a non-idempotent request when the failure is provably pre-execution', async () => {
      const { send, requests } = scriptedSender([connectionRefused(), response(201, { id: 7 })]);
      const transport = createRetryingTransport({ send, policy, clock: recordingClock(), random: () => 0.5 });

      const result = await transport.execute({ method: 'POST', url: '/items', body: { name: 'a' } });

      expect(result.attempts).toBe(2);
      expect(result.response.status).toBe(201);
      expect(requests).toHaveLength(2);
    });

    it('retries an ambiguous failure when the request is idempotent', async () => {
      const { send } = scriptedSender([response(500), response(200)]);
      const transport = createRetryingTransport({ send, policy, clock: recordingClock(), random: () => 0.5 });

      const result = await transport.execute(GET_ITEMS);

      expect(result.attempts).toBe(2);
    });

    it('never retries client errors', async () => {
      const { send, requests } = scriptedSender([response(404, { errors: [] })]);
      const transport = createRetryingTransport({ send, policy, clock: recordingClock() });

      const error = await transport.execute(GET_ITEMS).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.failure).toBe('client');
        expect(error.status).toBe(404);
      }
      expect(requests).toHaveLength(1);
    });

    it('honors a per-request retry_on override', async () => {
      const { send, requests } = scriptedSender([response(503), response(200)]);
      const transport = createRetryingTransport({ send, policy, clock: recordingClock() });

      await expect(
        transport.execute(GET_ITEMS, { policy: { retry_on: ['connection'] } }),
      ).rejects.toBeInstanceOf(TransportError);
      expect(requests).toHaveLength(1);
    });
  });

  describe('backoff', () => {
    it('grows exponentially between attempts', async () => {
      const { send } = scriptedSender([response(503), response(503), response(503), response(200)]);
      const clock = recordingClock();
      const transport = createRetryingTransport({ send, policy, clock, random: () => 0.5 });

      await transport.execute(GET_ITEMS);

      expect(clock.sleeps).toEqual([100, 200, 400]);
    });

    it('caps the delay at max_delay_ms', async () => {
      const { send } = scriptedSender([response(503), response(503), response(200)]);
      const clock = recordingClock();
      const transport = createRetryingTransport({
        send,
        policy: { ...policy, base_delay_ms: 100, multiplier: 10, max_delay_ms: 500 },
        clock,
        random: () => 0.5,
      });

      await transport.execute(GET_ITEMS);

      expect(clock.sleeps).toEqual([100, 500]);
    });

    it('waits at least as long as Retry-After on a 429', async () => {
      const { send } = scriptedSender([response(429, undefined, { 'retry-after': '2' }), response(200)]);
      const clock = recordingClock();
      const transport = createRetryingTransport({ send, policy, clock, random: () => 0.5 });

      await transport.execute({ method: 'POST', url: '/items' });

      expect(clock.sleeps).toEqual([2000]);
    });

    it('keeps jitter inside the configured bounds', () => {
      const p = { ...policy, jitter: 0.1 };
      expect(computeBackoff(1, p, () => 0)).toBe(90);
      expect(computeBackoff(1, p, () => 1)).toBe(110);
      expect(computeBackoff(3, p, () => 0.5)).toBe(400);
    });
  });

  describe('composition and cancellation', () => {
    it('passes every attempt through the rate limiter first', async () => {
      let acquisitions = 0;
      const limiter: RateLimiter = {
        mode: 'blocking',
        async acquire() {
          acquisitions++;
        },
        tryAcquire: () => true,
        snapshot: () => ({ capacity: 1, refill_per_second: 1, tokens: 1, last_refill: 0, waiting: 0 }),
      };
      const { send } = scriptedSender([response(503), response(503), response(200)]);
      const transport = createRetryingTransport({ send, policy, limiter, clock: recordingClock() });

      const result = await transport.execute(GET_ITEMS);

      expect(acquisitions).toBe(result.attempts);
      expect(acquisitions).toBe(3);
    });

    it('stops retrying when the caller cancels during backoff', async () => {
      const controller = new AbortController();
      const clock: Clock = {
        now: () => 0,
        async sleep(_ms, signal) {
          controller.abort();
          if (signal?.aborted) {
            throw abortReason(signal);
          }
        },
      };
      const { send, requests } = scriptedSender([response(503), response(200)]);
      const transport = createRetryingTransport({ send, policy, clock });

      const error = await transport
        .execute(GET_ITEMS, { signal: controller.signal })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.failure).toBe('cancelled');
        expect(error.attempts).toBe(1);
      }
      expect(requests).toHaveLength(1);
    });

    it('returns a 2xx response carrying a vendor error payload untouched', async () => {
      const { send } = scriptedSender([response(200, { ok: false, error: 'channel_not_found' })]);
      const transport = createRetryingTransport({ send, policy, clock: recordingClock() });

      const result = await transport.execute(GET_ITEMS);

      expect(result.attempts).toBe(1);
      expect(result.response.data).toEqual({ ok: false, error: 'channel_not_found' });
    });

    it('propagates errors that are not transport failures without retrying', async () => {
      const bug = new RangeError('bad input');
      const { send, requests } = scriptedSender([bug]);
      const transport = createRetryingTransport({ send, policy, clock: recordingClock() });

      await expect(transport.execute(GET_ITEMS)).rejects.toBe(bug);
      expect(requests).toHaveLength(1);
    });
  });
});

describe('createFetchSender', () => {
  it('joins the base URL, encodes query and JSON body, and parses JSON responses', async () => {
    const seen: Array<{ url: string; init: RequestInit | undefined }> = [];
    const fakeFetch: typeof fetch = async (input, init) => {
      seen.push({ url: String(input), init });
      return new Response(JSON.stringify({ id: 1 }), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      });
    };

    const send = createFetchSender({
      base_url: 'https://api.example.test/v2',
      default_headers: { 'user-agent': 'connector-kit' },
      fetch: fakeFetch,
    });

    const result = await send({
      method: 'POST',
      url: '/users',
      query: { page_size: 30, next: undefined },
      body: { email: 'a@example.test' },
    });

    expect(seen[0]?.url).toBe('https://api.example.test/v2/users?page_size=30');
    expect(seen[0]?.init?.method).toBe('POST');
    expect(seen[0]?.init?.body).toBe('{"email":"a@example.test"}');
    expect(seen[0]?.init?.headers).toEqual({
      accept: 'application/json',
      'user-agent': 'connector-kit',
      'content-type': 'application/json',
    });
    expect(result).toEqual({
      status: 200,
      headers: { 'content-type': 'application/json' },
      text: '{"id":1}',
      data: { id: 1 },
    });
  });
});
