import { describe, it, expect, vi } from 'vitest';
import { ZoomClient, type AccessTokenSource } from '../../../src/infrastructure/zoom/ZoomClient.js';
import {
  NotFoundError,
  RetryCountExceededError,
  UpstreamHttpError,
} from '../../../src/domain/errors/DomainErrors.js';
import { jsonResponse, queuedFetch, requestUrl } from '../../helpers/fakes.js';

function tokenSource(initial = 'token-1') {
  let current = initial;
  return {
    getAccessToken: vi.fn(async () => current),
    refresh: vi.fn(async () => {
      current = 'token-2';
      return current;
    }),
  } satisfies AccessTokenSource;
}

function client(fetchFn: ReturnType<typeof queuedFetch>, tokens = tokenSource()) {
  return new ZoomClient(tokens, {
    baseUrl: 'https://api.zoom.us/v2/',
    requestTimeoutMs: 1000,
    retryCount: 2,
    retryBaseDelayMs: 1,
    fetchFn,
  });
}

describe('ZoomClient', () => {
  it('should send a bearer request relative to the base url', async () => {
    const fetchFn = queuedFetch(() => jsonResponse({ id: 'u1' }));
    const result = await client(fetchFn).get('users/u1');

    expect(result).toEqual({ id: 'u1' });
    const call = fetchFn.mock.calls[0];
    expect(call && requestUrl(call[0])).toBe('https://api.zoom.us/v2/users/u1');
    expect(call?.[1]?.method).toBe('GET');
    expect(call?.[1]?.headers).toMatchObject({ authorization: 'Bearer token-1' });
  });

  it('should refresh the token once on 401 and resend', async () => {
    const tokens = tokenSource();
    const fetchFn = queuedFetch(
      () => jsonResponse({ message: 'expired' }, 401),
      () => jsonResponse({ id: 'u1' }),
    );
    const result = await client(fetchFn, tokens).get('users/u1');

    expect(result).toEqual({ id: 'u1' });
    expect(tokens.refresh).toHaveBeenCalledWith('token-1');
    expect(fetchFn.mock.calls[1]?.[1]?.headers).toMatchObject({ authorization: 'Bearer token-2' });
  });

  it('should map configured statuses to NotFoundError', async () => {
    const fetchFn = queuedFetch(() => jsonResponse({ code: 1001 }, 404));
    const err = await client(fetchFn).get('users/gone', { notFoundStatuses: [404, 400] }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ status: 404 });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should not retry other HTTP errors', async () => {
    const fetchFn = queuedFetch(() => jsonResponse({ message: 'boom' }, 500));
    await expect(client(fetchFn).get('users')).rejects.toBeInstanceOf(UpstreamHttpError);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should retry connection errors with backoff', async () => {
    const fetchFn = queuedFetch(
      () => {
        throw new TypeError('fetch failed');
      },
      () => jsonResponse({ ok: true }),
    );
    expect(await client(fetchFn).get('users')).toEqual({ ok: true });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('should give up after the retry budget', async () => {
    const failing = () => {
      throw new TypeError('fetch failed');
    };
    const fetchFn = queuedFetch(failing, failing, failing);
    await expect(client(fetchFn).get('users')).rejects.toBeInstanceOf(RetryCountExceededError);
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it('should follow next_page_token until it is empty', async () => {
    const fetchFn = queuedFetch(
      () => jsonResponse({ users: [{ id: 'a' }], next_page_token: 'p2' }),
      () => jsonResponse({ users: [{ id: 'b' }], next_page_token: '' }),
    );
    const users = await client(fetchFn).getPaginated('users?page_size=300', 'users');

    expect(users).toEqual([{ id: 'a' }, { id: 'b' }]);
    const second = fetchFn.mock.calls[1]?.[0];
    expect(second && requestUrl(second)).toBe('https://api.zoom.us/v2/users?page_size=300&next_page_token=p2');
  });
});
