import { describe, it, expect } from 'vitest';
import {
  ACCESS_TOKEN_LIFETIME_MS,
  ZoomTokenProvider,
} from '../../../src/infrastructure/zoom/ZoomTokenProvider.js';
import { AccessTokenGenerationError } from '../../../src/domain/errors/DomainErrors.js';
import { InMemorySecrets, jsonResponse, queuedFetch, requestUrl } from '../../helpers/fakes.js';

const NOW = 1_700_000_000_000;

function provider(secrets: InMemorySecrets, fetchFn: ReturnType<typeof queuedFetch>, authorizationCode?: string) {
  return new ZoomTokenProvider(secrets, {
    clientId: 'test-client',
    clientSecret: 'test-secret',
    authorizationCode,
    redirectUri: 'https://example.test/callback',
    authUrl: 'https://zoom.us/oauth/token',
    requestTimeoutMs: 1000,
    retryCount: 1,
    retryBaseDelayMs: 1,
    fetchFn,
    now: () => NOW,
  });
}

describe('ZoomTokenProvider', () => {
  it('should reuse a stored token that has not expired', async () => {
    const secrets = new InMemorySecrets({ refreshToken: 'r1', accessToken: 'a1', accessTokenExpiry: NOW + 1000 });
    const fetchFn = queuedFetch();
    expect(await provider(secrets, fetchFn).ensureTokenValid()).toBe('a1');
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should exchange the stored refresh token when expired', async () => {
    const secrets = new InMemorySecrets({ refreshToken: 'r1', accessToken: 'a1', accessTokenExpiry: NOW - 1 });
    const fetchFn = queuedFetch(() => jsonResponse({ access_token: 'a2', refresh_token: 'r2' }));

    expect(await provider(secrets, fetchFn).ensureTokenValid()).toBe('a2');
    expect(secrets.state).toEqual({
      refreshToken: 'r2',
      accessToken: 'a2',
      accessTokenExpiry: NOW + ACCESS_TOKEN_LIFETIME_MS,
    });
    const call = fetchFn.mock.calls[0];
    expect(call && requestUrl(call[0])).toBe('https://zoom.us/oauth/token?grant_type=refresh_token&refresh_token=r1');
    expect(call?.[1]?.headers).toMatchObject({
      Authorization: `Basic ${Buffer.from('test-client:test-secret').toString('base64')}`,
    });
  });

  it('should use the authorization code when nothing is stored', async () => {
    const secrets = new InMemorySecrets();
    const fetchFn = queuedFetch(() => jsonResponse({ access_token: 'a1', refresh_token: 'r1' }));

    await provider(secrets, fetchFn, 'test-code').ensureTokenValid();
    const call = fetchFn.mock.calls[0];
    expect(call && requestUrl(call[0])).toBe(
      'https://zoom.us/oauth/token?grant_type=authorization_code&code=test-code'
        + '&redirect_uri=https%3A%2F%2Fexample.test%2Fcallback',
    );
  });

  it('should fail without a refresh token or authorization code', async () => {
    const err = await provider(new InMemorySecrets(), queuedFetch()).ensureTokenValid().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AccessTokenGenerationError);
    expect(err).toMatchObject({ suspectKey: 'zoom.authorizationCode' });
  });

  it('should clear secrets when the grant is rejected as invalid', async () => {
    const secrets = new InMemorySecrets({ refreshToken: 'r1', accessToken: 'a1', accessTokenExpiry: NOW - 1 });
    const fetchFn = queuedFetch(() => jsonResponse({ reason: 'Invalid Token!', error: 'invalid_request' }, 400));

    const err = await provider(secrets, fetchFn).ensureTokenValid().catch((e: unknown) => e);
    expect(err).toMatchObject({ suspectKey: 'zoom.authorizationCode' });
    expect(secrets.state).toBeUndefined();
  });

  it('should point at the redirect URI on a mismatch', async () => {
    const fetchFn = queuedFetch(() => jsonResponse({ reason: 'Invalid request : Redirect URI mismatch.' }, 400));
    const err = await provider(new InMemorySecrets(), fetchFn, 'test-code').ensureTokenValid().catch((e: unknown) => e);
    expect(err).toMatchObject({ suspectKey: 'zoom.redirectUri' });
  });

  it('should blame the client credentials otherwise', async () => {
    const fetchFn = queuedFetch(() => jsonResponse({ reason: 'Invalid client_id or client_secret' }, 401));
    const err = await provider(new InMemorySecrets(), fetchFn, 'test-code').ensureTokenValid().catch((e: unknown) => e);
    expect(err).toMatchObject({ suspectKey: 'zoom.clientId or zoom.clientSecret' });
  });

  it('should not regenerate when another caller already refreshed', async () => {
    const secrets = new InMemorySecrets({ refreshToken: 'r2', accessToken: 'a2', accessTokenExpiry: NOW + 1000 });
    const fetchFn = queuedFetch();
    expect(await provider(secrets, fetchFn).refresh('a1')).toBe('a2');
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should share a single refresh between concurrent callers', async () => {
    const secrets = new InMemorySecrets({ refreshToken: 'r1', accessToken: 'a1', accessTokenExpiry: NOW - 1 });
    const fetchFn = queuedFetch(() => jsonResponse({ access_token: 'a2', refresh_token: 'r2' }));
    const tokens = provider(secrets, fetchFn);

    const results = await Promise.all([tokens.ensureTokenValid(), tokens.ensureTokenValid()]);
    expect(results).toEqual(['a2', 'a2']);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });
});
