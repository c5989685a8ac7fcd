import { z } from 'zod';
import {
  AccessTokenGenerationError,
  UpstreamHttpError,
  isRetryableError,
} from '../../domain/errors/DomainErrors.js';
import type { CredentialState } from '../../domain/entities/Credentials.js';
import type { SecretsPort } from '../../domain/ports/StoragePort.js';
import { Logger, errorMessage } from '../../shared/Logger.js';
import { Mutex } from '../../shared/Mutex.js';
import { withRetry } from '../../shared/RetryPolicy.js';
import { isRecord, readString } from '../../shared/json.js';
import { httpRequest, parseJson, type FetchFn } from '../http/httpRequest.js';

/** Zoom 發出的 access token 實際效期為 3600 秒，保留 100 秒緩衝 */
export const ACCESS_TOKEN_LIFETIME_MS = 3500 * 1000;

const INVALID_CODE_REASONS = ['Invalid Token!', 'Invalid authorization code'];
const REDIRECT_MISMATCH_REASON = 'Invalid request : Redirect URI mismatch.';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
});

export interface ZoomTokenProviderOptions {
  clientId: string;
  clientSecret: string;
  authorizationCode?: string;
  redirectUri?: string;
  authUrl: string;
  requestTimeoutMs: number;
  retryCount: number;
  retryBaseDelayMs?: number;
  fetchFn?: FetchFn;
  now?: () => number;
}

/**
 * OAuth token 管理。
 * 所有讀寫都在同一把 mutex 內；等鎖期間若已由其他呼叫端換發，直接沿用新 token。
 */
export class ZoomTokenProvider {
  private readonly mutex = new Mutex();
  private readonly logger = new Logger('ZoomTokenProvider');
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(
    private readonly secrets: SecretsPort,
    private readonly options: ZoomTokenProviderOptions,
  ) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? Date.now;
  }

  /** 回傳有效的 access token，過期時換發 */
  ensureTokenValid(): Promise<string> {
    return this.mutex.runExclusive(async () => {
      const stored = this.secrets.getCredentials();
      if (stored && stored.accessTokenExpiry > this.now()) {
        return stored.accessToken;
      }
      return this.generate(stored?.refreshToken);
    });
  }

  getAccessToken(): Promise<string> {
    return this.ensureTokenValid();
  }

  /** 上游回 401 時呼叫；staleToken 已被其他呼叫端換掉時不再重複換發 */
  refresh(staleToken: string): Promise<string> {
    return this.mutex.runExclusive(async () => {
      const stored = this.secrets.getCredentials();
      if (stored && stored.accessToken !== staleToken && stored.accessTokenExpiry > this.now()) {
        return stored.accessToken;
      }
      return this.generate(stored?.refreshToken);
    });
  }

  private async generate(refreshToken: string | undefined): Promise<string> {
    const { clientId, authorizationCode, redirectUri } = this.options;
    const params = new URLSearchParams();
    if (refreshToken) {
      params.set('grant_type', 'refresh_token');
      params.set('refresh_token', refreshToken);
    } else if (authorizationCode) {
      params.set('grant_type', 'authorization_code');
      params.set('code', authorizationCode);
      params.set('redirect_uri', redirectUri ?? '');
    } else {
      throw new AccessTokenGenerationError(
        'zoom.authorizationCode',
        'no refresh token is stored and no authorization code is configured',
      );
    }

    this.logger.info('Generating the access token and updating refresh token', { clientId });
    const state = await withRetry(() => this.requestToken(`${this.options.authUrl}?${params.toString()}`), {
      maxRetries: this.options.retryCount,
      baseDelayMs: this.options.retryBaseDelayMs ?? 1000,
      isRetryable: isRetryableError,
      onRetry: (attempt, err) => {
        this.logger.warn('Retrying token request', { attempt, error: errorMessage(err) });
      },
    });
    this.secrets.saveCredentials(state);
    return state.accessToken;
  }

  private async requestToken(url: string): Promise<CredentialState> {
    const { clientId, clientSecret, requestTimeoutMs } = this.options;
    const response = await httpRequest(this.fetchFn, url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
        Authorization: `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString('base64')}`,
      },
    }, requestTimeoutMs);

    const text = await response.text();
    const body = parseJson(text);

    if (!response.ok) {
      if (response.status === 400 || response.status === 401) {
        const reason = isRecord(body) ? readString(body, 'reason') : '';
        if (INVALID_CODE_REASONS.includes(reason)) {
          this.secrets.clear();
          throw new AccessTokenGenerationError('zoom.authorizationCode', reason);
        }
        if (reason === REDIRECT_MISMATCH_REASON) {
          throw new AccessTokenGenerationError('zoom.redirectUri', reason);
        }
        throw new AccessTokenGenerationError('zoom.clientId or zoom.clientSecret', reason || `HTTP ${response.status}`);
      }
      throw new UpstreamHttpError(`Token endpoint returned ${response.status}`, response.status, text);
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AccessTokenGenerationError('zoom.clientId or zoom.clientSecret', 'token response is missing tokens');
    }
    return {
      refreshToken: parsed.data.refresh_token,
      accessToken: parsed.data.access_token,
      accessTokenExpiry: this.now() + ACCESS_TOKEN_LIFETIME_MS,
    };
  }
}
