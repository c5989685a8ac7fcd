import {
  NotFoundError,
  UpstreamHttpError,
  isRetryableError,
} from '../../domain/errors/DomainErrors.js';
import type { JsonObject, ZoomApiPort, ZoomRequestOptions } from '../../domain/ports/ZoomApiPort.js';
import { Logger, errorMessage } from '../../shared/Logger.js';
import { withRetry } from '../../shared/RetryPolicy.js';
import { isRecord, readRecords, readString } from '../../shared/json.js';
import { httpRequest, parseJson, type FetchFn } from '../http/httpRequest.js';

export interface AccessTokenSource {
  getAccessToken(): Promise<string>;
  refresh(staleToken: string): Promise<string>;
}

export interface ZoomClientOptions {
  baseUrl: string;
  requestTimeoutMs: number;
  retryCount: number;
  retryBaseDelayMs?: number;
  fetchFn?: FetchFn;
}

/**
 * Zoom REST client
 *
 * 每次呼叫：取得 token → 送出請求 → 401 時換發 token 並重送一次 →
 * 連線錯誤/逾時以指數退避重試 → 其他非 2xx 依 notFoundStatuses 轉成 NotFoundError 或 UpstreamHttpError。
 */
export class ZoomClient implements ZoomApiPort {
  private readonly logger = new Logger('ZoomClient');
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly tokens: AccessTokenSource,
    private readonly options: ZoomClientOptions,
  ) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  get(endpoint: string, options: ZoomRequestOptions = {}): Promise<JsonObject> {
    return withRetry(() => this.requestOnce(endpoint, options), {
      maxRetries: this.options.retryCount,
      baseDelayMs: this.options.retryBaseDelayMs ?? 1000,
      isRetryable: isRetryableError,
      onRetry: (attempt, err) => {
        this.logger.warn('Error while connecting to Zoom, retrying', {
          endpoint,
          attempt,
          retryCount: this.options.retryCount,
          error: errorMessage(err),
        });
      },
    });
  }

  async getPaginated(endpoint: string, key: string, options: ZoomRequestOptions = {}): Promise<JsonObject[]> {
    const items: JsonObject[] = [];
    const separator = endpoint.includes('?') ? '&' : '?';
    let pageToken = '';
    do {
      const url = pageToken
        ? `${endpoint}${separator}next_page_token=${encodeURIComponent(pageToken)}`
        : endpoint;
      const page = await this.get(url, options);
      items.push(...readRecords(page, key));
      pageToken = readString(page, 'next_page_token');
    } while (pageToken);
    return items;
  }

  private async requestOnce(endpoint: string, options: ZoomRequestOptions): Promise<JsonObject> {
    const url = new URL(endpoint, this.options.baseUrl).toString();

    let token = await this.tokens.getAccessToken();
    let response = await this.send(url, token);
    if (response.status === 401) {
      this.logger.debug('Access token rejected, regenerating', { endpoint });
      token = await this.tokens.refresh(token);
      response = await this.send(url, token);
    }

    const text = await response.text();
    if (response.ok) {
      const body = parseJson(text);
      if (!isRecord(body)) {
        throw new UpstreamHttpError(`Zoom returned a non-object body for ${endpoint}`, response.status, text);
      }
      return body;
    }

    if (options.notFoundStatuses?.includes(response.status)) {
      throw new NotFoundError(`Zoom object not found: ${endpoint}`, response.status);
    }
    throw new UpstreamHttpError(
      `Zoom request ${endpoint} failed with status ${response.status}`,
      response.status,
      text,
    );
  }

  private send(url: string, token: string): Promise<Response> {
    return httpRequest(this.fetchFn, url, {
      method: 'GET',
      headers: {
        authorization: `Bearer ${token}`,
        'content-type': 'application/json',
      },
    }, this.options.requestTimeoutMs);
  }
}
