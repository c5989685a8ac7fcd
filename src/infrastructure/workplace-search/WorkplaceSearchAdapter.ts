import { z } from 'zod';
import type { SyncDocument } from '../../domain/entities/SyncDocument.js';
import { IndexingError, UpstreamHttpError, isRetryableError } from '../../domain/errors/DomainErrors.js';
import type {
  ContentSourceDefinition,
  IndexResult,
  SearchIndexPort,
  UserPermissions,
} from '../../domain/ports/SearchIndexPort.js';
import { Logger, errorMessage } from '../../shared/Logger.js';
import { withRetry } from '../../shared/RetryPolicy.js';
import { httpRequest, parseJson, type FetchFn } from '../http/httpRequest.js';

const bulkResultSchema = z.object({
  results: z.array(z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    errors: z.array(z.string()).default([]),
  })),
});

const permissionsPageSchema = z.object({
  meta: z.object({
    page: z.object({ current: z.number(), total_pages: z.number() }),
  }).optional(),
  results: z.array(z.object({
    user: z.string(),
    permissions: z.array(z.string()),
  })),
});

const contentSourceSchema = z.object({ id: z.string() });

export interface WorkplaceSearchOptions {
  hostUrl: string;
  apiKey: string;
  sourceId: string;
  requestTimeoutMs: number;
  retryCount: number;
  retryBaseDelayMs?: number;
  fetchFn?: FetchFn;
}

/**
 * Workplace Search custom source REST API adapter
 * 端點皆在 /api/ws/v1 之下，以 Bearer API key 驗證。
 */
export class WorkplaceSearchAdapter implements SearchIndexPort {
  private readonly logger = new Logger('WorkplaceSearchAdapter');
  private readonly fetchFn: FetchFn;
  private readonly baseUrl: string;

  constructor(private readonly options: WorkplaceSearchOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.baseUrl = `${options.hostUrl.replace(/\/+$/, '')}/api/ws/v1`;
  }

  private get sourcePath(): string {
    return `/sources/${encodeURIComponent(this.options.sourceId)}`;
  }

  async indexDocuments(docs: SyncDocument[]): Promise<IndexResult[]> {
    if (docs.length === 0) return [];
    const body = await this.post(`${this.sourcePath}/documents/bulk_create`, docs);
    return this.parse(bulkResultSchema, body, 'bulk_create').results;
  }

  async deleteDocuments(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    const body = await this.post(`${this.sourcePath}/documents/bulk_destroy`, ids);
    for (const result of this.parse(bulkResultSchema, body, 'bulk_destroy').results) {
      if (result.errors.length > 0) {
        this.logger.warn('Unable to delete document', { id: result.id, errors: result.errors });
      }
    }
  }

  async listPermissions(): Promise<UserPermissions[]> {
    const permissions: UserPermissions[] = [];
    for (let page = 1; ; page++) {
      const body = await this.request('GET', `${this.sourcePath}/permissions?page[current]=${page}`);
      const parsed = this.parse(permissionsPageSchema, body, 'permissions');
      permissions.push(...parsed.results);
      if (!parsed.meta || parsed.meta.page.current >= parsed.meta.page.total_pages) break;
    }
    return permissions;
  }

  async addUserPermissions(user: string, permissions: string[]): Promise<void> {
    await this.post(`${this.sourcePath}/permissions/${encodeURIComponent(user)}/add`, { permissions });
  }

  async removeUserPermissions(user: string, permissions: string[]): Promise<void> {
    await this.post(`${this.sourcePath}/permissions/${encodeURIComponent(user)}/remove`, { permissions });
  }

  async createContentSource(definition: ContentSourceDefinition): Promise<{ id: string }> {
    const body = await this.post('/sources', definition);
    return this.parse(contentSourceSchema, body, 'sources');
  }

  private post(path: string, payload: unknown): Promise<unknown> {
    return this.request('POST', path, payload);
  }

  private request(method: 'GET' | 'POST', path: string, payload?: unknown): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    return withRetry(async () => {
      const response = await httpRequest(this.fetchFn, url, {
        method,
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: payload === undefined ? undefined : JSON.stringify(payload),
      }, this.options.requestTimeoutMs);

      const text = await response.text();
      if (!response.ok) {
        throw new UpstreamHttpError(
          `Workplace Search ${method} ${path} failed with status ${response.status}`,
          response.status,
          text,
        );
      }
      return parseJson(text);
    }, {
      maxRetries: this.options.retryCount,
      baseDelayMs: this.options.retryBaseDelayMs ?? 1000,
      isRetryable: isRetryableError,
      onRetry: (attempt, err) => {
        this.logger.warn('Error while connecting to Workplace Search, retrying', { path, attempt, error: errorMessage(err) });
      },
    });
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, endpoint: string): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new IndexingError(`Unexpected Workplace Search response from ${endpoint}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    }
    return parsed.data;
  }
}
