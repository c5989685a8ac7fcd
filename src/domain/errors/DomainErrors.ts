import type { ObjectType } from '../entities/ObjectType.js';

export type ErrorClassification = 'retryable' | 'expected' | 'manual';

/** 所有 connector domain 錯誤的基底類別 */
export abstract class ConnectorError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Retryable ---

export class TransientNetworkError extends ConnectorError {
  readonly classification = 'retryable' as const;
  readonly code = 'TRANSIENT_NETWORK';
}

// --- Expected ---

/** 上游回應「不存在」；由呼叫端當作業務訊號，而非失敗 */
export class NotFoundError extends ConnectorError {
  readonly classification = 'expected' as const;
  readonly code = 'NOT_FOUND';

  constructor(
    message: string,
    public readonly status: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

// --- Manual ---

export class AccessTokenGenerationError extends ConnectorError {
  readonly classification = 'manual' as const;
  readonly code = 'ACCESS_TOKEN_GENERATION';

  constructor(
    public readonly suspectKey: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Error while generating Zoom access token: ${reason}. Verify the configured ${suspectKey}.`, options);
  }
}

export class UpstreamHttpError extends ConnectorError {
  readonly classification = 'manual' as const;
  readonly code = 'UPSTREAM_HTTP';

  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class RetryCountExceededError extends ConnectorError {
  readonly classification = 'manual' as const;
  readonly code = 'RETRY_COUNT_EXCEEDED';

  constructor(
    public readonly attempts: number,
    options?: ErrorOptions,
  ) {
    super(`Retry count exceeded after ${attempts} attempt(s)`, options);
  }
}

export class ConfigValidationError extends ConnectorError {
  readonly classification = 'manual' as const;
  readonly code = 'CONFIG_INVALID';

  constructor(
    public readonly keyPath: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid configuration at "${keyPath}": ${reason}`, options);
  }
}

export class PermissionSyncDisabledError extends ConnectorError {
  readonly classification = 'manual' as const;
  readonly code = 'PERMISSION_SYNC_DISABLED';

  constructor(options?: ErrorOptions) {
    super(
      'The permission sync is disabled. Enable it via "enableDocumentPermission" to run permission-sync.',
      options,
    );
  }
}

export class EmptyMappingError extends ConnectorError {
  readonly classification = 'manual' as const;
  readonly code = 'EMPTY_MAPPING';

  constructor(
    public readonly mappingPath: string | undefined,
    options?: ErrorOptions,
  ) {
    super(
      mappingPath
        ? `User mapping file "${mappingPath}" is missing or has no entries`
        : 'No user mapping file is configured (zoom.userMapping)',
      options,
    );
  }
}

export class IndexingError extends ConnectorError {
  readonly classification = 'manual' as const;
  readonly code = 'INDEXING_FAILED';
}

/**
 * 存在性探測的「已刪除」狀態碼表。
 * roles 的 300 為上游實際回傳值（文件記載為 400），兩者皆視為不存在。
 */
export const EXISTENCE_NEGATIVE_STATUS: Partial<Record<ObjectType, readonly number[]>> = {
  users: [404, 400],
  roles: [300, 400],
  groups: [404, 400],
  meetings: [404, 400],
  past_meetings: [404, 400],
};

export function isRetryableError(err: unknown): boolean {
  return err instanceof ConnectorError && err.classification === 'retryable';
}
