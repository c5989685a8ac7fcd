import { z } from 'zod';
import { OBJECT_TYPES } from '../domain/entities/ObjectType.js';
import { isRfc3339 } from '../shared/time.js';

const rfc3339 = z.string().refine(isRfc3339, { message: 'must be an RFC-3339 timestamp' });

/** 單一物件的欄位選擇；null 代表沿用預設 schema */
const fieldSelectionSchema = z
  .object({
    includeFields: z.array(z.string()).optional(),
    excludeFields: z.array(z.string()).optional(),
  })
  .nullable();

export const connectorConfigSchema = z
  .object({
    zoom: z.object({
      clientId: z.string().min(1),
      clientSecret: z.string().min(1),
      authorizationCode: z.string().min(1).optional(),
      redirectUri: z.string().url().optional(),
      /** CSV：`zoom_user_id,workplace_user` */
      userMapping: z.string().optional(),
      baseUrl: z.string().url(),
      authUrl: z.string().url(),
    }),
    enterpriseSearch: z.object({
      apiKey: z.string().min(1),
      sourceId: z.string().min(1),
      hostUrl: z.string().url(),
    }),
    objects: z.record(z.enum(OBJECT_TYPES), fieldSelectionSchema),
    startTime: rfc3339,
    endTime: rfc3339.optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
    retryCount: z.number().int().min(1),
    zoomSyncThreadCount: z.number().int().min(1),
    enterpriseSearchSyncThreadCount: z.number().int().min(1),
    enableDocumentPermission: z.boolean(),
    stateDir: z.string().min(1),
    requestTimeoutMs: z.number().int().positive(),
  })
  .superRefine((config, ctx) => {
    const now = Date.now();
    const start = Date.parse(config.startTime);
    if (start > now) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['startTime'], message: 'must not be in the future' });
    }
    if (config.endTime !== undefined) {
      const end = Date.parse(config.endTime);
      if (end > now) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['endTime'], message: 'must not be in the future' });
      }
      if (start >= end) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['startTime'], message: 'must be earlier than endTime' });
      }
    }
  });

/** 完整設定 */
export type ConnectorConfig = z.infer<typeof connectorConfigSchema>;

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof ConnectorConfig]?: ConnectorConfig[K] extends Record<string, unknown>
    ? Partial<ConnectorConfig[K]>
    : ConnectorConfig[K];
};
