import type { PartialConfig } from './types.js';

export const DEFAULT_CONFIG_FILE = '~/.local/config/zoom-connector.json';

export const DEFAULT_CONFIG: PartialConfig = {
  zoom: {
    baseUrl: 'https://api.zoom.us/v2/',
    authUrl: 'https://zoom.us/oauth/token',
  },
  objects: {
    users: null,
    roles: null,
    groups: null,
    meetings: null,
    past_meetings: null,
    recordings: null,
    channels: null,
    chats: null,
    files: null,
  },
  startTime: '2011-10-12T00:00:00Z',
  logLevel: 'info',
  retryCount: 3,
  zoomSyncThreadCount: 5,
  enterpriseSearchSyncThreadCount: 5,
  enableDocumentPermission: true,
  stateDir: '.zoom-connector',
  requestTimeoutMs: 30000,
};

/** 每批文件數上限（queue 與 index API 共用） */
export const BATCH_SIZE = 100;

/** 單次 index 呼叫的序列化大小上限 */
export const MAX_ALLOWED_BYTES = 10_000_000;

/** producer 與 consumer 之間最多暫存的訊息數 */
export const QUEUE_CAPACITY = 1000;
