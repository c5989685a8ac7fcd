import type { ObjectType } from '../entities/ObjectType.js';
import type { SyncDocument } from '../entities/SyncDocument.js';
import type { TimeWindow } from '../entities/TimeWindow.js';
import type { FieldSchema } from '../value-objects/FieldSchema.js';
import type { JsonObject } from './ZoomApiPort.js';

export interface OwnedMeeting {
  ownerId: string;
  meeting: JsonObject;
}

/**
 * 一個 user bucket 的抓取範圍。
 * meetings 由 orchestrator 先行列出，再交給 meetings 與 past_meetings 兩個 fetcher。
 */
export interface FetchScope {
  users: JsonObject[];
  meetings: OwnedMeeting[];
  chatUserIds: string[];
}

export interface FetchRequest {
  schema: FieldSchema;
  window: TimeWindow;
  enablePermission: boolean;
}

export interface ObjectFetcher {
  readonly objectType: ObjectType;
  fetch(scope: FetchScope, request: FetchRequest): Promise<SyncDocument[]>;
}

export const EMPTY_SCOPE: FetchScope = { users: [], meetings: [], chatUserIds: [] };
