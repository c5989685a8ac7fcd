import {
  ACCOUNT_WIDE_TYPES,
  USER_SCOPED_TYPES,
  type ObjectType,
} from '../domain/entities/ObjectType.js';
import { toLocalRecord, type LocalStoreRecord, type SyncDocument } from '../domain/entities/SyncDocument.js';
import type { TimeWindow } from '../domain/entities/TimeWindow.js';
import {
  EMPTY_SCOPE,
  type FetchScope,
  type ObjectFetcher,
  type OwnedMeeting,
} from '../domain/ports/ObjectFetcher.js';
import type { JsonObject } from '../domain/ports/ZoomApiPort.js';
import type { ZoomDirectoryPort } from '../domain/ports/ZoomDirectoryPort.js';
import { resolveSchema, type FieldSelection } from '../domain/value-objects/FieldSchema.js';
import { Logger } from '../shared/Logger.js';
import { readString } from '../shared/json.js';
import { splitListIntoBuckets, uniqueBy } from '../shared/partition.js';

export type DocumentSink = (documents: SyncDocument[]) => Promise<void>;

export interface FetchPlan {
  objectTypes: readonly ObjectType[];
  windows: Partial<Record<ObjectType, TimeWindow>>;
  selections: Partial<Record<ObjectType, FieldSelection | null>>;
  enablePermission: boolean;
  threadCount: number;
}

/**
 * 依設定的物件清單驅動各 fetcher。
 * roles/groups 先抓；使用者以 round-robin 分桶後各桶並行抓取其餘物件。
 * 任一桶失敗時等待其他桶結束後拋出第一個錯誤。
 */
export class FetchPipeline {
  private readonly logger = new Logger('FetchPipeline');

  constructor(
    private readonly fetchers: ReadonlyMap<ObjectType, ObjectFetcher>,
    private readonly directory: ZoomDirectoryPort,
  ) {}

  /** 回傳所有產生文件的精簡紀錄；有 sink 時每種物件抓完即送出 */
  async run(plan: FetchPlan, sink?: DocumentSink): Promise<LocalStoreRecord[]> {
    const records: LocalStoreRecord[] = [];
    const emit = async (documents: SyncDocument[]): Promise<void> => {
      records.push(...documents.map(toLocalRecord));
      if (sink) await sink(documents);
    };

    for (const type of ACCOUNT_WIDE_TYPES) {
      if (!plan.objectTypes.includes(type)) continue;
      await emit(await this.fetchType(type, EMPTY_SCOPE, plan));
    }

    const userScoped = USER_SCOPED_TYPES.filter((type) => plan.objectTypes.includes(type));
    if (userScoped.length === 0) return records;

    const users = await this.directory.listUsers();
    const needsChats = userScoped.includes('chats') || userScoped.includes('files');
    const chatUserIds = needsChats
      ? uniqueBy(await this.directory.listChatEnabledUserIds(), (id) => id)
      : [];

    const buckets = splitListIntoBuckets(users, plan.threadCount);
    this.logger.info('Fetching user scoped objects', {
      users: users.length,
      buckets: buckets.length,
      objectTypes: userScoped,
    });

    const results = await Promise.allSettled(
      buckets.map((bucket) => this.runBucket(bucket, chatUserIds, userScoped, plan, emit)),
    );
    const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failure) throw failure.reason;
    return records;
  }

  private async runBucket(
    users: JsonObject[],
    chatUserIds: readonly string[],
    types: readonly ObjectType[],
    plan: FetchPlan,
    emit: (documents: SyncDocument[]) => Promise<void>,
  ): Promise<void> {
    const userIds = new Set(users.map((user) => readString(user, 'id')));
    const scope: FetchScope = {
      users,
      meetings: [],
      chatUserIds: chatUserIds.filter((id) => userIds.has(id)),
    };
    if (types.includes('meetings') || types.includes('past_meetings')) {
      scope.meetings = await this.listMeetings(users);
    }

    for (const type of types) {
      await emit(await this.fetchType(type, scope, plan));
    }
  }

  private async listMeetings(users: JsonObject[]): Promise<OwnedMeeting[]> {
    const meetings: OwnedMeeting[] = [];
    for (const user of users) {
      const ownerId = readString(user, 'id');
      for (const meeting of await this.directory.listMeetings(ownerId)) {
        meetings.push({ ownerId, meeting });
      }
    }
    return meetings;
  }

  private fetchType(type: ObjectType, scope: FetchScope, plan: FetchPlan): Promise<SyncDocument[]> {
    const fetcher = this.fetchers.get(type);
    const window = plan.windows[type];
    if (!fetcher) throw new Error(`No fetcher registered for object type "${type}"`);
    if (!window) throw new Error(`No time window computed for object type "${type}"`);
    return fetcher.fetch(scope, {
      schema: resolveSchema(type, plan.selections[type]),
      window,
      enablePermission: plan.enablePermission,
    });
  }
}
