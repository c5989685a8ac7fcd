import { BATCH_SIZE } from '../config/defaults.js';
import type { ObjectType } from '../domain/entities/ObjectType.js';
import {
  documentKey,
  type LocalStoreRecord,
  type StorageState,
} from '../domain/entities/SyncDocument.js';
import type { TimeWindow } from '../domain/entities/TimeWindow.js';
import { EXISTENCE_NEGATIVE_STATUS, NotFoundError } from '../domain/errors/DomainErrors.js';
import type { SearchIndexPort } from '../domain/ports/SearchIndexPort.js';
import type { DocumentStorePort } from '../domain/ports/StoragePort.js';
import type { ZoomApiPort } from '../domain/ports/ZoomApiPort.js';
import { Logger } from '../shared/Logger.js';
import { splitIntoChunks } from '../shared/partition.js';
import { chatRetentionBoundary, subtractDays, toRfc3339 } from '../shared/time.js';
import type { FetchPipeline } from './FetchPipeline.js';
import { configuredObjectTypes, type SyncOptions } from './SyncUseCase.js';
import type { DeletionStats } from './dto/SyncStats.js';

/** 上游只保留約六個月的聊天與檔案；界線與抓取時的 clamp 相同 */
const SIX_MONTH_TYPES: ReadonlySet<ObjectType> = new Set(['chats', 'files']);
/** 會議相關物件一個月後即無法確認 */
const ONE_MONTH_TYPES: ReadonlySet<ObjectType> = new Set(['meetings', 'past_meetings', 'recordings']);

/** 可直接以 id 查詢是否存在的物件 */
const PROBED_TYPES = ['roles', 'groups', 'users'] as const;

/** 無法以 id 查詢，需重新抓取後比對的物件 */
const REFETCHED_TYPES: readonly ObjectType[] = ['channels', 'recordings', 'chats', 'files'];

export type DeletionOptions = Omit<SyncOptions, 'indexThreadCount' | 'queueCapacity' | 'endTime'>;

type DeletedKey = Pick<LocalStoreRecord, 'type' | 'id'>;

export interface PruneResult {
  state: StorageState;
  pruned: LocalStoreRecord[];
}

/**
 * 移除超過上游保留期限的 delete_keys（同時自 global_keys 移除）。
 * 父物件已確認刪除的紀錄保留下來進一步處理；
 * chats/files 在本地有多筆同 id 紀錄時也保留。
 */
export function pruneExpiredRecords(
  state: StorageState,
  deletedParentIds: ReadonlySet<string>,
  now: Date,
): PruneResult {
  const sixMonthBoundary = chatRetentionBoundary(now).getTime();
  const oneMonthBoundary = subtractDays(now, 30).getTime();

  const chatIdCounts = new Map<string, number>();
  for (const record of state.delete_keys) {
    if (SIX_MONTH_TYPES.has(record.type)) {
      chatIdCounts.set(record.id, (chatIdCounts.get(record.id) ?? 0) + 1);
    }
  }

  const pruned: LocalStoreRecord[] = [];
  for (const record of state.delete_keys) {
    const sixMonth = SIX_MONTH_TYPES.has(record.type);
    if (!sixMonth && !ONE_MONTH_TYPES.has(record.type)) continue;
    const createdAt = Date.parse(record.created_at);
    if (Number.isNaN(createdAt)) continue;
    if (createdAt >= (sixMonth ? sixMonthBoundary : oneMonthBoundary)) continue;
    if (deletedParentIds.has(record.parent_id)) continue;
    if (sixMonth && (chatIdCounts.get(record.id) ?? 0) > 1) continue;
    pruned.push(record);
  }

  const prunedKeys = new Set(pruned.map(documentKey));
  return {
    state: {
      global_keys: state.global_keys.filter((r) => !prunedKeys.has(documentKey(r))),
      delete_keys: state.delete_keys.filter((r) => !prunedKeys.has(documentKey(r))),
    },
    pruned,
  };
}

/**
 * 比對上一次同步留下的 delete_keys 與上游現況，刪除已不存在的文件。
 * roles/groups/users/meetings/past_meetings 以單筆查詢確認；
 * channels/recordings/chats/files 重新抓取後比對。
 */
export class DeletionSyncUseCase {
  private readonly logger = new Logger('DeletionSyncUseCase');

  constructor(
    private readonly api: ZoomApiPort,
    private readonly pipeline: FetchPipeline,
    private readonly index: SearchIndexPort,
    private readonly documents: DocumentStorePort,
    private readonly options: DeletionOptions,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async execute(): Promise<DeletionStats> {
    const started = Date.now();
    const now = this.now();
    const objectTypes = configuredObjectTypes(this.options.objects);
    const initial = this.documents.loadStorage();
    const candidates = initial.delete_keys.length;
    this.logger.info('Starting the deletion sync', { candidates });

    const deleted: DeletedKey[] = [];

    for (const type of PROBED_TYPES) {
      if (!objectTypes.includes(type)) continue;
      for (const id of idsOfType(initial.delete_keys, type)) {
        if (await this.isGone(type, `${type}/${encodeURIComponent(id)}`)) deleted.push({ type, id });
      }
    }

    const { state, pruned } = pruneExpiredRecords(initial, new Set(deleted.map((d) => d.id)), now);
    if (pruned.length > 0) {
      this.logger.info('Dropped records older than the upstream retention period', { count: pruned.length });
    }
    this.documents.updateStorage(state);

    if (objectTypes.includes('meetings')) {
      for (const id of idsOfType(state.delete_keys, 'meetings')) {
        if (await this.isGone('meetings', `meetings/${encodeURIComponent(id)}`)) deleted.push({ type: 'meetings', id });
      }
    }

    if (objectTypes.includes('past_meetings')) {
      const pastMeetings = state.delete_keys.filter((r) => r.type === 'past_meetings');
      const meetingIds = [...new Set(pastMeetings.map((r) => r.parent_id))];
      for (const meetingId of meetingIds) {
        if (!(await this.isGone('past_meetings', `past_meetings/${encodeURIComponent(meetingId)}`))) continue;
        deleted.push(...pastMeetings.filter((r) => r.parent_id === meetingId));
      }
    }

    deleted.push(...await this.diffRefetched(state.delete_keys, objectTypes, now));

    const uniqueIds = [...new Set(deleted.map((d) => d.id))];
    for (const chunk of splitIntoChunks(uniqueIds, BATCH_SIZE)) {
      await this.index.deleteDocuments(chunk);
    }

    // 索引 API 只認 id，本地紀錄則以 type:id 比對
    const removed = new Set(deleted.map(documentKey));
    this.documents.updateStorage({
      global_keys: state.global_keys.filter((r) => !removed.has(documentKey(r))),
      delete_keys: [],
    });
    this.logger.info('Deletion sync completed', { deleted: uniqueIds.length });

    return {
      candidates,
      pruned: pruned.length,
      deleted: uniqueIds.length,
      deletedIds: uniqueIds,
      durationMs: Date.now() - started,
    };
  }

  /** 命中「不存在」狀態碼時回傳 true；其他錯誤往上拋 */
  private async isGone(type: ObjectType, endpoint: string): Promise<boolean> {
    try {
      await this.api.get(endpoint, { notFoundStatuses: EXISTENCE_NEGATIVE_STATUS[type] });
      return false;
    } catch (err) {
      if (err instanceof NotFoundError) {
        this.logger.debug('Object no longer exists upstream', { type, endpoint, status: err.status });
        return true;
      }
      throw err;
    }
  }

  private async diffRefetched(
    deleteKeys: readonly LocalStoreRecord[],
    objectTypes: readonly ObjectType[],
    now: Date,
  ): Promise<LocalStoreRecord[]> {
    const types = REFETCHED_TYPES.filter(
      (type) => objectTypes.includes(type) && deleteKeys.some((r) => r.type === type),
    );
    if (types.length === 0) return [];

    const window = { start: this.options.startTime, end: toRfc3339(now) };
    const windows: Partial<Record<ObjectType, TimeWindow>> = {};
    for (const type of types) windows[type] = window;
    const fetched = await this.pipeline.run({
      objectTypes: types,
      windows,
      selections: this.options.objects,
      enablePermission: this.options.enablePermission,
      threadCount: this.options.fetchThreadCount,
    });
    const present = new Set(fetched.map(documentKey));
    return deleteKeys.filter((r) => types.includes(r.type) && !present.has(documentKey(r)));
  }
}

function idsOfType(records: readonly LocalStoreRecord[], type: ObjectType): string[] {
  return [...new Set(records.filter((r) => r.type === type).map((r) => r.id))];
}
