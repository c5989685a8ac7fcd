import { QUEUE_CAPACITY } from '../config/defaults.js';
import {
  OBJECT_TYPES,
  TIME_WINDOWED_TYPES,
  type ObjectType,
} from '../domain/entities/ObjectType.js';
import type { RunKind } from '../domain/entities/QueueMessage.js';
import type { LocalStoreRecord } from '../domain/entities/SyncDocument.js';
import type { TimeWindow } from '../domain/entities/TimeWindow.js';
import type { SearchIndexPort } from '../domain/ports/SearchIndexPort.js';
import type { CheckpointPort, DocumentStorePort } from '../domain/ports/StoragePort.js';
import type { FieldSelection } from '../domain/value-objects/FieldSchema.js';
import { Logger } from '../shared/Logger.js';
import { toRfc3339 } from '../shared/time.js';
import { ConnectorQueue } from './ConnectorQueue.js';
import type { FetchPipeline } from './FetchPipeline.js';
import { IndexingConsumer, type ConsumerResult } from './IndexingConsumer.js';
import type { SyncStats } from './dto/SyncStats.js';

export interface SyncOptions {
  objects: Partial<Record<ObjectType, FieldSelection | null>>;
  startTime: string;
  endTime?: string;
  enablePermission: boolean;
  fetchThreadCount: number;
  indexThreadCount: number;
  queueCapacity?: number;
}

/** 依設定順序排列的物件清單 */
export function configuredObjectTypes(objects: SyncOptions['objects']): ObjectType[] {
  return OBJECT_TYPES.filter((type) => type in objects);
}

/**
 * full-sync / incremental-sync 共用流程：
 * 抓取 → 送入佇列 → consumer 索引 → 無錯誤時才寫入 checkpoint 與本地紀錄
 */
export class SyncUseCase {
  private readonly logger = new Logger('SyncUseCase');

  constructor(
    private readonly pipeline: FetchPipeline,
    private readonly index: SearchIndexPort,
    private readonly documents: DocumentStorePort,
    private readonly checkpoints: CheckpointPort,
    private readonly options: SyncOptions,
    private readonly now: () => Date = () => new Date(),
  ) {}

  fullSync(): Promise<SyncStats> {
    return this.run('full');
  }

  incrementalSync(): Promise<SyncStats> {
    return this.run('incremental');
  }

  computeWindows(runKind: RunKind, objectTypes: readonly ObjectType[], currentTime: string): Partial<Record<ObjectType, TimeWindow>> {
    const windows: Partial<Record<ObjectType, TimeWindow>> = {};
    for (const type of objectTypes) {
      windows[type] = runKind === 'full'
        ? { start: this.options.startTime, end: this.options.endTime ?? currentTime }
        : this.checkpoints.getCheckpoint(type, currentTime);
    }
    return windows;
  }

  private async run(runKind: RunKind): Promise<SyncStats> {
    const started = Date.now();
    const currentTime = toRfc3339(this.now());
    const objectTypes = configuredObjectTypes(this.options.objects);
    const windows = this.computeWindows(runKind, objectTypes, currentTime);
    this.logger.info(`Starting the ${runKind} sync`, { objectTypes });

    // 本次同步前已索引的文件，供之後的 deletion-sync 檢查
    const storage = this.documents.loadStorage();
    this.documents.updateStorage({
      global_keys: storage.global_keys,
      delete_keys: [...storage.global_keys],
    });

    const queue = new ConnectorQueue(this.options.queueCapacity ?? QUEUE_CAPACITY);
    const consumerRuns = Array.from({ length: this.options.indexThreadCount }, (_, i) => {
      const consumer = new IndexingConsumer(queue, this.index, `worker-${i + 1}`);
      return consumer.performSync().catch((err: unknown) => {
        // consumer 失敗後 producer 不能再卡在已滿的佇列上
        queue.close();
        throw err;
      });
    });
    const settled = Promise.allSettled(consumerRuns);

    let fetched: LocalStoreRecord[] = [];
    let fetchFailed = false;
    let fetchError: unknown;
    try {
      fetched = await this.pipeline.run({
        objectTypes,
        windows,
        selections: this.options.objects,
        enablePermission: this.options.enablePermission,
        threadCount: this.options.fetchThreadCount,
      }, (docs) => queue.appendDocuments(docs));
      for (const type of TIME_WINDOWED_TYPES) {
        const window = windows[type];
        if (!window) continue;
        await queue.putCheckpoint({ objectType: type, timestamp: window.end, runKind });
      }
    } catch (err) {
      fetchFailed = true;
      fetchError = err;
      queue.close();
    }

    for (let i = 0; i < this.options.indexThreadCount; i++) {
      await queue.endSignal();
    }

    const results = await settled;
    const consumerFailure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (consumerFailure) {
      this.logger.error('Indexing failed, checkpoints and local storage are left unchanged');
      throw consumerFailure.reason;
    }
    if (fetchFailed) {
      this.logger.error('Fetching failed, checkpoints and local storage are left unchanged');
      throw fetchError;
    }

    const consumed = results
      .filter((r): r is PromiseFulfilledResult<ConsumerResult> => r.status === 'fulfilled')
      .map((r) => r.value);
    const generatedKeys = new Set(consumed.flatMap((r) => [...r.generatedKeys]));
    const indexedKeys = new Set(consumed.flatMap((r) => [...r.indexedKeys]));
    const markers = consumed.flatMap((r) => r.checkpoints);

    for (const marker of markers) {
      this.checkpoints.setCheckpoint(marker.objectType, marker.timestamp, marker.runKind);
    }
    this.documents.storeIndexedDocuments(fetched, indexedKeys);

    this.logger.info(`SUMMARY : Total ${indexedKeys.size} documents indexed out of ${generatedKeys.size}`);
    return {
      runKind,
      objectTypes,
      documentsFetched: fetched.length,
      documentsGenerated: generatedKeys.size,
      documentsIndexed: indexedKeys.size,
      checkpointsCommitted: markers.length,
      durationMs: Date.now() - started,
    };
  }
}
