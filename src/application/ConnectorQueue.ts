import type { CheckpointMarker, QueueMessage } from '../domain/entities/QueueMessage.js';
import type { SyncDocument } from '../domain/entities/SyncDocument.js';
import { BATCH_SIZE } from '../config/defaults.js';
import { splitIntoChunks } from '../shared/partition.js';
import { WorkQueue } from '../shared/WorkQueue.js';

/** producer 與 consumer 之間的共用佇列；文件一律先切成 batchSize 以內的批次 */
export class ConnectorQueue {
  private readonly queue: WorkQueue<QueueMessage>;

  constructor(
    capacity: number = Number.POSITIVE_INFINITY,
    private readonly batchSize: number = BATCH_SIZE,
  ) {
    this.queue = new WorkQueue<QueueMessage>(capacity);
  }

  async appendDocuments(documents: readonly SyncDocument[]): Promise<void> {
    for (const items of splitIntoChunks(documents, this.batchSize)) {
      await this.queue.put({ kind: 'document_list', items });
    }
  }

  putCheckpoint(marker: CheckpointMarker): Promise<void> {
    return this.queue.put({ kind: 'checkpoint', ...marker });
  }

  /** 已 close 的佇列不再送出結束訊號 */
  async endSignal(): Promise<void> {
    if (this.queue.isClosed) return;
    await this.queue.put({ kind: 'signal_close' });
  }

  get(): Promise<QueueMessage | undefined> {
    return this.queue.get();
  }

  close(): void {
    this.queue.close();
  }
}
