import { BATCH_SIZE, MAX_ALLOWED_BYTES } from '../config/defaults.js';
import type { CheckpointMarker } from '../domain/entities/QueueMessage.js';
import { documentKey, type SyncDocument } from '../domain/entities/SyncDocument.js';
import type { SearchIndexPort } from '../domain/ports/SearchIndexPort.js';
import { Logger, errorMessage } from '../shared/Logger.js';
import {
  serializedSize,
  splitByMaxCumulativeLength,
  splitIntoChunks,
  uniqueBy,
} from '../shared/partition.js';
import type { ConnectorQueue } from './ConnectorQueue.js';

const consumerLogger = new Logger('IndexingConsumer');

export interface ConsumerResult {
  generatedKeys: Set<string>;
  indexedKeys: Set<string>;
  checkpoints: CheckpointMarker[];
}

/**
 * 依序列化大小切分；單一文件超過上限時 body 改為 null 並獨佔一個 chunk
 */
export function splitDocumentsByByteLimit(
  documents: readonly SyncDocument[],
  maxBytes: number,
): SyncDocument[][] {
  const chunks: SyncDocument[][] = [];
  let pending: SyncDocument[] = [];
  for (const doc of documents) {
    // 單一文件的 JSON 陣列為 "[" + doc + "]"
    if (serializedSize(doc) + 2 <= maxBytes) {
      pending.push(doc);
      continue;
    }
    consumerLogger.warn('Document exceeds the allowed size, dropping its body', {
      id: doc.id,
      type: doc.type,
    });
    chunks.push(...splitByMaxCumulativeLength(pending, maxBytes));
    pending = [];
    chunks.push([{ ...doc, body: null }]);
  }
  chunks.push(...splitByMaxCumulativeLength(pending, maxBytes));
  return chunks;
}

/**
 * 從佇列取出文件並送往搜尋索引。
 * checkpoint 訊息會中斷目前批次並記錄下來；signal_close 或佇列關閉後結束。
 */
export class IndexingConsumer {
  private readonly logger: Logger;
  private errorOccurred = false;

  constructor(
    private readonly queue: ConnectorQueue,
    private readonly index: SearchIndexPort,
    name: string = 'worker-1',
    private readonly limits: { batchSize: number; maxBytes: number } = {
      batchSize: BATCH_SIZE,
      maxBytes: MAX_ALLOWED_BYTES,
    },
  ) {
    this.logger = consumerLogger.with({ worker: name });
  }

  get isErrorOccurred(): boolean {
    return this.errorOccurred;
  }

  async performSync(): Promise<ConsumerResult> {
    const result: ConsumerResult = {
      generatedKeys: new Set(),
      indexedKeys: new Set(),
      checkpoints: [],
    };

    try {
      let open = true;
      while (open) {
        const documents: SyncDocument[] = [];
        let bytes = 0;
        while (documents.length < this.limits.batchSize && bytes < this.limits.maxBytes) {
          const message = await this.queue.get();
          if (!message || message.kind === 'signal_close') {
            open = false;
            break;
          }
          if (message.kind === 'checkpoint') {
            result.checkpoints.push({
              objectType: message.objectType,
              timestamp: message.timestamp,
              runKind: message.runKind,
            });
            break;
          }
          documents.push(...message.items);
          bytes += serializedSize(message.items);
        }
        if (documents.length > 0) {
          await this.indexDocuments(documents, result);
        }
      }
    } catch (err) {
      this.errorOccurred = true;
      this.logger.error('Error while indexing documents', { error: errorMessage(err) });
      throw err;
    }

    this.logger.info('Consumer finished', {
      generated: result.generatedKeys.size,
      indexed: result.indexedKeys.size,
      checkpoints: result.checkpoints.length,
    });
    return result;
  }

  private async indexDocuments(documents: SyncDocument[], result: ConsumerResult): Promise<void> {
    const unique = uniqueBy(documents, documentKey);
    for (const batch of splitIntoChunks(unique, this.limits.batchSize)) {
      for (const chunk of splitDocumentsByByteLimit(batch, this.limits.maxBytes)) {
        const keysById = new Map<string, string[]>();
        for (const doc of chunk) {
          const key = documentKey(doc);
          result.generatedKeys.add(key);
          keysById.set(doc.id, [...(keysById.get(doc.id) ?? []), key]);
        }

        const responses = await this.index.indexDocuments(chunk);
        for (const response of responses) {
          if (response.errors.length > 0) {
            this.logger.error('Error while indexing document', {
              id: response.id,
              errors: response.errors,
            });
            continue;
          }
          for (const key of keysById.get(response.id) ?? []) result.indexedKeys.add(key);
        }
        this.logger.debug('Indexed documents', { count: chunk.length });
      }
    }
  }
}
