import type { ObjectType } from '../entities/ObjectType.js';
import type { RunKind } from '../entities/QueueMessage.js';
import type { LocalStoreRecord, StorageState } from '../entities/SyncDocument.js';
import type { TimeWindow } from '../entities/TimeWindow.js';
import type { CredentialState } from '../entities/Credentials.js';

export interface DocumentStorePort {
  loadStorage(): StorageState;
  updateStorage(state: StorageState): void;
  /** indexedKeys 為 `type:id` 形式的文件鍵 */
  storeIndexedDocuments(fetched: readonly LocalStoreRecord[], indexedKeys: ReadonlySet<string>): void;
}

export interface CheckpointPort {
  getCheckpoint(objectType: ObjectType, currentTime: string): TimeWindow;
  setCheckpoint(objectType: ObjectType, time: string, runKind: RunKind): void;
}

export interface SecretsPort {
  getCredentials(): CredentialState | undefined;
  saveCredentials(state: CredentialState): void;
  clear(): void;
}
