import type { ObjectType } from './ObjectType.js';
import type { SyncDocument } from './SyncDocument.js';

export type RunKind = 'full' | 'incremental';

export interface CheckpointMarker {
  objectType: ObjectType;
  timestamp: string;
  runKind: RunKind;
}

export type QueueMessage =
  | { kind: 'document_list'; items: SyncDocument[] }
  | ({ kind: 'checkpoint' } & CheckpointMarker)
  | { kind: 'signal_close' };
