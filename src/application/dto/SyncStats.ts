import type { ObjectType } from '../../domain/entities/ObjectType.js';
import type { RunKind } from '../../domain/entities/QueueMessage.js';

/** full / incremental sync 統計 */
export interface SyncStats {
  runKind: RunKind;
  objectTypes: ObjectType[];
  documentsFetched: number;
  documentsGenerated: number;
  documentsIndexed: number;
  checkpointsCommitted: number;
  durationMs: number;
}

/** deletion sync 統計 */
export interface DeletionStats {
  candidates: number;
  pruned: number;
  deleted: number;
  deletedIds: string[];
  durationMs: number;
}

/** permission sync 統計 */
export interface PermissionStats {
  permissionsRemoved: number;
  usersUpdated: number;
  durationMs: number;
}
