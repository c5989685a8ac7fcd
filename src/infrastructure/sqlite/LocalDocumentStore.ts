import type Database from 'better-sqlite3';
import { z } from 'zod';
import { OBJECT_TYPES } from '../../domain/entities/ObjectType.js';
import type { LocalStoreRecord, StorageState } from '../../domain/entities/SyncDocument.js';
import { documentKey } from '../../domain/entities/SyncDocument.js';
import type { DocumentStorePort } from '../../domain/ports/StoragePort.js';
import { Logger } from '../../shared/Logger.js';

const rowSchema = z.object({
  collection: z.enum(['global', 'delete']),
  id: z.string(),
  type: z.enum(OBJECT_TYPES),
  parent_id: z.string(),
  created_at: z.string(),
});

function sameRecord(a: LocalStoreRecord, b: LocalStoreRecord): boolean {
  return a.id === b.id && a.type === b.type && a.parent_id === b.parent_id && a.created_at === b.created_at;
}

/**
 * global_keys / delete_keys 的持久化。
 * 同一 (type, id) 在 global_keys 中只保留一筆，新紀錄取代舊紀錄。
 */
export class LocalDocumentStore implements DocumentStorePort {
  private readonly logger = new Logger('LocalDocumentStore');

  constructor(private readonly db: Database.Database) {}

  loadStorage(): StorageState {
    const rows: unknown[] = this.db.prepare(
      'SELECT collection, id, type, parent_id, created_at FROM document_keys ORDER BY collection, position'
    ).all();

    const state: StorageState = { global_keys: [], delete_keys: [] };
    for (const raw of rows) {
      const parsed = rowSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.error('Local storage is corrupt, starting from an empty state', {
          issue: parsed.error.issues[0]?.message,
        });
        return { global_keys: [], delete_keys: [] };
      }
      const { collection, ...record } = parsed.data;
      (collection === 'global' ? state.global_keys : state.delete_keys).push(record);
    }
    return state;
  }

  /** 以單一交易整體覆寫兩個集合 */
  updateStorage(state: StorageState): void {
    const clear = this.db.prepare('DELETE FROM document_keys');
    const insert = this.db.prepare(
      'INSERT INTO document_keys(collection, position, id, type, parent_id, created_at) VALUES(?, ?, ?, ?, ?, ?)'
    );
    const write = this.db.transaction((next: StorageState) => {
      clear.run();
      next.global_keys.forEach((r, i) => insert.run('global', i, r.id, r.type, r.parent_id, r.created_at));
      next.delete_keys.forEach((r, i) => insert.run('delete', i, r.id, r.type, r.parent_id, r.created_at));
    });
    write(state);
  }

  storeIndexedDocuments(fetched: readonly LocalStoreRecord[], indexedKeys: ReadonlySet<string>): void {
    const state = this.loadStorage();
    const byKey = new Map<string, LocalStoreRecord>();
    for (const record of state.global_keys) {
      byKey.set(documentKey(record), record);
    }

    let added = 0;
    for (const record of fetched) {
      const key = documentKey(record);
      if (!indexedKeys.has(key)) continue;
      const existing = byKey.get(key);
      if (existing && sameRecord(existing, record)) continue;
      // Map 重新 set 既有 key 時保留原插入位置
      byKey.set(key, record);
      added++;
    }

    this.updateStorage({ global_keys: [...byKey.values()], delete_keys: state.delete_keys });
    this.logger.debug('Stored indexed documents', { added, total: byKey.size });
  }
}
