import type { ObjectType } from './ObjectType.js';

/**
 * 在 pipeline 中流動的文件。
 * (type, id) 為整條 pipeline 的去重鍵；其餘欄位由各物件的 field schema 投影而來。
 */
export interface SyncDocument {
  id: string;
  type: ObjectType;
  parent_id?: string;
  created_at?: string;
  title?: string;
  body: string | null;
  url?: string;
  _allow_permissions?: string[];
  [field: string]: unknown;
}

/** 成功索引後保留在本地的精簡紀錄 */
export interface LocalStoreRecord {
  id: string;
  type: ObjectType;
  parent_id: string;
  created_at: string;
}

export interface StorageState {
  global_keys: LocalStoreRecord[];
  delete_keys: LocalStoreRecord[];
}

export function toLocalRecord(doc: SyncDocument): LocalStoreRecord {
  return {
    id: String(doc.id),
    type: doc.type,
    parent_id: doc.parent_id ?? '',
    created_at: doc.created_at ?? '',
  };
}

export function documentKey(doc: Pick<SyncDocument, 'type' | 'id'>): string {
  return `${doc.type}:${doc.id}`;
}
