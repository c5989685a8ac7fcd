import type { ObjectType } from '../entities/ObjectType.js';

/** 輸出欄位名稱 → Zoom 原始欄位名稱 */
export type FieldSchema = Readonly<Record<string, string>>;

export interface FieldSelection {
  includeFields?: readonly string[];
  excludeFields?: readonly string[];
}

export const DEFAULT_SCHEMA: Readonly<Record<ObjectType, FieldSchema>> = {
  users: { created_at: 'created_at', id: 'id', title: 'first_name' },
  roles: { description: 'description', id: 'id', title: 'name' },
  groups: { id: 'id', title: 'name' },
  meetings: { created_at: 'created_at', id: 'id', title: 'topic' },
  past_meetings: { created_at: 'start_time', id: 'uuid', title: 'topic' },
  recordings: {
    created_at: 'recording_start',
    id: 'id',
    size: 'total_size',
    title: 'topic',
    url: 'play_url',
  },
  channels: { id: 'id', title: 'name' },
  chats: { created_at: 'date_time', description: 'message', id: 'id' },
  files: {
    created_at: 'date_time',
    id: 'file_id',
    size: 'file_size',
    title: 'file_name',
    url: 'download_url',
  },
};

/**
 * 依設定推導投影 schema。
 * include/exclude 比對的是 Zoom 原始欄位名；兩者同時設定時 include 優先，id 永遠保留。
 */
export function resolveSchema(type: ObjectType, selection?: FieldSelection | null): FieldSchema {
  const base = DEFAULT_SCHEMA[type];
  if (!selection) return base;

  const { includeFields, excludeFields } = selection;
  let entries = Object.entries(base);
  if (includeFields && includeFields.length > 0) {
    entries = entries.filter(([, source]) => includeFields.includes(source));
  } else if (excludeFields && excludeFields.length > 0) {
    entries = entries.filter(([, source]) => !excludeFields.includes(source));
  }

  const schema: Record<string, string> = Object.fromEntries(entries);
  schema['id'] = base['id'] ?? 'id';
  return schema;
}

/** 依 schema 從原始紀錄投影出欄位；缺少的來源欄位不寫入 */
export function projectFields(
  schema: FieldSchema,
  record: Record<string, unknown>,
  skip: (outputField: string, sourceField: string) => boolean = () => false,
): Record<string, unknown> {
  const projected: Record<string, unknown> = {};
  for (const [outputField, sourceField] of Object.entries(schema)) {
    if (skip(outputField, sourceField)) continue;
    if (sourceField in record) {
      projected[outputField] = record[sourceField];
    }
  }
  return projected;
}
