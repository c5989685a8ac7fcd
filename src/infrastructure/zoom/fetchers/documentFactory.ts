import type { ObjectType } from '../../../domain/entities/ObjectType.js';
import type { PermissionMapping } from '../../../domain/entities/Credentials.js';
import type { SyncDocument } from '../../../domain/entities/SyncDocument.js';
import { projectFields, type FieldSchema } from '../../../domain/value-objects/FieldSchema.js';
import { buildPermissions } from '../../../domain/value-objects/PermissionTags.js';
import type { JsonObject } from '../../../domain/ports/ZoomApiPort.js';

const STRING_FIELDS = new Set(['created_at', 'title', 'url', 'parent_id']);

export interface DocumentParts {
  body: string;
  url?: string;
  parentId?: string;
  /** 決定額外權限的 Zoom user id；roles/groups 不帶 */
  ownerId?: string;
}

export interface DocumentContext {
  schema: FieldSchema;
  enablePermission: boolean;
  mapping: PermissionMapping;
}

/** 依 schema 投影一筆 Zoom 紀錄並補上 body/url/權限 */
export function createDocument(
  type: ObjectType,
  record: JsonObject,
  parts: DocumentParts,
  context: DocumentContext,
  read: (sourceField: string) => unknown = (sourceField) => record[sourceField],
): SyncDocument {
  const projected = projectFields(context.schema, Object.fromEntries(
    Object.values(context.schema).map((source) => [source, read(source)]),
  ));

  const doc: SyncDocument = { id: String(projected['id'] ?? ''), type, body: parts.body };
  for (const [field, value] of Object.entries(projected)) {
    if (field === 'id' || value === undefined) continue;
    doc[field] = STRING_FIELDS.has(field) && value !== null ? String(value) : value;
  }
  if (parts.parentId !== undefined) doc.parent_id = parts.parentId;
  if (parts.url !== undefined) doc.url = parts.url;
  if (context.enablePermission) {
    doc._allow_permissions = buildPermissions(type, parts.ownerId, context.mapping);
  }
  return doc;
}

export const MEETING_TYPE_NAMES: Readonly<Record<string, string>> = {
  '1': 'An instant meeting',
  '2': 'A scheduled meeting',
  '3': 'A recurring meeting with no fixed time',
  '8': 'A recurring meeting with fixed time',
};

export function meetingTypeName(type: unknown): string {
  return MEETING_TYPE_NAMES[String(type)] ?? `Unknown meeting type (${String(type)})`;
}
