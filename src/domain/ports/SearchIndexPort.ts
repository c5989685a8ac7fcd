import type { SyncDocument } from '../entities/SyncDocument.js';

export interface IndexResult {
  id: string;
  errors: string[];
}

export interface UserPermissions {
  user: string;
  permissions: string[];
}

export interface ContentSourceDefinition {
  name: string;
  schema: Record<string, string>;
  display: {
    title_field: string;
    description_field: string;
    url_field: string;
    detail_fields: Array<{ field_name: string; label: string }>;
    color: string;
  };
  is_searchable: boolean;
}

export interface SearchIndexPort {
  indexDocuments(docs: SyncDocument[]): Promise<IndexResult[]>;
  deleteDocuments(ids: string[]): Promise<void>;
  listPermissions(): Promise<UserPermissions[]>;
  addUserPermissions(user: string, permissions: string[]): Promise<void>;
  removeUserPermissions(user: string, permissions: string[]): Promise<void>;
  createContentSource(definition: ContentSourceDefinition): Promise<{ id: string }>;
}
