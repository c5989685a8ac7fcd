import type { ContentSourceDefinition, SearchIndexPort } from '../domain/ports/SearchIndexPort.js';
import { Logger } from '../shared/Logger.js';

export const CONTENT_SOURCE_SCHEMA: Record<string, string> = {
  body: 'text',
  created_at: 'date',
  description: 'text',
  name: 'text',
  size: 'text',
  title: 'text',
  type: 'text',
  url: 'text',
};

export const CONTENT_SOURCE_DISPLAY: ContentSourceDefinition['display'] = {
  title_field: 'title',
  description_field: 'description',
  url_field: 'url',
  detail_fields: [
    { field_name: 'created_at', label: 'Created At' },
    { field_name: 'type', label: 'Type' },
    { field_name: 'size', label: 'Size (in bytes)' },
    { field_name: 'description', label: 'Description' },
    { field_name: 'body', label: 'Content' },
  ],
  color: '#000000',
};

/** 在 Workplace Search 建立 custom content source */
export class BootstrapUseCase {
  private readonly logger = new Logger('BootstrapUseCase');

  constructor(private readonly index: SearchIndexPort) {}

  async execute(name: string): Promise<{ id: string; name: string }> {
    const { id } = await this.index.createContentSource({
      name,
      schema: CONTENT_SOURCE_SCHEMA,
      display: CONTENT_SOURCE_DISPLAY,
      is_searchable: true,
    });
    this.logger.info('Created content source', { name, id });
    return { id, name };
  }
}
