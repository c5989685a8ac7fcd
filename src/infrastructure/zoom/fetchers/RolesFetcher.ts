import type { PermissionMapping } from '../../../domain/entities/Credentials.js';
import type { SyncDocument } from '../../../domain/entities/SyncDocument.js';
import type { FetchRequest, FetchScope, ObjectFetcher } from '../../../domain/ports/ObjectFetcher.js';
import type { ZoomDirectoryPort } from '../../../domain/ports/ZoomDirectoryPort.js';
import { Logger } from '../../../shared/Logger.js';
import { readString } from '../../../shared/json.js';
import { createDocument } from './documentFactory.js';

/** 帳號層級：不看 scope 與時間窗，每次全量抓取 */
export class RolesFetcher implements ObjectFetcher {
  readonly objectType = 'roles' as const;
  private readonly logger = new Logger('RolesFetcher');

  constructor(
    private readonly directory: ZoomDirectoryPort,
    private readonly mapping: PermissionMapping,
  ) {}

  async fetch(_scope: FetchScope, request: FetchRequest): Promise<SyncDocument[]> {
    const roles = await this.directory.listRoles();
    const documents = roles.map(({ id, raw }) => createDocument('roles', raw, {
      body: `Total Members : ${readString(raw, 'total_members')}`,
      url: `https://zoom.us/role#/detail/${id}/settings`,
    }, { ...request, mapping: this.mapping }));
    this.logger.info('Roles documents generated', { count: documents.length });
    return documents;
  }
}
