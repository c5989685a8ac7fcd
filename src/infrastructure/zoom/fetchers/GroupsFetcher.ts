import type { PermissionMapping } from '../../../domain/entities/Credentials.js';
import type { SyncDocument } from '../../../domain/entities/SyncDocument.js';
import type { FetchRequest, FetchScope, ObjectFetcher } from '../../../domain/ports/ObjectFetcher.js';
import type { ZoomApiPort } from '../../../domain/ports/ZoomApiPort.js';
import { Logger } from '../../../shared/Logger.js';
import { readRecords, readString } from '../../../shared/json.js';
import { createDocument } from './documentFactory.js';

export class GroupsFetcher implements ObjectFetcher {
  readonly objectType = 'groups' as const;
  private readonly logger = new Logger('GroupsFetcher');

  constructor(
    private readonly api: ZoomApiPort,
    private readonly mapping: PermissionMapping,
  ) {}

  async fetch(_scope: FetchScope, request: FetchRequest): Promise<SyncDocument[]> {
    const groups = readRecords(await this.api.get('groups'), 'groups');
    const documents = groups.map((group) => createDocument('groups', group, {
      body: `total_members: ${readString(group, 'total_members')}`,
      url: `https://zoom.us/account/group#/detail/${readString(group, 'id')}/detail`,
    }, { ...request, mapping: this.mapping }));
    this.logger.info('Groups documents generated', { count: documents.length });
    return documents;
  }
}
