import type { PermissionMapping } from '../../../domain/entities/Credentials.js';
import type { SyncDocument } from '../../../domain/entities/SyncDocument.js';
import type { FetchRequest, FetchScope, ObjectFetcher } from '../../../domain/ports/ObjectFetcher.js';
import type { ZoomApiPort } from '../../../domain/ports/ZoomApiPort.js';
import { Logger } from '../../../shared/Logger.js';
import { readString } from '../../../shared/json.js';
import { createDocument } from './documentFactory.js';

export class ChannelsFetcher implements ObjectFetcher {
  readonly objectType = 'channels' as const;
  private readonly logger = new Logger('ChannelsFetcher');

  constructor(
    private readonly api: ZoomApiPort,
    private readonly mapping: PermissionMapping,
  ) {}

  async fetch(scope: FetchScope, request: FetchRequest): Promise<SyncDocument[]> {
    const documents: SyncDocument[] = [];
    for (const user of scope.users) {
      const userId = readString(user, 'id');
      const channels = await this.api.getPaginated(
        `chat/users/${encodeURIComponent(userId)}/channels?page_size=50`,
        'channels',
      );
      for (const channel of channels) {
        documents.push(createDocument('channels', channel, {
          body: JSON.stringify(channel['channel_settings'] ?? {}),
          url: `https://zoom.us/account/imchannel/old#/member/${readString(channel, 'id')}`,
          ownerId: userId,
        }, { ...request, mapping: this.mapping }));
      }
    }
    this.logger.info('Channels documents generated', { count: documents.length });
    return documents;
  }
}
