import type { PermissionMapping } from '../../../domain/entities/Credentials.js';
import type { SyncDocument } from '../../../domain/entities/SyncDocument.js';
import type { FetchRequest, FetchScope, ObjectFetcher } from '../../../domain/ports/ObjectFetcher.js';
import type { ZoomApiPort } from '../../../domain/ports/ZoomApiPort.js';
import { Logger } from '../../../shared/Logger.js';
import { readString } from '../../../shared/json.js';
import { chatRetentionBoundary, clampStart, toUtcTimestamp } from '../../../shared/time.js';
import { createDocument } from './documentFactory.js';

export const CHAT_ARCHIVE_URL = 'https://zoom.us/account/archivemsg/search#/list';

/**
 * 聊天訊息與檔案共用同一支 API：帶 file_id 的訊息是 files，其餘是 chats。
 * 多位使用者可能看到同一則訊息，以第一次出現者為準。
 */
export class ChatMessagesFetcher implements ObjectFetcher {
  private readonly logger: Logger;

  constructor(
    readonly objectType: 'chats' | 'files',
    private readonly api: ZoomApiPort,
    private readonly mapping: PermissionMapping,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.logger = new Logger('ChatMessagesFetcher').with({ objectType });
  }

  async fetch(scope: FetchScope, request: FetchRequest): Promise<SyncDocument[]> {
    const { start, clamped } = clampStart(request.window.start, chatRetentionBoundary(this.now()));
    if (clamped) {
      this.logger.warn('Start time is older than the chat retention boundary, using the boundary instead', {
        requested: request.window.start,
        start,
      });
    }

    const from = toUtcTimestamp(start);
    const to = toUtcTimestamp(request.window.end);
    const documents: SyncDocument[] = [];
    const seen = new Set<string>();
    const wantFiles = this.objectType === 'files';

    for (const userId of scope.chatUserIds) {
      const messages = await this.api.getPaginated(
        `chat/users/${encodeURIComponent(userId)}/messages?page_size=300&search_key=%20`
          + `&search_type=message&from=${from}&to=${to}`,
        'messages',
      );
      this.logger.debug('Fetched chat messages', { userId, count: messages.length });

      for (const message of messages) {
        const isFile = readString(message, 'file_id') !== '';
        if (isFile !== wantFiles) continue;
        const id = readString(message, wantFiles ? 'file_id' : 'id');
        if (seen.has(id)) continue;
        seen.add(id);

        documents.push(createDocument(this.objectType, message, wantFiles
          ? {
            body: `File Name : ${readString(message, 'file_name')}\nFile Size : ${readString(message, 'file_size')}`,
            url: readString(message, 'download_url') ? undefined : CHAT_ARCHIVE_URL,
            parentId: userId,
            ownerId: userId,
          }
          : {
            body: `Message : ${readString(message, 'message')}`,
            url: CHAT_ARCHIVE_URL,
            parentId: userId,
            ownerId: userId,
          }, { ...request, mapping: this.mapping }));
      }
    }
    this.logger.info(`${wantFiles ? 'Files' : 'Chats'} documents generated`, { count: documents.length });
    return documents;
  }
}
