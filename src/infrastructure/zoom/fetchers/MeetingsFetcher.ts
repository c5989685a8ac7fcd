import { isWithinWindow } from '../../../domain/entities/TimeWindow.js';
import type { PermissionMapping } from '../../../domain/entities/Credentials.js';
import type { SyncDocument } from '../../../domain/entities/SyncDocument.js';
import type { FetchRequest, FetchScope, ObjectFetcher } from '../../../domain/ports/ObjectFetcher.js';
import { Logger } from '../../../shared/Logger.js';
import { readString } from '../../../shared/json.js';
import { createDocument, meetingTypeName } from './documentFactory.js';

/** scope.meetings 由 orchestrator 事先列出，這裡只依 created_at 過濾並轉成文件 */
export class MeetingsFetcher implements ObjectFetcher {
  readonly objectType = 'meetings' as const;
  private readonly logger = new Logger('MeetingsFetcher');

  constructor(private readonly mapping: PermissionMapping) {}

  async fetch(scope: FetchScope, request: FetchRequest): Promise<SyncDocument[]> {
    const documents: SyncDocument[] = [];
    for (const { ownerId, meeting } of scope.meetings) {
      if (!isWithinWindow(readString(meeting, 'created_at'), request.window)) continue;
      documents.push(createDocument('meetings', meeting, {
        body: `Meeting Host : ${readString(meeting, 'host_id')}\nMeeting Type : ${meetingTypeName(meeting['type'])}`,
        url: `https://zoom.us/user/${ownerId}/meeting/${readString(meeting, 'id')}`,
        parentId: ownerId,
        ownerId,
      }, { ...request, mapping: this.mapping }));
    }
    this.logger.info('Meetings documents generated', { count: documents.length });
    return documents;
  }
}
