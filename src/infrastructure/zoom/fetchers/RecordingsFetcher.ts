import type { PermissionMapping } from '../../../domain/entities/Credentials.js';
import type { SyncDocument } from '../../../domain/entities/SyncDocument.js';
import type { FetchRequest, FetchScope, ObjectFetcher } from '../../../domain/ports/ObjectFetcher.js';
import type { ZoomApiPort } from '../../../domain/ports/ZoomApiPort.js';
import { Logger } from '../../../shared/Logger.js';
import { readRecords, readString } from '../../../shared/json.js';
import { toUtcTimestamp } from '../../../shared/time.js';
import { createDocument } from './documentFactory.js';

/** 這些欄位屬於會議本身，同一場會議的所有錄影檔共用 */
const MEETING_LEVEL_FIELDS = new Set(['host_id', 'topic', 'type', 'share_url', 'total_size', 'duration']);

/** 一場會議產生多份文件（每個錄影檔一份）；未 completed 的檔案留待下次同步 */
export class RecordingsFetcher implements ObjectFetcher {
  readonly objectType = 'recordings' as const;
  private readonly logger = new Logger('RecordingsFetcher');

  constructor(
    private readonly api: ZoomApiPort,
    private readonly mapping: PermissionMapping,
  ) {}

  async fetch(scope: FetchScope, request: FetchRequest): Promise<SyncDocument[]> {
    const documents: SyncDocument[] = [];
    const from = toUtcTimestamp(request.window.start);
    const to = toUtcTimestamp(request.window.end);

    for (const user of scope.users) {
      const userId = readString(user, 'id');
      const meetings = await this.api.getPaginated(
        `users/${encodeURIComponent(userId)}/recordings?page_size=300&from=${from}&to=${to}`,
        'meetings',
      );

      for (const meeting of meetings) {
        const meetingUrl = `https://zoom.us/recording/management/detail?meeting_id=${encodeURIComponent(readString(meeting, 'uuid'))}`;
        for (const file of readRecords(meeting, 'recording_files')) {
          if (readString(file, 'status') !== 'completed') {
            this.logger.debug('Recording file still processing, skipped', { id: readString(file, 'id') });
            continue;
          }
          const isTimeline = readString(file, 'file_type').toUpperCase() === 'TIMELINE';
          documents.push(createDocument('recordings', file, {
            body: [
              'File MetaData',
              ` File Type : ${readString(file, 'file_type')}`,
              ` File Size : ${readString(file, 'file_size')}`,
              ` Recording Type : ${readString(file, 'recording_type')}`,
            ].join('\n'),
            url: isTimeline ? undefined : meetingUrl,
            parentId: userId,
            ownerId: userId,
          }, { ...request, mapping: this.mapping }, (source) => {
            if (isTimeline && source === 'play_url') return undefined;
            return MEETING_LEVEL_FIELDS.has(source) ? meeting[source] : file[source];
          }));
        }
      }
    }
    this.logger.info('Recordings documents generated', { count: documents.length });
    return documents;
  }
}
