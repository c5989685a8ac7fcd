import { isWithinWindow } from '../../../domain/entities/TimeWindow.js';
import type { PermissionMapping } from '../../../domain/entities/Credentials.js';
import type { SyncDocument } from '../../../domain/entities/SyncDocument.js';
import { EXISTENCE_NEGATIVE_STATUS, NotFoundError } from '../../../domain/errors/DomainErrors.js';
import type { FetchRequest, FetchScope, ObjectFetcher } from '../../../domain/ports/ObjectFetcher.js';
import type { JsonObject, ZoomApiPort } from '../../../domain/ports/ZoomApiPort.js';
import { Logger } from '../../../shared/Logger.js';
import { readString } from '../../../shared/json.js';
import { createDocument, meetingTypeName } from './documentFactory.js';

const PARTICIPANT_KEYS = ['id', 'name', 'join_time', 'leave_time', 'duration'];

/**
 * past meeting 只能以 meeting id 查詢，無法列舉。
 * 查不到（404/400）代表會議尚未結束，直接略過，不視為刪除。
 */
export class PastMeetingsFetcher implements ObjectFetcher {
  readonly objectType = 'past_meetings' as const;
  private readonly logger = new Logger('PastMeetingsFetcher');

  constructor(
    private readonly api: ZoomApiPort,
    private readonly mapping: PermissionMapping,
  ) {}

  async fetch(scope: FetchScope, request: FetchRequest): Promise<SyncDocument[]> {
    const documents: SyncDocument[] = [];
    for (const { meeting } of scope.meetings) {
      const meetingId = readString(meeting, 'id');
      const past = await this.findPastMeeting(meetingId);
      if (!past || !isWithinWindow(readString(past, 'end_time'), request.window)) continue;

      const participants = await this.listParticipants(meetingId);
      if (participants.length === 0) {
        // 只有主持人參加時 report 為空，手動補上主持人
        participants.push({
          id: past['host_id'],
          name: past['user_name'],
          join_time: past['start_time'],
          leave_time: past['end_time'],
          duration: past['duration'],
        });
      }

      const hostId = readString(meeting, 'host_id');
      documents.push(createDocument('past_meetings', past, {
        body: [
          `Meeting Duration:${readString(past, 'duration')}`,
          `Meeting Type:${meetingTypeName(past['type'])}`,
          `Meeting Participants : ${JSON.stringify(participants)}`,
        ].join('\n'),
        url: `https://zoom.us/user/${hostId}/meeting/${readString(past, 'id')}`,
        parentId: meetingId,
        ownerId: hostId,
      }, { ...request, mapping: this.mapping }));
    }
    this.logger.info('Past meetings documents generated', { count: documents.length });
    return documents;
  }

  private async findPastMeeting(meetingId: string): Promise<JsonObject | undefined> {
    try {
      return await this.api.get(`past_meetings/${encodeURIComponent(meetingId)}`, {
        notFoundStatuses: EXISTENCE_NEGATIVE_STATUS.past_meetings,
      });
    } catch (err) {
      if (err instanceof NotFoundError) {
        this.logger.debug('Meeting has not concluded yet, skipped', { meetingId, status: err.status });
        return undefined;
      }
      throw err;
    }
  }

  private async listParticipants(meetingId: string): Promise<JsonObject[]> {
    try {
      const participants = await this.api.getPaginated(
        `report/meetings/${encodeURIComponent(meetingId)}/participants?page_size=300`,
        'participants',
        { notFoundStatuses: [404] },
      );
      return participants.map((participant) => Object.fromEntries(
        Object.entries(participant).filter(([key]) => PARTICIPANT_KEYS.includes(key)),
      ));
    } catch (err) {
      if (err instanceof NotFoundError) return [];
      throw err;
    }
  }
}
