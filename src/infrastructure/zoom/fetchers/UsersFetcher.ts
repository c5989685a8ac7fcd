import { isWithinWindow } from '../../../domain/entities/TimeWindow.js';
import type { PermissionMapping } from '../../../domain/entities/Credentials.js';
import type { SyncDocument } from '../../../domain/entities/SyncDocument.js';
import type { FetchRequest, FetchScope, ObjectFetcher } from '../../../domain/ports/ObjectFetcher.js';
import { Logger } from '../../../shared/Logger.js';
import { readString } from '../../../shared/json.js';
import { createDocument } from './documentFactory.js';

export class UsersFetcher implements ObjectFetcher {
  readonly objectType = 'users' as const;
  private readonly logger = new Logger('UsersFetcher');

  constructor(private readonly mapping: PermissionMapping) {}

  async fetch(scope: FetchScope, request: FetchRequest): Promise<SyncDocument[]> {
    const documents: SyncDocument[] = [];
    for (const user of scope.users) {
      if (!isWithinWindow(readString(user, 'created_at'), request.window)) continue;
      const userId = readString(user, 'id');
      documents.push(createDocument('users', user, {
        body: [
          `First Name : ${readString(user, 'first_name')}`,
          `Last Name : ${readString(user, 'last_name')}`,
          `Status : ${readString(user, 'status')}`,
          `Role Id : ${readString(user, 'role_id')}`,
          `Email : ${readString(user, 'email')}`,
        ].join('\n'),
        url: `https://zoom.us/user/${userId}/profile`,
        ownerId: userId,
      }, { ...request, mapping: this.mapping }));
    }
    this.logger.info('Users documents generated', { count: documents.length });
    return documents;
  }
}
