import type { ObjectType } from '../../../domain/entities/ObjectType.js';
import type { PermissionMapping } from '../../../domain/entities/Credentials.js';
import type { ObjectFetcher } from '../../../domain/ports/ObjectFetcher.js';
import type { ZoomApiPort } from '../../../domain/ports/ZoomApiPort.js';
import type { ZoomDirectoryPort } from '../../../domain/ports/ZoomDirectoryPort.js';
import { ChannelsFetcher } from './ChannelsFetcher.js';
import { ChatMessagesFetcher } from './ChatMessagesFetcher.js';
import { GroupsFetcher } from './GroupsFetcher.js';
import { MeetingsFetcher } from './MeetingsFetcher.js';
import { PastMeetingsFetcher } from './PastMeetingsFetcher.js';
import { RecordingsFetcher } from './RecordingsFetcher.js';
import { RolesFetcher } from './RolesFetcher.js';
import { UsersFetcher } from './UsersFetcher.js';

export type FetcherRegistry = ReadonlyMap<ObjectType, ObjectFetcher>;

export interface FetcherDependencies {
  api: ZoomApiPort;
  directory: ZoomDirectoryPort;
  mapping: PermissionMapping;
  now?: () => Date;
}

/** ObjectType → fetcher 對照表 */
export function createFetcherRegistry(deps: FetcherDependencies): FetcherRegistry {
  const { api, directory, mapping, now } = deps;
  const fetchers: ObjectFetcher[] = [
    new UsersFetcher(mapping),
    new RolesFetcher(directory, mapping),
    new GroupsFetcher(api, mapping),
    new MeetingsFetcher(mapping),
    new PastMeetingsFetcher(api, mapping),
    new RecordingsFetcher(api, mapping),
    new ChannelsFetcher(api, mapping),
    new ChatMessagesFetcher('chats', api, mapping, now),
    new ChatMessagesFetcher('files', api, mapping, now),
  ];
  return new Map(fetchers.map((fetcher) => [fetcher.objectType, fetcher]));
}
