import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DeletionSyncUseCase, type DeletionOptions } from '../../src/application/DeletionSyncUseCase.js';
import { FetchPipeline } from '../../src/application/FetchPipeline.js';
import type { LocalStoreRecord } from '../../src/domain/entities/SyncDocument.js';
import type { JsonObject } from '../../src/domain/ports/ZoomApiPort.js';
import { DatabaseManager } from '../../src/infrastructure/sqlite/DatabaseManager.js';
import { LocalDocumentStore } from '../../src/infrastructure/sqlite/LocalDocumentStore.js';
import { ChatMessagesFetcher } from '../../src/infrastructure/zoom/fetchers/ChatMessagesFetcher.js';
import { RecordingsFetcher } from '../../src/infrastructure/zoom/fetchers/RecordingsFetcher.js';
import { FakeZoomApi, fakeDirectory, fakeSearchIndex, registry, stubFetcher } from '../helpers/fakes.js';

const START = '2023-01-01T00:00:00Z';
const NOW = new Date('2024-08-15T00:00:00Z');

function record(id: string, type: LocalStoreRecord['type'], parent_id = '', created_at = ''): LocalStoreRecord {
  return { id, type, parent_id, created_at };
}

const u1 = record('u1', 'users');
const g1 = record('g1', 'groups');
const c1 = record('c1', 'chats', 'u1', '2024-08-10T00:00:00Z');
const RECORDS: LocalStoreRecord[] = [
  u1,
  record('u2', 'users'),
  record('r1', 'roles'),
  g1,
  record('old1', 'chats', 'u1', '2023-12-01T00:00:00Z'),
  record('old2', 'chats', 'u2', '2023-12-01T00:00:00Z'),
  record('m1', 'meetings', 'u1', '2024-08-01T00:00:00Z'),
  record('m2', 'meetings', 'u1', '2024-05-01T00:00:00Z'),
  record('pm1', 'past_meetings', 'm1', '2024-08-05T00:00:00Z'),
  c1,
  record('rec1', 'recordings', 'u1', '2024-08-10T00:00:00Z'),
];

const options: DeletionOptions = {
  objects: {
    users: null,
    roles: null,
    groups: null,
    meetings: null,
    past_meetings: null,
    recordings: null,
    chats: null,
  },
  startTime: START,
  enablePermission: false,
  fetchThreadCount: 1,
};

describe('deletion sync', () => {
  let mgr: DatabaseManager;
  let documents: LocalDocumentStore;

  const recordings = stubFetcher('recordings', () => []);
  const chats = stubFetcher('chats', () => [{ id: 'c1', type: 'chats', parent_id: 'u1', body: 'hello' }]);
  const pipeline = new FetchPipeline(
    registry(recordings, chats),
    fakeDirectory({ listUsers: async () => [{ id: 'u1' }], listChatEnabledUserIds: async () => ['u1'] }),
  );

  function upstream(overrides: Record<string, JsonObject | number> = {}): FakeZoomApi {
    return new FakeZoomApi({
      'roles/r1': 300,
      'groups/g1': {},
      'users/u1': {},
      'users/u2': 404,
      'meetings/m1': 404,
      'past_meetings/m1': 404,
      ...overrides,
    });
  }

  beforeEach(() => {
    mgr = new DatabaseManager(':memory:');
    documents = new LocalDocumentStore(mgr.getDb());
    documents.updateStorage({ global_keys: RECORDS, delete_keys: RECORDS });
    chats.fetch.mockClear();
  });

  afterEach(() => {
    mgr.close();
  });

  it('should delete documents that no longer exist upstream', async () => {
    const api = upstream();
    const index = fakeSearchIndex();
    const stats = await new DeletionSyncUseCase(api, pipeline, index, documents, options, () => NOW).execute();

    expect(api.calls).toEqual([
      'roles/r1',
      'groups/g1',
      'users/u1',
      'users/u2',
      'meetings/m1',
      'past_meetings/m1',
    ]);
    expect(chats.fetch.mock.calls[0]?.[1].window).toEqual({ start: START, end: '2024-08-15T00:00:00Z' });
    expect(index.deleteDocuments).toHaveBeenCalledTimes(1);
    expect(index.deleteDocuments).toHaveBeenCalledWith(['r1', 'u2', 'm1', 'pm1', 'old2', 'rec1']);
    expect(stats).toMatchObject({ candidates: 11, pruned: 2, deleted: 6 });
    expect(documents.loadStorage()).toEqual({ global_keys: [u1, g1, c1], delete_keys: [] });
  });

  it('should stop on an unexpected upstream status without deleting anything', async () => {
    const index = fakeSearchIndex();
    const useCase = new DeletionSyncUseCase(upstream({ 'users/u2': 500 }), pipeline, index, documents, options, () => NOW);

    await expect(useCase.execute()).rejects.toThrow('HTTP 500 for users/u2');
    expect(index.deleteDocuments).not.toHaveBeenCalled();
    expect(documents.loadStorage()).toEqual({ global_keys: RECORDS, delete_keys: RECORDS });
  });
});

describe('deletion sync of refetched objects', () => {
  const CHATS_ENDPOINT = 'chat/users/u1/messages?page_size=300&search_key=%20&search_type=message'
    + '&from=2024-02-19T00:00:00Z&to=2024-08-15T00:00:00Z';
  const RECORDINGS_ENDPOINT = 'users/u1/recordings?page_size=300&from=2023-01-01T00:00:00Z&to=2024-08-15T00:00:00Z';

  const chatKept = record('c1', 'chats', 'u1', '2024-08-10T00:00:00Z');
  const fileKept = record('f1', 'files', 'u1', '2024-08-10T00:00:00Z');
  const recordingKept = record('rec-a', 'recordings', 'u1', '2024-08-01T00:00:00Z');
  const kept = [chatKept, fileKept, recordingKept];
  const missing = [
    record('c2', 'chats', 'u1', '2024-08-11T00:00:00Z'),
    record('x1', 'chats', 'u1', '2024-08-12T00:00:00Z'),
    record('f2', 'files', 'u1', '2024-08-11T00:00:00Z'),
    record('rec-b', 'recordings', 'u1', '2024-08-02T00:00:00Z'),
  ];
  const beforeRetention = record('c-old', 'chats', 'u1', '2024-02-18T00:00:00Z');
  // 同 id 的其他物件不受影響
  const userWithSameId = record('x1', 'users');

  let mgr: DatabaseManager;
  let documents: LocalDocumentStore;

  beforeEach(() => {
    mgr = new DatabaseManager(':memory:');
    documents = new LocalDocumentStore(mgr.getDb());
    const deleteKeys = [...kept, ...missing, beforeRetention];
    documents.updateStorage({ global_keys: [...deleteKeys, userWithSameId], delete_keys: deleteKeys });
  });

  afterEach(() => {
    mgr.close();
  });

  it('should keep refetched chats, files and recordings and delete the missing ones', async () => {
    const api = new FakeZoomApi({}, {
      [CHATS_ENDPOINT]: [
        { id: 'c1', message: 'hello', date_time: '2024-08-10T00:00:00Z' },
        { id: 'msg-f1', file_id: 'f1', file_name: 'notes.txt', file_size: 12, date_time: '2024-08-10T00:00:00Z' },
      ],
      [RECORDINGS_ENDPOINT]: [{
        uuid: 'meeting-1',
        topic: 'Review',
        recording_files: [
          { id: 'rec-a', status: 'completed', file_type: 'MP4', recording_start: '2024-08-01T00:00:00Z' },
        ],
      }],
    });
    const now = () => NOW;
    const pipeline = new FetchPipeline(
      registry(
        new RecordingsFetcher(api, new Map()),
        new ChatMessagesFetcher('chats', api, new Map(), now),
        new ChatMessagesFetcher('files', api, new Map(), now),
      ),
      fakeDirectory({ listUsers: async () => [{ id: 'u1' }], listChatEnabledUserIds: async () => ['u1'] }),
    );
    const index = fakeSearchIndex();
    const stats = await new DeletionSyncUseCase(api, pipeline, index, documents, {
      objects: { recordings: null, chats: null, files: null },
      startTime: START,
      enablePermission: false,
      fetchThreadCount: 1,
    }, now).execute();

    expect(api.calls).toEqual([RECORDINGS_ENDPOINT, CHATS_ENDPOINT, CHATS_ENDPOINT]);
    expect(index.deleteDocuments).toHaveBeenCalledWith(['c2', 'x1', 'f2', 'rec-b']);
    expect(stats).toMatchObject({ candidates: 8, pruned: 1, deleted: 4 });
    expect(documents.loadStorage()).toEqual({
      global_keys: [chatKept, fileKept, recordingKept, userWithSameId],
      delete_keys: [],
    });
  });
});
