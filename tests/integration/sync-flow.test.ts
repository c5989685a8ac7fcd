import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FetchPipeline } from '../../src/application/FetchPipeline.js';
import { SyncUseCase, type SyncOptions } from '../../src/application/SyncUseCase.js';
import type { SyncDocument } from '../../src/domain/entities/SyncDocument.js';
import type { SearchIndexPort } from '../../src/domain/ports/SearchIndexPort.js';
import { CheckpointStore } from '../../src/infrastructure/sqlite/CheckpointStore.js';
import { DatabaseManager } from '../../src/infrastructure/sqlite/DatabaseManager.js';
import { LocalDocumentStore } from '../../src/infrastructure/sqlite/LocalDocumentStore.js';
import { fakeDirectory, fakeSearchIndex, registry, stubFetcher } from '../helpers/fakes.js';

const START = '2024-01-01T00:00:00Z';
const FIRST_RUN = new Date('2024-08-15T00:00:00Z');
const SECOND_RUN = new Date('2024-08-20T00:00:00Z');

const options: SyncOptions = {
  objects: { users: null, roles: null, chats: null },
  startTime: START,
  enablePermission: false,
  fetchThreadCount: 1,
  indexThreadCount: 2,
  queueCapacity: 2,
};

const chat: SyncDocument = {
  id: 'c1',
  type: 'chats',
  parent_id: 'u1',
  created_at: '2024-08-01T00:00:00Z',
  body: 'hello',
};

describe('full and incremental sync', () => {
  let mgr: DatabaseManager;
  let documents: LocalDocumentStore;
  let checkpoints: CheckpointStore;

  const roles = stubFetcher('roles', () => [{ id: 'r1', type: 'roles', body: 'Admin' }]);
  const users = stubFetcher('users', (scope) => scope.users.map((user): SyncDocument => ({
    id: String(user['id']),
    type: 'users',
    created_at: '2023-01-01T00:00:00Z',
    body: null,
  })));
  const chats = stubFetcher('chats', (scope) => (scope.chatUserIds.includes('u1') ? [chat] : []));
  const directory = fakeDirectory({
    listUsers: async () => [{ id: 'u1' }, { id: 'u2' }],
    listChatEnabledUserIds: async () => ['u1'],
  });

  function useCase(index: SearchIndexPort, now: Date, pipeline = new FetchPipeline(registry(roles, users, chats), directory)) {
    return new SyncUseCase(pipeline, index, documents, checkpoints, options, () => now);
  }

  beforeEach(() => {
    mgr = new DatabaseManager(':memory:');
    documents = new LocalDocumentStore(mgr.getDb());
    checkpoints = new CheckpointStore(mgr.getDb(), START);
    roles.fetch.mockClear();
    users.fetch.mockClear();
    chats.fetch.mockClear();
  });

  afterEach(() => {
    mgr.close();
  });

  it('should index every document and commit checkpoints after a full sync', async () => {
    const index = fakeSearchIndex();
    const stats = await useCase(index, FIRST_RUN).fullSync();

    expect(stats).toMatchObject({
      runKind: 'full',
      objectTypes: ['users', 'roles', 'chats'],
      documentsFetched: 4,
      documentsGenerated: 4,
      documentsIndexed: 4,
      checkpointsCommitted: 2,
    });
    expect(users.fetch.mock.calls[0]?.[1].window).toEqual({ start: START, end: '2024-08-15T00:00:00Z' });
    expect(checkpoints.getCheckpoint('users', 'later')).toEqual({ start: '2024-08-15T00:00:00Z', end: 'later' });
    expect(checkpoints.getCheckpoint('chats', 'later')).toEqual({ start: '2024-08-15T00:00:00Z', end: 'later' });
    expect(checkpoints.getCheckpoint('roles', 'later')).toEqual({ start: START, end: 'later' });
    expect(documents.loadStorage()).toEqual({
      global_keys: [
        { id: 'r1', type: 'roles', parent_id: '', created_at: '' },
        { id: 'u1', type: 'users', parent_id: '', created_at: '2023-01-01T00:00:00Z' },
        { id: 'u2', type: 'users', parent_id: '', created_at: '2023-01-01T00:00:00Z' },
        { id: 'c1', type: 'chats', parent_id: 'u1', created_at: '2024-08-01T00:00:00Z' },
      ],
      delete_keys: [],
    });
  });

  it('should resume from the stored checkpoints on an incremental sync', async () => {
    await useCase(fakeSearchIndex(), FIRST_RUN).fullSync();
    const stats = await useCase(fakeSearchIndex(), SECOND_RUN).incrementalSync();

    expect(stats.runKind).toBe('incremental');
    expect(users.fetch.mock.calls[1]?.[1].window).toEqual({
      start: '2024-08-15T00:00:00Z',
      end: '2024-08-20T00:00:00Z',
    });
    expect(roles.fetch.mock.calls[1]?.[1].window).toEqual({ start: START, end: '2024-08-20T00:00:00Z' });
    expect(checkpoints.getCheckpoint('users', 'later').start).toBe('2024-08-20T00:00:00Z');

    const storage = documents.loadStorage();
    expect(storage.global_keys).toHaveLength(4);
    expect(storage.delete_keys.map((r) => r.id)).toEqual(['r1', 'u1', 'u2', 'c1']);
  });

  it('should keep only documents the index accepted', async () => {
    const index = fakeSearchIndex({
      indexDocuments: async (docs) => docs.map((doc) => ({
        id: doc.id,
        errors: doc.id === 'u2' ? ['invalid field'] : [],
      })),
    });
    const stats = await useCase(index, FIRST_RUN).fullSync();

    expect(stats.documentsIndexed).toBe(3);
    expect(documents.loadStorage().global_keys.map((r) => r.id)).toEqual(['r1', 'u1', 'c1']);
  });

  it('should leave checkpoints and storage untouched when indexing fails', async () => {
    const index = fakeSearchIndex({
      indexDocuments: async () => {
        throw new Error('index unavailable');
      },
    });

    await expect(useCase(index, FIRST_RUN).fullSync()).rejects.toThrow('index unavailable');
    expect(checkpoints.getCheckpoint('users', 'later')).toEqual({ start: START, end: 'later' });
    expect(documents.loadStorage()).toEqual({ global_keys: [], delete_keys: [] });
  });

  it('should leave checkpoints and storage untouched when fetching fails', async () => {
    const broken = stubFetcher('users', () => {
      throw new Error('zoom unavailable');
    });
    const pipeline = new FetchPipeline(registry(roles, broken, chats), directory);

    await expect(useCase(fakeSearchIndex(), FIRST_RUN, pipeline).fullSync()).rejects.toThrow('zoom unavailable');
    expect(checkpoints.getCheckpoint('chats', 'later')).toEqual({ start: START, end: 'later' });
    expect(documents.loadStorage().global_keys).toEqual([]);
  });
});
