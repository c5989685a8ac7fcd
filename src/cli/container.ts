import path from 'node:path';
import { expandHome, loadConfig, type ConnectorConfig } from '../config/ConfigLoader.js';
import { BootstrapUseCase } from '../application/BootstrapUseCase.js';
import { DeletionSyncUseCase } from '../application/DeletionSyncUseCase.js';
import { FetchPipeline } from '../application/FetchPipeline.js';
import { PermissionSyncUseCase } from '../application/PermissionSyncUseCase.js';
import { SyncUseCase, type SyncOptions } from '../application/SyncUseCase.js';
import { loadUserMapping } from '../infrastructure/mapping/UserMappingLoader.js';
import { CheckpointStore } from '../infrastructure/sqlite/CheckpointStore.js';
import { DatabaseManager } from '../infrastructure/sqlite/DatabaseManager.js';
import { LocalDocumentStore } from '../infrastructure/sqlite/LocalDocumentStore.js';
import { SecretsStore } from '../infrastructure/sqlite/SecretsStore.js';
import { WorkplaceSearchAdapter } from '../infrastructure/workplace-search/WorkplaceSearchAdapter.js';
import { createFetcherRegistry } from '../infrastructure/zoom/fetchers/index.js';
import { ZoomClient } from '../infrastructure/zoom/ZoomClient.js';
import { ZoomDirectory } from '../infrastructure/zoom/ZoomDirectory.js';
import { ZoomTokenProvider } from '../infrastructure/zoom/ZoomTokenProvider.js';
import { Logger } from '../shared/Logger.js';

export const DATABASE_FILE = 'connector.db';

/** 各指令共用的相依物件 */
export interface ConnectorContext {
  config: ConnectorConfig;
  bootstrap: BootstrapUseCase;
  sync: SyncUseCase;
  deletionSync: DeletionSyncUseCase;
  permissionSync: PermissionSyncUseCase;
  close(): void;
}

/** 讀取設定並組裝 adapters 與 use cases */
export function createConnectorContext(configPath: string | undefined): ConnectorContext {
  const config = loadConfig(configPath);
  Logger.defaultLevel = config.logLevel;

  const dbManager = new DatabaseManager(path.join(expandHome(config.stateDir), DATABASE_FILE));
  const db = dbManager.getDb();
  const documents = new LocalDocumentStore(db);
  const checkpoints = new CheckpointStore(db, config.startTime);

  const tokens = new ZoomTokenProvider(new SecretsStore(db), {
    clientId: config.zoom.clientId,
    clientSecret: config.zoom.clientSecret,
    authorizationCode: config.zoom.authorizationCode,
    redirectUri: config.zoom.redirectUri,
    authUrl: config.zoom.authUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    retryCount: config.retryCount,
  });
  const api = new ZoomClient(tokens, {
    baseUrl: config.zoom.baseUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    retryCount: config.retryCount,
  });
  const directory = new ZoomDirectory(api);
  const mapping = loadUserMapping(config.zoom.userMapping);
  const pipeline = new FetchPipeline(createFetcherRegistry({ api, directory, mapping }), directory);

  const index = new WorkplaceSearchAdapter({
    hostUrl: config.enterpriseSearch.hostUrl,
    apiKey: config.enterpriseSearch.apiKey,
    sourceId: config.enterpriseSearch.sourceId,
    requestTimeoutMs: config.requestTimeoutMs,
    retryCount: config.retryCount,
  });

  const syncOptions: SyncOptions = {
    objects: config.objects,
    startTime: config.startTime,
    endTime: config.endTime,
    enablePermission: config.enableDocumentPermission,
    fetchThreadCount: config.zoomSyncThreadCount,
    indexThreadCount: config.enterpriseSearchSyncThreadCount,
  };

  return {
    config,
    bootstrap: new BootstrapUseCase(index),
    sync: new SyncUseCase(pipeline, index, documents, checkpoints, syncOptions),
    deletionSync: new DeletionSyncUseCase(api, pipeline, index, documents, syncOptions),
    permissionSync: new PermissionSyncUseCase(directory, index, mapping, {
      enabled: config.enableDocumentPermission,
      mappingPath: config.zoom.userMapping,
    }),
    close: () => dbManager.close(),
  };
}

/** 執行指令並確保資料庫關閉 */
export async function withContext<T>(
  configPath: string | undefined,
  run: (context: ConnectorContext) => Promise<T>,
): Promise<T> {
  const context = createConnectorContext(configPath);
  try {
    return await run(context);
  } finally {
    context.close();
  }
}
