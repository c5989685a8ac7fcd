import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CONFIG } from './defaults.js';
import { connectorConfigSchema, type ConnectorConfig, type PartialConfig } from './types.js';
import { ConfigValidationError } from '../domain/errors/DomainErrors.js';
import { isRecord } from '../shared/json.js';

export type { ConnectorConfig, PartialConfig } from './types.js';

/** 深層合併：partial 覆蓋 base；陣列與 null 直接取代 */
function deepMerge(base: Record<string, unknown>, partial: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(partial)) {
    if (val === undefined) continue;
    const current = result[key];
    result[key] = isRecord(val) && isRecord(current) ? deepMerge(current, val) : val;
  }
  return result;
}

/** 環境變數覆蓋機密設定 */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env['ZOOM_CLIENT_SECRET']) {
    overrides['zoom'] = { clientSecret: env['ZOOM_CLIENT_SECRET'] };
  }
  if (env['ENTERPRISE_SEARCH_API_KEY']) {
    overrides['enterpriseSearch'] = { apiKey: env['ENTERPRISE_SEARCH_API_KEY'] };
  }
  return deepMerge(config, overrides);
}

export function expandHome(filePath: string): string {
  return filePath.startsWith('~/') ? path.join(os.homedir(), filePath.slice(2)) : filePath;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  const resolved = expandHome(configPath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigValidationError('configFile', `file not found: ${resolved}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (err) {
    throw new ConfigValidationError('configFile', `not valid JSON: ${resolved}`, { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new ConfigValidationError('configFile', 'top level must be a JSON object');
  }
  return parsed;
}

/**
 * 載入設定並合併到預設值上
 * @param configPath - 設定檔路徑；undefined 時只用 defaults 與 overrides
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(
  configPath: string | undefined,
  overrides?: PartialConfig,
  env: NodeJS.ProcessEnv = process.env,
): ConnectorConfig {
  const fileConfig = configPath ? readConfigFile(configPath) : {};

  // 合併順序：defaults < file config < overrides < env
  let merged = deepMerge({ ...DEFAULT_CONFIG }, fileConfig);
  if (overrides) {
    merged = deepMerge(merged, { ...overrides });
  }
  // objects 是同步清單而非巢狀設定：有指定就整個取代預設的九種物件
  const objects = overrides?.objects ?? fileConfig['objects'];
  if (objects !== undefined) merged['objects'] = objects;
  merged = applyEnvOverrides(merged, env);

  const result = connectorConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigValidationError(
      issue ? issue.path.join('.') || '(root)' : '(root)',
      issue?.message ?? 'invalid configuration',
    );
  }
  return result.data;
}
