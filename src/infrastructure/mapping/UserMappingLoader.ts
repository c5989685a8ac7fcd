import fs from 'node:fs';
import type { PermissionMapping } from '../../domain/entities/Credentials.js';
import { expandHome } from '../../config/ConfigLoader.js';
import { Logger } from '../../shared/Logger.js';

const logger = new Logger('UserMappingLoader');

/** 以逗號切欄；雙引號內的逗號不切，`""` 代表一個引號 */
export function splitCsvRow(line: string): string[] {
  const cells: string[] = [];
  let cell = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);
    if (quoted) {
      if (char !== '"') {
        cell += char;
      } else if (line.charAt(i + 1) === '"') {
        cell += '"';
        i++;
      } else {
        quoted = false;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      cells.push(cell.trim());
      cell = '';
    } else {
      cell += char;
    }
  }
  cells.push(cell.trim());
  return cells;
}

/** 解析 `zoom_user_id,workplace_user` CSV；同一來源可對應多個使用者 */
export function parseUserMapping(content: string): Map<string, string[]> {
  const mapping = new Map<string, string[]>();
  content.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed) return;
    const [source, target] = splitCsvRow(trimmed);
    if (!source || !target) {
      logger.warn('Skipping malformed user mapping row', { line: index + 1 });
      return;
    }
    const targets = mapping.get(source) ?? [];
    if (!targets.includes(target)) targets.push(target);
    mapping.set(source, targets);
  });
  return mapping;
}

/** 未設定或檔案不存在時回傳空 mapping */
export function loadUserMapping(mappingPath: string | undefined): PermissionMapping {
  if (!mappingPath) return new Map();
  const resolved = expandHome(mappingPath);
  if (!fs.existsSync(resolved)) {
    logger.warn('User mapping file not found', { path: resolved });
    return new Map();
  }
  return parseUserMapping(fs.readFileSync(resolved, 'utf-8'));
}
