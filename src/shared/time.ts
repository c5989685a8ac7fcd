/** RFC-3339（UTC、不含毫秒），與 Zoom API 的時間格式一致 */
export function toRfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function isRfc3339(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/.test(value)
    && !Number.isNaN(Date.parse(value));
}

/** 轉成 UTC 的 RFC-3339；`+hh:mm` 位移放進 query string 會被讀成空白 */
export function toUtcTimestamp(value: string): string {
  return toRfc3339(new Date(value));
}

export function subtractDays(date: Date, days: number): Date {
  const result = new Date(date.getTime());
  result.setUTCDate(result.getUTCDate() - days);
  return result;
}

export function subtractMonths(date: Date, months: number): Date {
  const result = new Date(date.getTime());
  result.setUTCMonth(result.getUTCMonth() - months);
  return result;
}

/** 早於 boundary 的起點會被推到 boundary */
export function clampStart(start: string, boundary: Date): { start: string; clamped: boolean } {
  if (Date.parse(start) < boundary.getTime()) {
    return { start: toRfc3339(boundary), clamped: true };
  }
  return { start, clamped: false };
}

/** Zoom 只保留約六個月的聊天紀錄；多留 4 天避免邊界上的請求被拒 */
export function chatRetentionBoundary(now: Date): Date {
  return subtractDays(subtractMonths(now, 6), -4);
}
