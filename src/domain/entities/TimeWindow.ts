/** RFC-3339 時間窗，兩端皆包含 */
export interface TimeWindow {
  start: string;
  end: string;
}

export function isWithinWindow(timestamp: string, window: TimeWindow): boolean {
  const at = Date.parse(timestamp);
  if (Number.isNaN(at)) return false;
  return at >= Date.parse(window.start) && at <= Date.parse(window.end);
}
