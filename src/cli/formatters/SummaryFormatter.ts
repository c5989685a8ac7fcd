export type OutputFormat = 'json' | 'text';

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'text';
}

/** 指令結束時輸出的執行摘要 */
export class SummaryFormatter {
  format(title: string, data: object, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return [title, this.flattenToText(data, 1)].join('\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      if (data.every((item) => typeof item !== 'object' || item === null)) {
        return `${prefix}${data.map(String).join(', ')}`;
      }
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
