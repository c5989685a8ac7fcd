/**
 * Round-robin 分桶：第 i 桶取 items[i], items[i + n], ...
 * n = min(totalBuckets, items.length)；空輸入回傳空陣列。
 */
export function splitListIntoBuckets<T>(items: readonly T[], totalBuckets: number): T[][] {
  if (items.length === 0) return [];
  const groups = Math.max(1, Math.min(totalBuckets, items.length));
  const buckets: T[][] = Array.from({ length: groups }, () => []);
  items.forEach((item, index) => {
    buckets[index % groups]?.push(item);
  });
  return buckets;
}

export function splitIntoChunks<T>(items: readonly T[], chunkSize: number): T[][] {
  if (chunkSize < 1) throw new RangeError(`chunkSize must be >= 1, got ${chunkSize}`);
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += chunkSize) {
    chunks.push(items.slice(i, i + chunkSize));
  }
  return chunks;
}

export function serializedSize(value: unknown): number {
  return Buffer.byteLength(JSON.stringify(value), 'utf8');
}

/** 依 size 累計切分，使每個 chunk 序列化成 JSON 陣列後不超過 maxBytes */
export function splitByMaxCumulativeLength<T>(
  items: readonly T[],
  maxBytes: number,
  sizeOf: (item: T) => number = serializedSize,
): T[][] {
  const chunks: T[][] = [];
  let current: T[] = [];
  // "[" + "]" 兩個 byte，元素之間各一個逗號
  let currentBytes = 2;

  for (const item of items) {
    const itemBytes = sizeOf(item);
    const added = current.length === 0 ? itemBytes : itemBytes + 1;
    if (current.length > 0 && currentBytes + added > maxBytes) {
      chunks.push(current);
      current = [];
      currentBytes = 2;
    }
    currentBytes += current.length === 0 ? itemBytes : itemBytes + 1;
    current.push(item);
  }
  if (current.length > 0) chunks.push(current);
  return chunks;
}

/** 保留第一次出現的項目 */
export function uniqueBy<T>(items: readonly T[], keyOf: (item: T) => string): T[] {
  const seen = new Set<string>();
  const result: T[] = [];
  for (const item of items) {
    const key = keyOf(item);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(item);
  }
  return result;
}
