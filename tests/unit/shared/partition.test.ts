import { describe, it, expect } from 'vitest';
import {
  serializedSize,
  splitByMaxCumulativeLength,
  splitIntoChunks,
  splitListIntoBuckets,
  uniqueBy,
} from '../../../src/shared/partition.js';

describe('splitListIntoBuckets', () => {
  it('should assign items round-robin', () => {
    expect(splitListIntoBuckets([1, 2, 3, 4, 5], 2)).toEqual([[1, 3, 5], [2, 4]]);
  });

  it('should keep every item exactly once', () => {
    const items = Array.from({ length: 23 }, (_, i) => i);
    const buckets = splitListIntoBuckets(items, 5);
    expect(buckets).toHaveLength(5);
    expect(buckets.flat().sort((a, b) => a - b)).toEqual(items);
    expect(buckets.map((b) => b.length)).toEqual([5, 5, 5, 4, 4]);
  });

  it('should not create more buckets than items', () => {
    expect(splitListIntoBuckets(['a', 'b'], 5)).toEqual([['a'], ['b']]);
    expect(splitListIntoBuckets([], 3)).toEqual([]);
  });
});

describe('splitIntoChunks', () => {
  it('should split 105 items into chunks of 100 and 5', () => {
    const items = Array.from({ length: 105 }, (_, i) => i);
    const chunks = splitIntoChunks(items, 100);
    expect(chunks).toHaveLength(2);
    expect(chunks[0]).toHaveLength(100);
    expect(chunks[1]).toEqual([100, 101, 102, 103, 104]);
  });

  it('should reject a chunk size below one', () => {
    expect(() => splitIntoChunks([1], 0)).toThrow(RangeError);
  });
});

describe('splitByMaxCumulativeLength', () => {
  it('should keep every chunk within the byte limit', () => {
    // 每個字串序列化後為 5 bytes（含引號）
    const items = ['aaa', 'bbb', 'ccc', 'ddd'];
    // [..] 2 bytes + 5 + 1 + 5 = 13
    const chunks = splitByMaxCumulativeLength(items, 13);
    expect(chunks).toEqual([['aaa', 'bbb'], ['ccc', 'ddd']]);
    for (const chunk of chunks) {
      expect(serializedSize(chunk)).toBeLessThanOrEqual(13);
    }
  });

  it('should place an oversized item in its own chunk', () => {
    const chunks = splitByMaxCumulativeLength(['a', 'x'.repeat(50), 'b'], 20);
    expect(chunks).toEqual([['a'], ['x'.repeat(50)], ['b']]);
  });
});

describe('uniqueBy', () => {
  it('should keep the first occurrence of each key', () => {
    const items = [{ id: '1', v: 'first' }, { id: '2', v: 'x' }, { id: '1', v: 'second' }];
    expect(uniqueBy(items, (i) => i.id)).toEqual([{ id: '1', v: 'first' }, { id: '2', v: 'x' }]);
  });
});
