import { describe, it, expect } from 'vitest';
import { QueueClosedError, WorkQueue } from '../../../src/shared/WorkQueue.js';

describe('WorkQueue', () => {
  it('should deliver items in FIFO order', async () => {
    const queue = new WorkQueue<number>();
    await queue.put(1);
    await queue.put(2);
    await queue.put(3);

    expect(await queue.get()).toBe(1);
    expect(await queue.get()).toBe(2);
    expect(await queue.get()).toBe(3);
  });

  it('should resolve a waiting get when an item arrives', async () => {
    const queue = new WorkQueue<string>();
    const pending = queue.get();
    await queue.put('hello');
    expect(await pending).toBe('hello');
    expect(queue.size).toBe(0);
  });

  it('should hold a put until capacity frees up', async () => {
    const queue = new WorkQueue<string>(1);
    await queue.put('a');

    let admitted = false;
    const blocked = queue.put('b').then(() => {
      admitted = true;
    });
    await Promise.resolve();
    expect(admitted).toBe(false);
    expect(queue.size).toBe(1);

    expect(await queue.get()).toBe('a');
    await blocked;
    expect(admitted).toBe(true);
    expect(await queue.get()).toBe('b');
  });

  it('should drain remaining items after close then return undefined', async () => {
    const queue = new WorkQueue<number>();
    await queue.put(7);
    queue.close();

    expect(queue.isClosed).toBe(true);
    expect(await queue.get()).toBe(7);
    expect(await queue.get()).toBeUndefined();
  });

  it('should release waiting consumers on close', async () => {
    const queue = new WorkQueue<number>();
    const waiting = [queue.get(), queue.get()];
    queue.close();
    expect(await Promise.all(waiting)).toEqual([undefined, undefined]);
  });

  it('should reject puts after close including blocked ones', async () => {
    const queue = new WorkQueue<number>(1);
    await queue.put(1);
    const blocked = queue.put(2);
    queue.close();

    await expect(blocked).rejects.toBeInstanceOf(QueueClosedError);
    await expect(queue.put(3)).rejects.toBeInstanceOf(QueueClosedError);
  });

  it('should reject a capacity below one', () => {
    expect(() => new WorkQueue<number>(0)).toThrow(RangeError);
  });
});
