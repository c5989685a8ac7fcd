export class QueueClosedError extends Error {
  constructor() {
    super('Work queue is closed');
    this.name = 'QueueClosedError';
  }
}

interface PendingPut<T> {
  item: T;
  resolve: () => void;
  reject: (err: Error) => void;
}

/**
 * 有界 async FIFO。
 * put 在滿載時等待空位；get 在空佇列時等待新訊息。
 * close 後 put 一律被拒，get 讀完剩餘項目後回傳 undefined。
 */
export class WorkQueue<T> {
  private readonly items: T[] = [];
  private readonly waitingGets: Array<(item: T | undefined) => void> = [];
  private readonly waitingPuts: Array<PendingPut<T>> = [];
  private closed = false;

  constructor(private readonly capacity: number = Number.POSITIVE_INFINITY) {
    if (!(capacity >= 1)) {
      throw new RangeError(`capacity must be >= 1, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  put(item: T): Promise<void> {
    if (this.closed) return Promise.reject(new QueueClosedError());

    const getter = this.waitingGets.shift();
    if (getter) {
      getter(item);
      return Promise.resolve();
    }
    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.waitingPuts.push({ item, resolve, reject });
    });
  }

  get(): Promise<T | undefined> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.admitWaitingPut();
      return Promise.resolve(item);
    }
    if (this.closed) return Promise.resolve(undefined);
    return new Promise<T | undefined>((resolve) => {
      this.waitingGets.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const pending of this.waitingPuts.splice(0)) {
      pending.reject(new QueueClosedError());
    }
    for (const getter of this.waitingGets.splice(0)) {
      getter(undefined);
    }
  }

  private admitWaitingPut(): void {
    const pending = this.waitingPuts.shift();
    if (!pending) return;
    this.items.push(pending.item);
    pending.resolve();
  }
}
