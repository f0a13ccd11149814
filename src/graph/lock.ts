import PQueue from "p-queue";

/**
 * Serializes async work per key. Each key gets a concurrency-1 queue that is
 * dropped again once it drains, so the map only holds keys with work in flight.
 */
export class KeyedLock {
  private queues = new Map<string, PQueue>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const queue = this.getQueue(key);
    try {
      return await queue.add(fn, { throwOnTimeout: true });
    } finally {
      if (queue.size === 0 && queue.pending === 0 && this.queues.get(key) === queue) {
        this.queues.delete(key);
      }
    }
  }

  /** Keys that currently hold or wait for the lock */
  activeKeys(): string[] {
    return [...this.queues.keys()];
  }

  private getQueue(key: string): PQueue {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(key, queue);
    }
    return queue;
  }
}
