import type { BrokerError } from '../broker/errors.js';

type Entry<T> = {
  channelId: string | undefined;
  resolve: (value: T) => void;
  reject: (err: BrokerError) => void;
  timer: NodeJS.Timeout;
};

/**
 * Outstanding request/reply waits keyed by correlation id, each bounded by
 * a timeout. A wait settles once; later replies for the same key are
 * dropped.
 */
export class WaitTable<T> {
  private readonly waits = new Map<string, Entry<T>>();

  open(key: string, options: { channelId?: string; timeoutMs: number; onTimeout: () => BrokerError }): Promise<T> {
    if (this.waits.has(key)) {
      return Promise.reject(new Error(`Duplicate wait key: ${key}`));
    }
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.waits.delete(key)) {
          reject(options.onTimeout());
        }
      }, options.timeoutMs);
      this.waits.set(key, { channelId: options.channelId, resolve, reject, timer });
    });
  }

  has(key: string): boolean {
    return this.waits.has(key);
  }

  resolve(key: string, value: T): boolean {
    const entry = this.take(key);
    if (!entry) return false;
    entry.resolve(value);
    return true;
  }

  reject(key: string, err: BrokerError): boolean {
    const entry = this.take(key);
    if (!entry) return false;
    entry.reject(err);
    return true;
  }

  rejectChannel(channelId: string, err: BrokerError): number {
    let count = 0;
    for (const [key, entry] of [...this.waits]) {
      if (entry.channelId === channelId && this.reject(key, err)) {
        count += 1;
      }
    }
    return count;
  }

  rejectAll(err: BrokerError): number {
    let count = 0;
    for (const key of [...this.waits.keys()]) {
      if (this.reject(key, err)) count += 1;
    }
    return count;
  }

  get size(): number {
    return this.waits.size;
  }

  private take(key: string): Entry<T> | undefined {
    const entry = this.waits.get(key);
    if (!entry) return undefined;
    this.waits.delete(key);
    clearTimeout(entry.timer);
    return entry;
  }
}
