// src/audio/bridgeQueue.ts
// How it works: bounded FIFO of audio chunks. offer() never waits: when the queue is full the
// incoming (newest) chunk is rejected and counted. take() parks the caller until a chunk arrives,
// the optional timeout elapses (resolves null) or the AbortSignal fires (rejects AbortedError).
// Parked takers are served in arrival order; a chunk offered while someone waits is handed over
// directly and never occupies a slot.

import { AbortedError } from '../retry';

export const DEFAULT_BRIDGE_QUEUE_CAPACITY = 100;

export interface TakeOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface Waiter {
  resolve: (chunk: Buffer | null) => void;
  cleanup: () => void;
}

export class BridgeQueue {
  public readonly capacity: number;
  private readonly items: Buffer[] = [];
  private readonly waiters: Waiter[] = [];
  private droppedTotal = 0;

  constructor(capacity: number = DEFAULT_BRIDGE_QUEUE_CAPACITY) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  /** Returns false when the chunk was dropped because the queue is full. */
  public offer(chunk: Buffer): boolean {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      waiter.resolve(chunk);
      return true;
    }

    if (this.items.length >= this.capacity) {
      this.droppedTotal += 1;
      return false;
    }

    this.items.push(chunk);
    return true;
  }

  public take(options: TakeOptions = {}): Promise<Buffer | null> {
    const { timeoutMs, signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new AbortedError('take aborted'));
    }

    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }

    if (timeoutMs !== undefined && timeoutMs <= 0) {
      return Promise.resolve(null);
    }

    return new Promise<Buffer | null>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const onAbort = (): void => {
        this.removeWaiter(waiter);
        waiter.cleanup();
        reject(new AbortedError('take aborted'));
      };

      const waiter: Waiter = {
        resolve,
        cleanup: () => {
          if (timer) clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.removeWaiter(waiter);
          waiter.cleanup();
          resolve(null);
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  public tryTake(): Buffer | null {
    return this.items.shift() ?? null;
  }

  /** Empties the queue; returns the number of chunks discarded. Parked takers keep waiting. */
  public drain(): number {
    const discarded = this.items.length;
    this.items.length = 0;
    return discarded;
  }

  public size(): number {
    return this.items.length;
  }

  public waitingTakers(): number {
    return this.waiters.length;
  }

  public getDroppedCount(): number {
    return this.droppedTotal;
  }

  private removeWaiter(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) {
      this.waiters.splice(index, 1);
    }
  }
}
