import { log } from '../log';

export interface WorkItem {
  name: string;
  run: () => Promise<void> | void;
}

/**
 * Serial executor for event handlers. enqueue() is safe to call from any callback and returns
 * immediately; items run one at a time, in order, starting on the next turn of the event loop.
 * A failing item is logged and does not stop the ones behind it.
 */
export class WorkQueue {
  private readonly items: WorkItem[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private readonly logContext: Record<string, unknown>;
  private running = false;

  constructor(logContext: Record<string, unknown> = {}) {
    this.logContext = logContext;
  }

  public enqueue(item: WorkItem): void {
    this.items.push(item);
    if (!this.running) {
      this.running = true;
      setImmediate(() => {
        void this.run();
      });
    }
  }

  public pending(): number {
    return this.items.length;
  }

  public isRunning(): boolean {
    return this.running;
  }

  /** Resolves once every item enqueued so far (and any they enqueue) has run. */
  public idle(): Promise<void> {
    if (!this.running && this.items.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private async run(): Promise<void> {
    while (this.items.length > 0) {
      const item = this.items.shift();
      if (!item) {
        continue;
      }

      try {
        await item.run();
      } catch (error) {
        log.error({ err: error, task: item.name, event: 'work_item_failed', ...this.logContext }, 'work item failed');
      }
    }

    this.running = false;
    const waiters = this.idleWaiters.splice(0);
    for (const resolve of waiters) {
      resolve();
    }
  }
}
