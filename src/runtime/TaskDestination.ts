import { EnqueueError } from "../errors";
import type { TaskDestinationConfig, TaskMetrics } from "../types/config";
import type { Destination } from "../types/public";

/**
 * Runs queued work later, one task at a time, in the order it was queued.
 * Every callback a body hands to its consumer goes through one of these.
 */
export class TaskDestination implements Destination {
  readonly name: string;
  private queue: Promise<void> = Promise.resolve();
  private pending = 0;
  private closed = false;
  private readonly metrics?: TaskMetrics;

  constructor(config: TaskDestinationConfig = {}) {
    this.name = config.name ?? "default";
    this.metrics = config.metrics;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of tasks queued but not yet run. */
  get size(): number {
    return this.pending;
  }

  enqueue(work: () => void): void {
    if (this.closed) {
      this.drop();
      return;
    }
    this.pending++;
    this.metrics?.onEnqueue?.(this.name);
    // run() never rejects, so the chain stays intact
    this.queue = this.queue.then(() => this.run(work));
  }

  /** Resolves once everything queued so far, and anything that queues, has run. */
  async idle(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.queue;
      await current;
    } while (current !== this.queue);
  }

  /**
   * Tears the destination down. Tasks still waiting are dropped, as is
   * anything queued afterwards; each drop is reported to `metrics.onDropped`.
   */
  close(): void {
    this.closed = true;
  }

  private run(work: () => void): void {
    this.pending--;
    if (this.closed) {
      this.drop();
      return;
    }
    try {
      work();
    } catch (error) {
      if (this.metrics?.onTaskError) {
        this.metrics.onTaskError(this.name, error);
      } else {
        console.error(`Task on destination "${this.name}" failed:`, error);
      }
    }
  }

  private drop(): void {
    this.metrics?.onDropped?.(this.name, new EnqueueError(this.name));
  }
}

export function createTaskDestination(
  config?: TaskDestinationConfig,
): TaskDestination {
  return new TaskDestination(config);
}
