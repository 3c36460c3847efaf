import { asMessage } from "./errors";
import { silentLogger, type Logger } from "./logger";

export type BackgroundTask = {
  label: string;
  run: () => Promise<void>;
};

export interface TaskQueueStats {
  queued: number;
  inFlight: number;
  completed: number;
  failed: number;
  rejected: number;
}

export type TaskQueueOptions = {
  concurrency: number;
  maxPending: number;
  logger?: Logger;
};

/**
 * In-process work queue for jobs that must outlive the request that started
 * them. A task's failure is logged and never reaches the enqueuer.
 */
export class TaskQueue {
  private readonly pending: BackgroundTask[] = [];
  private readonly idleWaiters: (() => void)[] = [];
  private readonly concurrency: number;
  private readonly maxPending: number;
  private readonly logger: Logger;
  private inFlight = 0;
  private stats = { completed: 0, failed: 0, rejected: 0 };

  constructor(options: TaskQueueOptions) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency));
    this.maxPending = Math.max(1, Math.floor(options.maxPending));
    this.logger = options.logger ?? silentLogger;
  }

  /** Returns false when the backlog is full. */
  enqueue(task: BackgroundTask): boolean {
    if (this.pending.length >= this.maxPending) {
      this.stats.rejected += 1;
      this.logger.warn("task rejected; queue full", { label: task.label, pending: this.pending.length });
      return false;
    }
    this.pending.push(task);
    setImmediate(() => this.drain());
    return true;
  }

  snapshot(): TaskQueueStats {
    return { queued: this.pending.length, inFlight: this.inFlight, ...this.stats };
  }

  /** Resolves once nothing is queued or running. */
  idle(): Promise<void> {
    if (this.pending.length === 0 && this.inFlight === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    while (this.inFlight < this.concurrency && this.pending.length > 0) {
      const task = this.pending.shift();
      if (!task) break;
      this.inFlight += 1;
      void this.execute(task);
    }
    this.notifyIfIdle();
  }

  private async execute(task: BackgroundTask): Promise<void> {
    const started = Date.now();
    try {
      await task.run();
      this.stats.completed += 1;
      this.logger.debug("task completed", { label: task.label, ms: Date.now() - started });
    } catch (error) {
      this.stats.failed += 1;
      this.logger.error("task failed", { label: task.label, error: asMessage(error) });
    } finally {
      this.inFlight -= 1;
      this.drain();
    }
  }

  private notifyIfIdle(): void {
    if (this.pending.length > 0 || this.inFlight > 0) return;
    const waiters = this.idleWaiters.splice(0);
    for (const resolve of waiters) resolve();
  }
}
