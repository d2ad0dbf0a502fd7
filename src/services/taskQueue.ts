import type { Disposable } from 'vscode-languageserver-protocol';
import { ILogger, ITaskScheduler } from '../context/contracts';

export interface TaskQueueOptions {
  /**
   * Drain automatically on the next turn of the event loop. When off, the
   * owner drains with `flush()`.
   */
  readonly autoDrain?: boolean;
}

/**
 * FIFO queue of deferred mutations. Tasks scheduled while the queue drains
 * run in the same drain, after everything already queued, so a task never
 * observes a half-run predecessor.
 */
export class TaskQueue implements ITaskScheduler, Disposable {
  private readonly tasks: Array<() => void> = [];
  private readonly autoDrain: boolean;
  private drainHandle: NodeJS.Immediate | undefined;
  private draining = false;
  private disposed = false;

  constructor(
    private readonly logger: ILogger,
    options: TaskQueueOptions = {}
  ) {
    this.autoDrain = options.autoDrain ?? true;
  }

  schedule(task: () => void): void {
    if (this.disposed) {
      return;
    }
    this.tasks.push(task);
    if (this.autoDrain && !this.draining && this.drainHandle === undefined) {
      this.drainHandle = setImmediate(() => {
        this.drainHandle = undefined;
        this.flush();
      });
    }
  }

  /**
   * Run queued tasks until the queue is empty. Returns how many ran.
   */
  flush(): number {
    if (this.draining) {
      return 0;
    }
    this.draining = true;
    let ran = 0;
    try {
      let task = this.tasks.shift();
      while (task) {
        ran += 1;
        try {
          task();
        } catch (err) {
          this.logger.error('[TaskQueue] Scheduled task failed', err);
        }
        task = this.tasks.shift();
      }
    } finally {
      this.draining = false;
    }
    return ran;
  }

  get size(): number {
    return this.tasks.length;
  }

  dispose(): void {
    this.disposed = true;
    this.tasks.length = 0;
    if (this.drainHandle !== undefined) {
      clearImmediate(this.drainHandle);
      this.drainHandle = undefined;
    }
  }
}
