/**
 * Command Queue
 *
 * GDB does not multiplex concurrent commands safely, so every command
 * runs as a task on this queue: one task at a time, FIFO, with a bounded
 * number of waiting tasks. Priority tasks jump ahead of waiting ones.
 */

import { CommandError } from '../errors.js';
import type { QueueMode } from '../config.js';

export interface CommandQueueOptions {
  /** Maximum number of tasks waiting behind the running one */
  maxDepth: number;
  /** 'queue' waits in line, 'reject' fails immediately while busy */
  mode: QueueMode;
}

interface QueuedTask {
  run: () => Promise<void>;
  reject: (error: Error) => void;
}

export class CommandQueue {
  private waiting: QueuedTask[] = [];
  private running = false;
  private closedWith: Error | null = null;

  constructor(private readonly options: CommandQueueOptions) {}

  /**
   * Run a task once every task ahead of it has settled
   */
  run<T>(task: () => Promise<T>, priority = false): Promise<T> {
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }

    if (!priority && this.running) {
      if (this.options.mode === 'reject') {
        return Promise.reject(
          new CommandError('COMMAND_REJECTED', 'Another command is already in flight')
        );
      }
      if (this.waiting.length >= this.options.maxDepth) {
        return Promise.reject(
          new CommandError(
            'QUEUE_FULL',
            `Command queue is full (${this.options.maxDepth} commands waiting)`
          )
        );
      }
    }

    return new Promise<T>((resolve, reject) => {
      const queued: QueuedTask = {
        run: () => Promise.resolve().then(task).then(resolve, reject),
        reject
      };

      if (priority) {
        this.waiting.unshift(queued);
      } else {
        this.waiting.push(queued);
      }
      this.drain();
    });
  }

  /**
   * Reject every waiting task and refuse new ones. The running task is left
   * to settle on its own.
   */
  close(error: Error): void {
    this.closedWith = error;
    const waiting = this.waiting;
    this.waiting = [];
    for (const task of waiting) {
      task.reject(error);
    }
  }

  get depth(): number {
    return this.waiting.length;
  }

  get busy(): boolean {
    return this.running;
  }

  private drain(): void {
    if (this.running) {
      return;
    }
    const next = this.waiting.shift();
    if (!next) {
      return;
    }

    this.running = true;
    void next.run().finally(() => {
      this.running = false;
      this.drain();
    });
  }
}
