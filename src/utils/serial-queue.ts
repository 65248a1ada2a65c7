/**
 * FIFO executor that runs at most one task at a time.
 *
 * Each session owns one, so calls against the same browser never overlap
 * while calls against different sessions proceed independently. Tasks carry
 * an id so a queued task can be withdrawn and a running one signalled.
 */

interface Entry {
  id: string;
  controller: AbortController;
  start: () => Promise<void>;
  reject: (reason: unknown) => void;
}

export type CancelOutcome = 'dequeued' | 'signalled' | 'not-found';

export class SerialQueue {
  private running: Entry | null = null;
  private queue: Entry[] = [];

  /**
   * Queue `fn` behind every task already accepted. The signal handed to
   * `fn` aborts when the task is cancelled while running; the slot stays
   * occupied until `fn` settles regardless.
   */
  enqueue<T>(id: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const controller = new AbortController();
      const entry: Entry = {
        id,
        controller,
        reject,
        start: async () => {
          this.running = entry;
          try {
            resolve(await fn(controller.signal));
          } catch (err) {
            reject(err);
          } finally {
            this.running = null;
            this.next();
          }
        },
      };

      this.queue.push(entry);
      if (!this.running) this.next();
    });
  }

  cancel(id: string, reason: Error): CancelOutcome {
    const index = this.queue.findIndex((e) => e.id === id);
    if (index !== -1) {
      const [entry] = this.queue.splice(index, 1);
      entry?.reject(reason);
      return 'dequeued';
    }

    if (this.running?.id === id) {
      this.running.controller.abort(reason);
      return 'signalled';
    }

    return 'not-found';
  }

  /** Reject everything still waiting; the running task is signalled. */
  clear(reason: Error): void {
    const pending = this.queue;
    this.queue = [];
    for (const entry of pending) entry.reject(reason);
    this.running?.controller.abort(reason);
  }

  isBusy(): boolean {
    return this.running !== null || this.queue.length > 0;
  }

  getRunningCount(): number {
    return this.running ? 1 : 0;
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  private next(): void {
    const entry = this.queue.shift();
    if (entry) void entry.start();
  }
}
