/**
 * Smyklot - src/lib/rwlock.ts
 * WHAT: Async reader/writer lock.
 * WHY: Readers of the shared configuration run concurrently; a writer needs them all out.
 * FLOWS:
 *  - acquireRead()/acquireWrite() → release function
 *  - withRead(fn)/withWrite(fn) → run fn under the lock, release on settle
 *
 * Writer-preferring FIFO: once a writer is queued, readers that arrive later
 * wait behind it, so a steady stream of readers can't starve a writer.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

type Waiter = { kind: "read" | "write"; resolve: () => void };

export type Release = () => void;

export class RwLock {
  private readers = 0;
  private writing = false;
  private readonly queue: Waiter[] = [];

  get readerCount(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  get pending(): number {
    return this.queue.length;
  }

  async acquireRead(): Promise<Release> {
    if (!this.writing && this.queue.length === 0) {
      this.readers += 1;
      return this.releaser("read");
    }
    await new Promise<void>((resolve) => this.queue.push({ kind: "read", resolve }));
    return this.releaser("read");
  }

  async acquireWrite(): Promise<Release> {
    if (!this.writing && this.readers === 0 && this.queue.length === 0) {
      this.writing = true;
      return this.releaser("write");
    }
    await new Promise<void>((resolve) => this.queue.push({ kind: "write", resolve }));
    return this.releaser("write");
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  // Idempotent: a double release must not drive the reader count negative.
  private releaser(kind: Waiter["kind"]): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (kind === "read") {
        this.readers -= 1;
      } else {
        this.writing = false;
      }
      this.drain();
    };
  }

  /**
   * Hands the lock to the head of the queue. Ownership is recorded before the
   * waiter is resolved, so nobody can slip in between.
   */
  private drain(): void {
    while (this.queue.length > 0 && !this.writing) {
      const next = this.queue[0];
      if (next.kind === "write") {
        if (this.readers > 0) return;
        this.queue.shift();
        this.writing = true;
        next.resolve();
        return;
      }
      this.queue.shift();
      this.readers += 1;
      next.resolve();
    }
  }
}
