/**
 * Per-thread storage slot.
 *
 * Node.js gives each worker thread its own copy of every module, so a
 * slot created at module level is already private to the thread that
 * loaded it: no other thread can observe or write it, and it needs no
 * lock. The slot is filled lazily by its initializer on first access and
 * goes away with the thread.
 */

import { threadId } from "node:worker_threads";

export class ThreadSlot<T> {
  private state: { value: T } | null = null;

  constructor(private readonly init: () => T) {}

  /** Id of the thread that owns this slot (0 on the main thread). */
  get threadId(): number {
    return threadId;
  }

  /** Whether the initializer has run. */
  get initialized(): boolean {
    return this.state !== null;
  }

  /** Current value, running the initializer on first access. */
  get(): T {
    if (!this.state) {
      this.state = { value: this.init() };
    }
    return this.state.value;
  }

  /** Install a new value and return the one it replaced. */
  replace(value: T): T {
    const previous = this.get();
    this.state = { value };
    return previous;
  }
}
