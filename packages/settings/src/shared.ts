/**
 * Reference-counted shared storage for copy-on-write values.
 *
 * Every holder of a value calls `retain()` when it starts sharing a box
 * and `release()` when it stops. `makeMut()` is the single "ensure unique"
 * step that precedes any write: a box with one owner is written in place,
 * a shared box is cloned first so other holders never see the write.
 *
 * Counts are conservative. A holder that is garbage-collected without
 * releasing keeps its count, which can only cause one extra clone later,
 * never a write to storage someone else still reads.
 */

export class Shared<T> {
  private refs = 1;

  constructor(readonly value: T) {}

  /** Register one more owner. Returns the same box. */
  retain(): Shared<T> {
    this.refs++;
    return this;
  }

  /** Drop one owner. */
  release(): void {
    if (this.refs > 0) this.refs--;
  }

  /** Number of registered owners. */
  get refCount(): number {
    return this.refs;
  }

  get isUnique(): boolean {
    return this.refs === 1;
  }
}

/**
 * Ensure the caller owns `shared` exclusively before writing to it.
 *
 * Returns `shared` itself when it is unique. Otherwise releases the
 * caller's reference and returns a fresh box (count 1) holding
 * `clone(shared.value)`. Callers must store the returned box in place of
 * the one they passed in.
 */
export function makeMut<T>(shared: Shared<T>, clone: (value: T) => T): Shared<T> {
  if (shared.isUnique) return shared;
  shared.release();
  return new Shared(clone(shared.value));
}
