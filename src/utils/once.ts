/**
 * Compute-once cell for lazily derived values.
 *
 * The first `get` runs the initializer and stores its result, including
 * `undefined`; later calls return the stored value without re-running it.
 * JavaScript runs one call stack at a time, so a filled slot is all the
 * guarding a first access needs.
 */
export class Once<T> {
  private slot: { value: T } | undefined;

  constructor(private readonly init: () => T) {}

  get(): T {
    if (!this.slot) {
      this.slot = { value: this.init() };
    }
    return this.slot.value;
  }

  /** Whether the value has been computed. */
  get isSet(): boolean {
    return this.slot !== undefined;
  }
}
