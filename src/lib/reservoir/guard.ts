/**
 * Mutual-exclusion wrapper around owned state.
 *
 * Critical sections are synchronous callbacks, so on Node's single JS thread
 * nothing else runs between their first and last statement. The guard makes
 * the discipline explicit: the state is only reachable inside `run`, and a
 * nested `run` (which would observe a half-applied update) throws.
 */
export class Guarded<T> {
  private held = false;

  constructor(private readonly state: T) {}

  run<R>(section: (state: T) => R): R {
    if (this.held) {
      throw new Error("Guarded state is already held by this task");
    }
    this.held = true;
    try {
      return section(this.state);
    } finally {
      this.held = false;
    }
  }

  get isHeld(): boolean {
    return this.held;
  }
}
