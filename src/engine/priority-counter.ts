/**
 * Monotonic test-job priority for one reconciliation pass.
 *
 * Jobs submitted in one pass get increasing priorities so the test service
 * schedules them in submission order. One counter per pass; submissions are
 * sequential, so a plain increment suffices.
 */
export class PriorityCounter {
  private current: number;

  constructor(start = 1) {
    this.current = start;
  }

  /** Return the next priority and advance. */
  next(): number {
    return this.current++;
  }

  /** The value the next call to next() returns. */
  peek(): number {
    return this.current;
  }
}
