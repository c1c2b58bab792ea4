/**
 * Node budget shared by every branch of one expectimax decision
 */
export class EvalCounter {
  private count = 0;

  constructor(public readonly limit: number) {}

  /**
   * Nodes counted since the last reset
   */
  get value(): number {
    return this.count;
  }

  /**
   * Whether the budget is spent
   */
  get exhausted(): boolean {
    return this.count >= this.limit;
  }

  /**
   * Count one node if the budget allows it
   *
   * @returns false once the budget is spent; the count never passes the limit
   */
  tryAcquire(): boolean {
    if (this.count >= this.limit) {
      return false;
    }
    this.count += 1;
    return true;
  }

  reset(): void {
    this.count = 0;
  }
}
