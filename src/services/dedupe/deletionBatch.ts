/**
 * Loser ids waiting for one bulk delete call. The mode is fixed for the
 * lifetime of the batch.
 */
export class DeletionBatch {
  private ids: string[] = [];

  constructor(
    readonly limit: number,
    readonly permanent: boolean
  ) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Batch size must be a positive integer, got ${limit}`);
    }
  }

  get size(): number {
    return this.ids.length;
  }

  get isFull(): boolean {
    return this.ids.length >= this.limit;
  }

  add(id: string): void {
    if (this.isFull) {
      throw new RangeError(`Deletion batch already holds ${this.limit} ids`);
    }
    this.ids.push(id);
  }

  /** Hand over the queued ids and start empty again. */
  drain(): string[] {
    const drained = this.ids;
    this.ids = [];
    return drained;
  }
}
