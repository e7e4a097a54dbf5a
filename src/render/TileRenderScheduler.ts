/**
 * Batched async tile rendering scheduler.
 * Runs up to `batchSize` renders at once and waits for the whole batch
 * before starting the next, so at most `batchSize` plugins are in flight.
 */
export class TileRenderScheduler<T> {
  private pendingItems: T[] = [];
  private renderingInProgress = false;

  /** Called per item to perform the actual render. */
  private renderOne: (item: T) => Promise<void>;

  /** Called after each batch completes. */
  private onBatchComplete: () => void;

  /** Maximum renders in flight at once. */
  private batchSize: number;

  constructor(
    renderOne: (item: T) => Promise<void>,
    onBatchComplete: () => void = () => {},
    batchSize = 4,
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error(`Batch size must be a positive integer, got ${batchSize}`);
    }
    this.renderOne = renderOne;
    this.onBatchComplete = onBatchComplete;
    this.batchSize = batchSize;
  }

  /**
   * Render every item, in order, batch by batch. Resolves once all items
   * have rendered or the run was cancelled.
   */
  async run(items: readonly T[]): Promise<void> {
    if (this.renderingInProgress) {
      throw new Error("TileRenderScheduler is already running");
    }
    this.pendingItems = [...items];
    this.renderingInProgress = true;

    try {
      while (this.pendingItems.length > 0) {
        const batch = this.pendingItems.splice(0, this.batchSize);
        await Promise.all(batch.map((item) => this.renderOne(item)));
        this.onBatchComplete();
      }
    } finally {
      this.renderingInProgress = false;
      this.pendingItems = [];
    }
  }

  get pending(): number {
    return this.pendingItems.length;
  }

  get isActive(): boolean {
    return this.renderingInProgress;
  }

  /** Drop items not yet started. Renders already in flight still finish. */
  cancel(): void {
    this.pendingItems = [];
  }
}
