export interface PullEvent {
  viewerId: string;
  at: number;
}

// compact the backing array once this many pruned slots pile up
const COMPACT_AFTER = 1024;

/**
 * Sliding window of chat pulls for one side of a match.
 *
 * Events are kept sorted by timestamp; pruning advances a head index from
 * the oldest end, and a per-viewer count map keeps the unique-puller count
 * O(1). An event is in the window while `now - at < windowMs`.
 */
export class PullAggregator {
  private events: PullEvent[] = [];
  private head = 0;
  private readonly perViewer = new Map<string, number>();
  private total = 0;
  private newest = Number.NEGATIVE_INFINITY;

  constructor(private readonly windowMs: number) {}

  recordPull(viewerId: string, at: number): void {
    this.total++;

    // binary search for the first event strictly after `at`
    let lo = this.head;
    let hi = this.events.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.events[mid].at <= at) lo = mid + 1;
      else hi = mid;
    }
    this.events.splice(lo, 0, { viewerId, at });
    this.perViewer.set(viewerId, (this.perViewer.get(viewerId) ?? 0) + 1);

    this.newest = Math.max(this.newest, at);
    this.prune(this.newest);
  }

  uniquePullers(now: number): number {
    this.prune(now);
    return this.perViewer.size;
  }

  /** unique / viewers, clamped to [0, 1]; 0 for a channel with no viewers */
  engagementRate(now: number, totalViewers: number): number {
    if (totalViewers <= 0) return 0;
    const rate = this.uniquePullers(now) / totalViewers;
    return Math.min(1, Math.max(0, rate));
  }

  /** Lifetime count of recorded pulls, pruned or not. */
  get totalPulls(): number {
    return this.total;
  }

  /** Pulls currently inside the window. */
  get windowSize(): number {
    return this.events.length - this.head;
  }

  private prune(now: number): void {
    while (
      this.head < this.events.length &&
      now - this.events[this.head].at >= this.windowMs
    ) {
      const { viewerId } = this.events[this.head];
      const count = (this.perViewer.get(viewerId) ?? 1) - 1;
      if (count > 0) this.perViewer.set(viewerId, count);
      else this.perViewer.delete(viewerId);
      this.head++;
    }

    if (this.head >= COMPACT_AFTER && this.head * 2 >= this.events.length) {
      this.events = this.events.slice(this.head);
      this.head = 0;
    }
  }
}
