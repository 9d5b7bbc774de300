/**
 * Per channel, per viewer rate limit on counted pulls.
 */
export class PullCooldown {
  private readonly lastPull = new Map<string, number>();

  constructor(private readonly cooldownMs: number) {}

  /** True, and starts a new cooldown, when the viewer may pull at `at`. */
  tryAcquire(channel: string, viewerId: string, at: number): boolean {
    const key = `${channel}:${viewerId}`;
    const last = this.lastPull.get(key);
    if (last !== undefined && at - last < this.cooldownMs) return false;

    this.lastPull.set(key, at);
    return true;
  }

  forgetChannel(channel: string): void {
    const prefix = `${channel}:`;
    for (const key of this.lastPull.keys()) {
      if (key.startsWith(prefix)) this.lastPull.delete(key);
    }
  }

  get size(): number {
    return this.lastPull.size;
  }
}
