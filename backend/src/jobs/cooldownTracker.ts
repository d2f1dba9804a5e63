/**
 * Per-agent timestamp of the last accepted trigger. Shared by the event queue
 * and the proactive scheduler so a burst from one driver also quiets the other.
 */
export class CooldownTracker {
  private readonly stamps = new Map<string, number>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /** Check and stamp in one step; no await separates the two. */
  tryAccept(agentId: string, periodMs: number): boolean {
    if (this.isCoolingDown(agentId, periodMs)) return false;
    this.stamp(agentId);
    return true;
  }

  isCoolingDown(agentId: string, periodMs: number): boolean {
    const last = this.stamps.get(agentId);
    return last !== undefined && this.now() - last < periodMs;
  }

  stamp(agentId: string): void {
    this.stamps.set(agentId, this.now());
  }

  lastTrigger(agentId: string): number | undefined {
    return this.stamps.get(agentId);
  }

  reset(agentId?: string): void {
    if (agentId === undefined) {
      this.stamps.clear();
    } else {
      this.stamps.delete(agentId);
    }
  }

  get size(): number {
    return this.stamps.size;
  }
}
