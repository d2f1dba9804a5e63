/** Agents with a workflow cycle currently running, across every driver. */
export class InFlightRegistry {
  private readonly active = new Set<string>();

  acquire(agentId: string): boolean {
    if (this.active.has(agentId)) return false;
    this.active.add(agentId);
    return true;
  }

  release(agentId: string): void {
    this.active.delete(agentId);
  }

  has(agentId: string): boolean {
    return this.active.has(agentId);
  }

  list(): string[] {
    return [...this.active];
  }

  get size(): number {
    return this.active.size;
  }
}
