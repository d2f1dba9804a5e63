import type { AgentDirectory, AgentProfile } from '../interfaces/WorldInterface.js';

export class InMemoryAgentDirectory implements AgentDirectory {
  private readonly agents = new Map<string, AgentProfile>();

  constructor(agents: AgentProfile[] = []) {
    agents.forEach(agent => this.upsert(agent));
  }

  upsert(agent: AgentProfile): void {
    this.agents.set(agent.id, { ...agent });
  }

  /** Applies a partial change, e.g. `{ alive: false }`. Returns false for unknown ids. */
  update(agentId: string, changes: Partial<Omit<AgentProfile, 'id'>>): boolean {
    const current = this.agents.get(agentId);
    if (!current) return false;
    this.agents.set(agentId, { ...current, ...changes });
    return true;
  }

  remove(agentId: string): boolean {
    return this.agents.delete(agentId);
  }

  get(agentId: string): AgentProfile | undefined {
    const agent = this.agents.get(agentId);
    return agent ? { ...agent } : undefined;
  }

  list(): AgentProfile[] {
    return [...this.agents.values()].map(agent => ({ ...agent }));
  }

  get size(): number {
    return this.agents.size;
  }
}
