import type { AgentProfile } from '../interfaces/WorldInterface.js';

/** Agents that may react to an event at all. */
export function canReact(agent: AgentProfile): boolean {
  return agent.alive && !agent.isPlayer && agent.imprisoned !== true;
}

/** Agents the scheduler may pick for an unprompted cycle. */
export function canThinkProactively(agent: AgentProfile): boolean {
  return canReact(agent) && agent.affiliation !== null && agent.affiliation !== '';
}
