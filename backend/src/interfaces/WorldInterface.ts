/**
 * WorldInterface - the seams between the orchestration engine and the host simulation.
 * The engine never reads or writes world state directly; it goes through these.
 */

import type { Perception } from '../types/Perception.js';
import type { ActionResult, AgentAction } from '../types/Decision.js';

export interface WorldSensor {
  /**
   * Reads the world into a fresh perception snapshot for one agent.
   * May be slow (I/O) and may fail; should honour the abort signal when it can.
   */
  perceive(agentId: string, signal?: AbortSignal): Promise<Perception>;
}

export interface ActionExecutor {
  /** Whether an action type is registered. A throw here fails only that action. */
  canExecute(actionType: string): boolean;

  /**
   * Applies one action to the world.
   * @returns the outcome; a thrown error is recorded by the caller as a failed result
   */
  execute(action: AgentAction, signal?: AbortSignal): Promise<ActionResult>;
}

export interface AgentProfile {
  id: string;
  name?: string;
  alive: boolean;
  isPlayer: boolean;
  imprisoned?: boolean;
  /** Clan, kingdom or guild; agents without one are never scheduled. */
  affiliation: string | null;
  factionLeader?: boolean;
}

export interface AgentDirectory {
  get(agentId: string): AgentProfile | undefined;
  list(): AgentProfile[];
}
