import {
  LogToggles,
  OrchestrationSettings,
  resolveLogToggles,
  resolveOrchestrationSettings
} from '../../configManager.js';
import type { AgentProfile } from '../../interfaces/WorldInterface.js';

/**
 * Everything the workflow and both drivers read besides their collaborators.
 * Built once per runtime and passed to each constructor; nothing here is
 * module-level state.
 */
export interface OrchestrationContext {
  settings: OrchestrationSettings;
  logging: LogToggles;
  now: () => number;
  random: () => number;
  sleep: (ms: number) => Promise<void>;
  /**
   * False while results would be meaningless (loading, mid-battle, a menu that
   * freezes the campaign). Checked before any result is applied.
   */
  isWorldReady: () => boolean;
  /** Agents drawn before the general population by the scheduler. */
  isImportant: (agent: AgentProfile) => boolean;
}

export interface OrchestrationContextOverrides {
  settings?: Partial<OrchestrationSettings>;
  logging?: Partial<LogToggles>;
  now?: () => number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
  isWorldReady?: () => boolean;
  isImportant?: (agent: AgentProfile) => boolean;
}

export async function sleep(ms: number): Promise<void> {
  if (ms <= 0) return;
  return new Promise(resolve => setTimeout(resolve, ms));
}

export const isFactionLeader = (agent: AgentProfile): boolean => agent.factionLeader === true;

export function createOrchestrationContext(overrides: OrchestrationContextOverrides = {}): OrchestrationContext {
  return {
    settings: { ...resolveOrchestrationSettings(), ...overrides.settings },
    logging: { ...resolveLogToggles(), ...overrides.logging },
    now: overrides.now ?? Date.now,
    random: overrides.random ?? Math.random,
    sleep: overrides.sleep ?? sleep,
    isWorldReady: overrides.isWorldReady ?? (() => true),
    isImportant: overrides.isImportant ?? isFactionLeader
  };
}
