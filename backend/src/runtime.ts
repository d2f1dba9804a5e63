import { ConfigManager } from './configManager.js';
import { AgentMemory } from './agents/AgentMemory.js';
import { AgentWorkflow } from './agents/AgentWorkflow.js';
import {
  createOrchestrationContext,
  OrchestrationContext,
  OrchestrationContextOverrides
} from './agents/context/orchestrationContext.js';
import type { ReasoningClient } from './interfaces/ReasoningClientInterface.js';
import type { ActionExecutor, AgentDirectory, WorldSensor } from './interfaces/WorldInterface.js';
import { CooldownTracker } from './jobs/cooldownTracker.js';
import { EventReactionQueue } from './jobs/eventReactionQueue.js';
import { InFlightRegistry } from './jobs/inFlightRegistry.js';
import { ProactiveScheduler } from './jobs/proactiveScheduler.js';
import { PromptBuilder } from './llm/promptBuilder.js';
import { createReasoningClient } from './llm/reasoningClients.js';
import { createLogger, NAMESPACES } from './logging.js';
import { ThoughtLog } from './utils/thoughtLog.js';

const runtimeLog = createLogger(NAMESPACES.server.main);

export interface WorldBindings {
  sensor: WorldSensor;
  executor: ActionExecutor;
  directory: AgentDirectory;
  isWorldReady?: () => boolean;
}

export interface RuntimeOptions {
  /** Replaces the client chosen from the default profile. */
  reasoner?: ReasoningClient;
  context?: OrchestrationContextOverrides;
}

export interface Runtime {
  context: OrchestrationContext;
  reasoner: ReasoningClient;
  directory: AgentDirectory;
  memory: AgentMemory;
  cooldowns: CooldownTracker;
  inFlight: InFlightRegistry;
  thoughtLog: ThoughtLog;
  workflow: AgentWorkflow;
  queue: EventReactionQueue;
  scheduler: ProactiveScheduler;
  /** Host heartbeat: releases events held while the world was not ready, then advances the scheduler. */
  tick(elapsedSeconds: number): void;
}

/** Wires one shared memory, cooldown table and in-flight guard behind both drivers. */
export function createRuntime(configManager: ConfigManager, world: WorldBindings, options: RuntimeOptions = {}): Runtime {
  const overrides = options.context ?? {};
  const context = createOrchestrationContext({
    ...overrides,
    settings: { ...configManager.getOrchestrationSettings(), ...overrides.settings },
    logging: { ...configManager.getLogToggles(), ...overrides.logging },
    isWorldReady: overrides.isWorldReady ?? world.isWorldReady
  });

  const reasoner = options.reasoner ?? (() => {
    const profile = configManager.getDefaultProfile();
    return createReasoningClient(profile, {
      fallbackProfiles: configManager.getFallbackProfiles(profile),
      prompts: new PromptBuilder({ language: configManager.getLanguage() })
    });
  })();

  const memory = new AgentMemory({ capacity: context.settings.memoryCapacity, now: context.now });
  const cooldowns = new CooldownTracker(context.now);
  const inFlight = new InFlightRegistry();
  const thoughtLog = new ThoughtLog({ now: context.now, logThoughts: context.logging.thoughts });
  const workflow = new AgentWorkflow({
    sensor: world.sensor,
    reasoner,
    executor: world.executor,
    memory,
    inFlight,
    context
  });
  const queue = new EventReactionQueue({ workflow, cooldowns, context, directory: world.directory, thoughtLog });
  const scheduler = new ProactiveScheduler({ workflow, cooldowns, directory: world.directory, inFlight, context, thoughtLog });

  runtimeLog('runtime ready: reasoner=%s tick=%ds agentsPerTick=%d', reasoner.name, context.settings.tickIntervalSeconds, context.settings.agentsPerTick);
  const tick = (elapsedSeconds: number): void => {
    queue.resume();
    scheduler.tick(elapsedSeconds);
  };

  return { context, reasoner, directory: world.directory, memory, cooldowns, inFlight, thoughtLog, workflow, queue, scheduler, tick };
}
