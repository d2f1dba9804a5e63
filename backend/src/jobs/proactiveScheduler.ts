import { createLogger, NAMESPACES } from '../logging.js';
import type { OrchestrationContext } from '../agents/context/orchestrationContext.js';
import type { WorkflowRunner } from '../agents/AgentWorkflow.js';
import type { AgentDirectory, AgentProfile } from '../interfaces/WorldInterface.js';
import type { ThoughtLog } from '../utils/thoughtLog.js';
import { toError } from '../types/Decision.js';
import { CooldownTracker } from './cooldownTracker.js';
import { InFlightRegistry } from './inFlightRegistry.js';
import { canThinkProactively } from './eligibility.js';

const schedulerLog = createLogger(NAMESPACES.engine.scheduler);

export interface SchedulerStats {
  passes: number;
  skippedPasses: number;
  dispatched: number;
  failed: number;
}

export interface ProactiveSchedulerDeps {
  workflow: WorkflowRunner;
  cooldowns: CooldownTracker;
  directory: AgentDirectory;
  inFlight: InFlightRegistry;
  context: OrchestrationContext;
  thoughtLog?: ThoughtLog;
}

/** Uniform draws without replacement; `random` must return values in [0, 1). */
export function drawWithoutReplacement<T>(pool: readonly T[], count: number, random: () => number): T[] {
  const remaining = [...pool];
  const drawn: T[] = [];
  while (drawn.length < count && remaining.length > 0) {
    const index = Math.min(Math.floor(random() * remaining.length), remaining.length - 1);
    drawn.push(...remaining.splice(index, 1));
  }
  return drawn;
}

/**
 * Gives agents unprompted thinking time. Elapsed time is accumulated across
 * ticks; each full interval starts one selection pass unless one is running.
 */
export class ProactiveScheduler {
  private readonly workflow: WorkflowRunner;
  private readonly cooldowns: CooldownTracker;
  private readonly directory: AgentDirectory;
  private readonly inFlight: InFlightRegistry;
  private readonly context: OrchestrationContext;
  private readonly thoughtLog?: ThoughtLog;
  private readonly counters: SchedulerStats = { passes: 0, skippedPasses: 0, dispatched: 0, failed: 0 };
  private accumulatedSeconds = 0;
  private running = false;
  private currentPass: Promise<number> = Promise.resolve(0);

  constructor(deps: ProactiveSchedulerDeps) {
    this.workflow = deps.workflow;
    this.cooldowns = deps.cooldowns;
    this.directory = deps.directory;
    this.inFlight = deps.inFlight;
    this.context = deps.context;
    this.thoughtLog = deps.thoughtLog;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get stats(): SchedulerStats {
    return { ...this.counters };
  }

  get elapsedSinceLastPass(): number {
    return this.accumulatedSeconds;
  }

  tick(elapsedSeconds: number): void {
    if (!Number.isFinite(elapsedSeconds) || elapsedSeconds <= 0) return;

    const { settings } = this.context;
    this.accumulatedSeconds += elapsedSeconds;
    if (this.accumulatedSeconds < settings.tickIntervalSeconds) return;
    this.accumulatedSeconds = 0;

    if (!settings.enableWorldAI || !this.context.isWorldReady()) {
      this.counters.skippedPasses++;
      return;
    }
    if (this.running) {
      this.counters.skippedPasses++;
      schedulerLog('previous pass still running; skipping interval');
      return;
    }
    this.currentPass = this.runPass();
  }

  whenIdle(): Promise<number> {
    return this.currentPass;
  }

  /** Eligible agents for the next pass, importants first, capped at agentsPerTick. */
  selectAgents(): AgentProfile[] {
    const { agentsPerTick, schedulerCooldownMs, prioritizeImportant } = this.context.settings;
    if (agentsPerTick <= 0) return [];

    const eligible = this.directory
      .list()
      .filter(agent =>
        canThinkProactively(agent) &&
        !this.inFlight.has(agent.id) &&
        !this.cooldowns.isCoolingDown(agent.id, schedulerCooldownMs)
      );

    const important = prioritizeImportant ? eligible.filter(agent => this.context.isImportant(agent)) : [];
    const regular = prioritizeImportant ? eligible.filter(agent => !this.context.isImportant(agent)) : eligible;

    const picked = drawWithoutReplacement(important, agentsPerTick, this.context.random);
    if (picked.length < agentsPerTick) {
      picked.push(...drawWithoutReplacement(regular, agentsPerTick - picked.length, this.context.random));
    }
    return picked;
  }

  /** One selection and dispatch pass. Resolves to the number of agents dispatched. */
  async runPass(): Promise<number> {
    if (this.running) return 0;
    this.running = true;
    this.counters.passes++;
    let dispatched = 0;
    try {
      let selected: AgentProfile[];
      try {
        selected = this.selectAgents();
      } catch (e) {
        schedulerLog('selection failed: %s', toError(e).message);
        return 0;
      }
      schedulerLog('pass selected %d agents: %o', selected.length, selected.map(agent => agent.id));

      for (let i = 0; i < selected.length; i++) {
        if (i > 0) await this.context.sleep(this.context.settings.dispatchDelayMs);
        if (!this.context.isWorldReady()) {
          schedulerLog('world no longer ready; ending pass after %d agents', dispatched);
          break;
        }
        await this.dispatch(selected[i]);
        dispatched++;
      }
      return dispatched;
    } finally {
      this.running = false;
    }
  }

  private async dispatch(agent: AgentProfile): Promise<void> {
    this.cooldowns.stamp(agent.id);
    this.counters.dispatched++;
    try {
      const result = await this.workflow.execute(agent.id, { trigger: { source: 'proactive' } });
      if (result.kind === 'failure') this.counters.failed++;
      this.thoughtLog?.recordResult(result, 'proactive');
      schedulerLog('dispatched %s: %s', agent.id, result.kind);
    } catch (e) {
      this.counters.failed++;
      schedulerLog('error dispatching %s: %s', agent.id, toError(e).message);
    }
  }
}
