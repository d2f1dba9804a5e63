import { createLogger, NAMESPACES } from '../logging.js';
import type { OrchestrationContext } from '../agents/context/orchestrationContext.js';
import type { WorkflowRunner } from '../agents/AgentWorkflow.js';
import type { AgentDirectory } from '../interfaces/WorldInterface.js';
import type { ThoughtLog } from '../utils/thoughtLog.js';
import { toError } from '../types/Decision.js';
import { CooldownTracker } from './cooldownTracker.js';
import { canReact } from './eligibility.js';

const queueLog = createLogger(NAMESPACES.engine.queue);

export interface EventWorkItem {
  agentId: string;
  eventKind: string;
  description: string;
  enqueuedAt: number;
}

export interface QueueStats {
  accepted: number;
  dropped: number;
  processed: number;
  failed: number;
}

export interface EventReactionQueueDeps {
  workflow: WorkflowRunner;
  cooldowns: CooldownTracker;
  context: OrchestrationContext;
  /** When given, agents it does not know or that cannot act are dropped. */
  directory?: AgentDirectory;
  thoughtLog?: ThoughtLog;
}

/**
 * FIFO of event reactions, drained one item at a time. Acceptance stamps the
 * agent's cooldown, so a burst of events for one agent yields one reaction.
 */
export class EventReactionQueue {
  private readonly items: EventWorkItem[] = [];
  private readonly workflow: WorkflowRunner;
  private readonly cooldowns: CooldownTracker;
  private readonly context: OrchestrationContext;
  private readonly directory?: AgentDirectory;
  private readonly thoughtLog?: ThoughtLog;
  private readonly counters: QueueStats = { accepted: 0, dropped: 0, processed: 0, failed: 0 };
  private draining = false;
  private drainPromise: Promise<void> = Promise.resolve();

  constructor(deps: EventReactionQueueDeps) {
    this.workflow = deps.workflow;
    this.cooldowns = deps.cooldowns;
    this.context = deps.context;
    this.directory = deps.directory;
    this.thoughtLog = deps.thoughtLog;
  }

  enqueue(agentId: string, eventKind: string, description: string): boolean {
    const { settings } = this.context;
    if (!settings.enableWorldAI) {
      return this.drop(agentId, eventKind, 'world AI disabled');
    }
    if (this.directory) {
      const profile = this.directory.get(agentId);
      if (!profile) return this.drop(agentId, eventKind, 'unknown agent');
      if (!canReact(profile)) return this.drop(agentId, eventKind, 'agent cannot act');
    }
    if (!this.cooldowns.tryAccept(agentId, settings.eventCooldownMs)) {
      return this.drop(agentId, eventKind, 'cooling down');
    }

    this.items.push({ agentId, eventKind, description, enqueuedAt: this.context.now() });
    this.counters.accepted++;
    if (this.context.logging.events) {
      queueLog('accepted %s for %s (%d queued)', eventKind, agentId, this.items.length);
    }
    this.ensureDraining();
    return true;
  }

  get size(): number {
    return this.items.length;
  }

  get isDraining(): boolean {
    return this.draining;
  }

  get stats(): QueueStats {
    return { ...this.counters };
  }

  pending(): EventWorkItem[] {
    return this.items.map(item => ({ ...item }));
  }

  /** Resolves once the current drain loop, if any, has finished. */
  whenIdle(): Promise<void> {
    return this.drainPromise;
  }

  /** Drops every queued item; the one being processed still finishes. */
  clear(): number {
    const removed = this.items.length;
    this.items.length = 0;
    return removed;
  }

  /** Restarts draining held items once the world is ready again. The host calls this every tick. */
  resume(): void {
    if (this.items.length > 0 && this.context.isWorldReady()) this.ensureDraining();
  }

  private drop(agentId: string, eventKind: string, reason: string): boolean {
    this.counters.dropped++;
    if (this.context.logging.events) {
      queueLog('dropped %s for %s: %s', eventKind, agentId, reason);
    }
    return false;
  }

  private ensureDraining(): void {
    if (this.draining) return;
    this.draining = true;
    this.drainPromise = this.drain();
  }

  private async drain(): Promise<void> {
    try {
      while (this.items.length > 0) {
        if (!this.context.isWorldReady()) {
          queueLog('world not ready; holding %d items', this.items.length);
          break;
        }
        const item = this.items.shift();
        if (!item) break;
        await this.process(item);
        await this.context.sleep(this.context.settings.queueDelayMs);
      }
    } finally {
      this.draining = false;
    }
  }

  private async process(item: EventWorkItem): Promise<void> {
    try {
      const result = await this.workflow.execute(item.agentId, {
        trigger: { source: 'event', eventKind: item.eventKind, description: item.description }
      });
      this.counters.processed++;
      if (result.kind === 'failure') this.counters.failed++;
      this.thoughtLog?.recordResult(result, 'event');
      queueLog('processed %s for %s: %s', item.eventKind, item.agentId, result.kind);
    } catch (e) {
      this.counters.processed++;
      this.counters.failed++;
      queueLog('error processing %s for %s: %s', item.eventKind, item.agentId, toError(e).message);
    }
  }
}
