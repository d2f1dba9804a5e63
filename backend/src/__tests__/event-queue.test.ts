import { describe, it, expect } from 'vitest';
import { EventReactionQueue, EventReactionQueueDeps } from '../jobs/eventReactionQueue.js';
import { CooldownTracker } from '../jobs/cooldownTracker.js';
import { defaultEventDescription, isGameEventKind } from '../jobs/gameEvents.js';
import { InMemoryAgentDirectory } from '../world/InMemoryAgentDirectory.js';
import { ThoughtLog } from '../utils/thoughtLog.js';
import type { WorkflowRunner } from '../agents/AgentWorkflow.js';
import {
  agent,
  failureFor,
  flushAsync,
  GatedWorkflow,
  InstantWorkflow,
  manualClock,
  testContext
} from './fixtures/world.js';

const MINUTE = 60_000;

function build(overrides: Partial<EventReactionQueueDeps> = {}, isWorldReady: () => boolean = () => true) {
  const clock = manualClock(1_000_000);
  const context = testContext({
    now: clock.now,
    isWorldReady,
    settings: { eventCooldownMs: 15 * MINUTE, queueDelayMs: 5 }
  });
  const workflow = new InstantWorkflow();
  const deps: EventReactionQueueDeps = {
    workflow,
    cooldowns: new CooldownTracker(clock.now),
    context,
    ...overrides
  };
  return { clock, context, workflow, queue: new EventReactionQueue(deps) };
}

describe('EventReactionQueue', () => {
  it('accepts one of a burst of events for the same agent', async () => {
    const { queue, workflow } = build();

    const outcomes = [1, 2, 3, 4, 5].map(n => queue.enqueue('a', 'BattleLost', `battle ${n}`));
    await queue.whenIdle();

    expect(outcomes).toEqual([true, false, false, false, false]);
    expect(queue.stats).toEqual({ accepted: 1, dropped: 4, processed: 1, failed: 0 });
    expect(workflow.calls).toEqual([
      { agentId: 'a', options: { trigger: { source: 'event', eventKind: 'BattleLost', description: 'battle 1' } } }
    ]);
  });

  it('accepts the same agent again once the cooldown has passed', async () => {
    const { queue, clock, workflow } = build();

    queue.enqueue('a', 'BattleLost', 'first');
    clock.advance(15 * MINUTE);
    queue.enqueue('a', 'BattleWon', 'second');
    await queue.whenIdle();

    expect(workflow.calls.map(call => call.options?.trigger)).toEqual([
      { source: 'event', eventKind: 'BattleLost', description: 'first' },
      { source: 'event', eventKind: 'BattleWon', description: 'second' }
    ]);
  });

  it('processes items in arrival order and pauses between them', async () => {
    const { queue, workflow, context } = build();

    queue.enqueue('a', 'WarDeclared', 'one');
    queue.enqueue('b', 'WarDeclared', 'two');
    queue.enqueue('c', 'WarDeclared', 'three');
    await queue.whenIdle();

    expect(workflow.calls.map(call => call.agentId)).toEqual(['a', 'b', 'c']);
    expect(context.sleeps).toEqual([5, 5, 5]);
    expect(queue.size).toBe(0);
    expect(queue.isDraining).toBe(false);
  });

  it('runs one workflow at a time', async () => {
    const gated = new GatedWorkflow();
    const { queue } = build({ workflow: gated });

    queue.enqueue('a', 'WarDeclared', 'one');
    queue.enqueue('b', 'WarDeclared', 'two');
    await flushAsync();

    expect(gated.calls.map(call => call.agentId)).toEqual(['a']);
    expect(queue.isDraining).toBe(true);
    expect(queue.pending().map(item => item.agentId)).toEqual(['b']);

    gated.releaseNext();
    await flushAsync(50);
    expect(gated.calls.map(call => call.agentId)).toEqual(['a', 'b']);

    gated.releaseNext();
    await queue.whenIdle();
    expect(queue.stats.processed).toBe(2);
  });

  it('holds items while the world is not ready and resumes later', async () => {
    let ready = false;
    const { queue, workflow } = build({}, () => ready);

    expect(queue.enqueue('a', 'VillageRaided', 'smoke on the horizon')).toBe(true);
    await queue.whenIdle();
    expect(workflow.calls).toHaveLength(0);
    expect(queue.size).toBe(1);
    expect(queue.isDraining).toBe(false);

    queue.resume();
    expect(queue.isDraining).toBe(false);

    ready = true;
    queue.resume();
    await queue.whenIdle();
    expect(workflow.calls).toHaveLength(1);
    expect(queue.size).toBe(0);
  });

  it('drops everything while world AI is disabled', () => {
    const clock = manualClock();
    const queue = new EventReactionQueue({
      workflow: new InstantWorkflow(),
      cooldowns: new CooldownTracker(clock.now),
      context: testContext({ now: clock.now, settings: { enableWorldAI: false } })
    });

    expect(queue.enqueue('a', 'WarDeclared', 'x')).toBe(false);
    expect(queue.stats).toEqual({ accepted: 0, dropped: 1, processed: 0, failed: 0 });
  });

  it('drops agents the directory does not know or that cannot act', async () => {
    const directory = new InMemoryAgentDirectory([
      agent('Lord_A'),
      agent('Player', { isPlayer: true }),
      agent('Lord_Dead', { alive: false }),
      agent('Lord_Prisoner', { imprisoned: true })
    ]);
    const { queue, workflow } = build({ directory });

    expect(queue.enqueue('Ghost', 'WarDeclared', 'x')).toBe(false);
    expect(queue.enqueue('Player', 'WarDeclared', 'x')).toBe(false);
    expect(queue.enqueue('Lord_Dead', 'WarDeclared', 'x')).toBe(false);
    expect(queue.enqueue('Lord_Prisoner', 'WarDeclared', 'x')).toBe(false);
    expect(queue.enqueue('Lord_A', 'WarDeclared', 'x')).toBe(true);
    await queue.whenIdle();

    expect(workflow.calls.map(call => call.agentId)).toEqual(['Lord_A']);
    expect(queue.stats.dropped).toBe(4);
  });

  it('counts failed results and thrown errors, and keeps draining', async () => {
    const thoughtLog = new ThoughtLog({ now: () => 42, logThoughts: false });
    let calls = 0;
    const workflow: WorkflowRunner = {
      execute: async agentId => {
        calls++;
        if (agentId === 'boom') throw new Error('unexpected');
        return failureFor(agentId);
      }
    };
    const { queue } = build({ workflow, thoughtLog });

    queue.enqueue('boom', 'WarDeclared', 'x');
    queue.enqueue('a', 'WarDeclared', 'x');
    await queue.whenIdle();

    expect(calls).toBe(2);
    expect(queue.stats).toEqual({ accepted: 2, dropped: 0, processed: 2, failed: 2 });
    expect(thoughtLog.latest()).toEqual([
      {
        agentId: 'a',
        source: 'event',
        thought: '',
        action: '',
        succeeded: false,
        stage: 'reason',
        error: 'backend unavailable',
        timestamp: 42
      }
    ]);
  });

  it('clears pending items', () => {
    const { queue } = build({}, () => false);
    queue.enqueue('a', 'WarDeclared', 'x');
    queue.enqueue('b', 'WarDeclared', 'x');
    expect(queue.clear()).toBe(2);
    expect(queue.size).toBe(0);
  });

  it('records when each item was accepted', () => {
    const { queue } = build({}, () => false);
    queue.enqueue('a', 'PeaceMade', 'x');
    expect(queue.pending()).toEqual([{ agentId: 'a', eventKind: 'PeaceMade', description: 'x', enqueuedAt: 1_000_000 }]);
  });
});

describe('game events', () => {
  it('knows the standard kinds and describes them', () => {
    expect(isGameEventKind('WarDeclared')).toBe(true);
    expect(isGameEventKind('Tournament')).toBe(false);
    expect(defaultEventDescription('WarDeclared')).toBe('War has been declared on your realm.');
    expect(defaultEventDescription('Tournament')).toBe('Something happened: Tournament.');
  });
});
