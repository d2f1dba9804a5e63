import { describe, it, expect } from 'vitest';
import {
  ChainedReasoningClient,
  createReasoningClient,
  CustomReasoningClient,
  MockReasoningClient,
  OpenAIReasoningClient
} from '../llm/reasoningClients.js';
import { parseDecision } from '../agents/decisionParser.js';
import type { ReasoningClient, ReasoningRequest } from '../interfaces/ReasoningClientInterface.js';
import type { LLMProfile } from '../configManager.js';
import type { Trigger } from '../types/Decision.js';
import type { PerceptionInit } from '../types/Perception.js';
import { perceptionAt, ScriptedReasoner } from './fixtures/world.js';

function requestFor(agentId: string, perception: Partial<PerceptionInit> = {}, trigger: Trigger = { source: 'proactive' }): ReasoningRequest {
  return {
    agentId,
    perception: perceptionAt('Pravend', perception),
    memoryContext: 'No previous decisions - this is your first decision.',
    trigger
  };
}

const calm = { relations: { Sturgia: 40 } };

describe('MockReasoningClient', () => {
  const mock = new MockReasoningClient();

  it('answers in the decision line format', async () => {
    const raw = await mock.reason(requestFor('Lord_Aldric_Vlandia'));
    expect(raw).toBe('THOUGHT: Empire is our gravest threat and must be answered.\nACTION: Attack\nDETAIL: Empire');
    expect(parseDecision('Lord_Aldric_Vlandia', raw).actions).toEqual([{ type: 'Attack', parameters: { detail: 'Empire' } }]);
  });

  it('reacts to known events first', () => {
    const decision = mock.decide(requestFor('Lord_Aldric_Vlandia', {}, {
      source: 'event',
      eventKind: 'WarDeclared',
      description: 'Sturgia attacks'
    }));
    expect(decision).toEqual({ thought: 'War is upon us. We need more swords.', action: 'RecruitTroops', detail: 'Sturgia attacks' });
  });

  it('falls back to the location when an event has no description', () => {
    const decision = mock.decide(requestFor('Lord_A', {}, { source: 'event', eventKind: 'VillageRaided', description: '' }));
    expect(decision.action).toBe('Patrol');
    expect(decision.detail).toBe('Pravend');
  });

  it('ignores unknown event kinds', () => {
    const decision = mock.decide(requestFor('Lord_A', calm, { source: 'event', eventKind: 'Tournament', description: 'x' }));
    expect(decision.action).toBe('Wait');
  });

  it('lets merchants trade and peasants hide or work', () => {
    expect(mock.decide(requestFor('Merchant_Ysa')).action).toBe('Trade');
    expect(mock.decide(requestFor('Villager_Omor'))).toMatchObject({ action: 'Hide', detail: 'Empire' });
    expect(mock.decide(requestFor('Villager_Omor', calm))).toEqual({
      thought: 'The harvest will not bring itself in.',
      action: 'Work',
      detail: 'Pravend'
    });
  });

  it('buys grain when food runs low', () => {
    const decision = mock.decide(requestFor('Lord_A', { economy: { prosperity: 4000, foodSupply: 30, taxRate: 15 } }));
    expect(decision).toMatchObject({ action: 'Trade', detail: 'Buy grain' });
  });

  it('targets the worst relation', () => {
    const decision = mock.decide(requestFor('Lord_A', { relations: { Empire: -60, Khuzait: -90, Sturgia: 40 } }));
    expect(decision).toMatchObject({ action: 'Attack', detail: 'Khuzait' });
  });

  it('recruits when rich and waits otherwise', () => {
    expect(mock.decide(requestFor('Lord_A', { ...calm, economy: { prosperity: 6000, foodSupply: 120, taxRate: 15 } })).action)
      .toBe('RecruitTroops');
    expect(mock.decide(requestFor('Lord_A', calm))).toEqual({
      thought: 'Nothing demands action yet.',
      action: 'Wait',
      detail: 'Watch and wait'
    });
  });

  it('refuses an aborted request', async () => {
    const counted = new MockReasoningClient();
    const controller = new AbortController();
    controller.abort();
    await expect(counted.reason(requestFor('Lord_A'), controller.signal)).rejects.toThrow();
    expect(counted.calls).toBe(0);
  });
});

describe('ChainedReasoningClient', () => {
  const failing: ReasoningClient = {
    name: 'failing',
    reason: async () => {
      throw new Error('connection refused');
    }
  };

  it('falls through to the next client', async () => {
    const backup = new ScriptedReasoner('ACTION: Defend');
    const chain = new ChainedReasoningClient([failing, backup]);

    await expect(chain.reason(requestFor('Lord_A'))).resolves.toBe('ACTION: Defend');
    expect(chain.name).toBe('failing -> scripted');
    expect(backup.requests).toHaveLength(1);
  });

  it('rethrows the last error when every client fails', async () => {
    const chain = new ChainedReasoningClient([failing, failing]);
    await expect(chain.reason(requestFor('Lord_A'))).rejects.toThrow('connection refused');
  });

  it('stops at an abort', async () => {
    const controller = new AbortController();
    const aborting: ReasoningClient = {
      name: 'aborting',
      reason: async () => {
        controller.abort();
        throw new Error('aborted');
      }
    };
    const backup = new ScriptedReasoner('ACTION: Defend');
    const chain = new ChainedReasoningClient([aborting, backup]);

    await expect(chain.reason(requestFor('Lord_A'), controller.signal)).rejects.toThrow('aborted');
    expect(backup.requests).toHaveLength(0);
  });

  it('needs at least one client', () => {
    expect(() => new ChainedReasoningClient([])).toThrow('ChainedReasoningClient needs at least one client');
  });
});

describe('createReasoningClient', () => {
  const openai: LLMProfile = { type: 'openai', baseURL: 'http://primary.test/v1', model: 'test-model' };
  const openaiBackup: LLMProfile = { type: 'openai', baseURL: 'http://backup.test/v1' };
  const local: LLMProfile = { type: 'custom', baseURL: 'http://localhost:5001/v1', model: 'local-model' };
  const mock: LLMProfile = { type: 'mock' };

  it('builds one client per profile type', () => {
    expect(createReasoningClient(mock)).toBeInstanceOf(MockReasoningClient);
    expect(createReasoningClient(local)).toBeInstanceOf(CustomReasoningClient);
    expect(createReasoningClient(local).name).toBe('custom:local-model');
    expect(createReasoningClient(openai).name).toBe('openai:test-model');
  });

  it('keeps OpenAI-compatible fallbacks inside the chat client', () => {
    const client = createReasoningClient(openai, { fallbackProfiles: [openaiBackup] });
    expect(client).toBeInstanceOf(OpenAIReasoningClient);
  });

  it('chains fallbacks of other types after the primary', () => {
    const client = createReasoningClient(openai, { fallbackProfiles: [openaiBackup, local, mock] });
    expect(client).toBeInstanceOf(ChainedReasoningClient);
    expect(client.name).toBe('openai:test-model -> custom:local-model -> mock');
  });

  it('chains every fallback of a non-OpenAI profile', () => {
    const client = createReasoningClient(local, { fallbackProfiles: [openaiBackup, mock] });
    expect(client.name).toBe('custom:local-model -> openai:default -> mock');
  });

  it('answers through the mock when the primary fails', async () => {
    const client = new ChainedReasoningClient([
      { name: 'down', reason: async () => { throw new Error('ECONNREFUSED'); } },
      createReasoningClient(mock)
    ]);
    const raw = await client.reason(requestFor('Merchant_Ysa'));
    expect(raw).toBe('THOUGHT: The markets are where fortunes are made.\nACTION: Trade\nDETAIL: Buy low at Pravend');
  });
});
