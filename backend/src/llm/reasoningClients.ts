import { LLMProfile } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import type { ReasoningClient, ReasoningRequest } from '../interfaces/ReasoningClientInterface.js';
import { describeRelation } from '../types/Perception.js';
import { toError } from '../types/Decision.js';
import { archetypeOf } from '../world/archetypes.js';
import { chatCompletion, isAbortError } from './client.js';
import { customLLMRequest } from './customClient.js';
import { PromptBuilder } from './promptBuilder.js';

const mockLog = createLogger(NAMESPACES.llm.mock);
const clientLog = createLogger(NAMESPACES.llm.client);

export class OpenAIReasoningClient implements ReasoningClient {
  readonly name: string;
  private readonly profile: LLMProfile;
  private readonly fallbackProfiles: LLMProfile[];
  private readonly prompts: PromptBuilder;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(profile: LLMProfile, prompts: PromptBuilder, fallbackProfiles: LLMProfile[] = [], sleep?: (ms: number) => Promise<void>) {
    this.profile = profile;
    this.prompts = prompts;
    this.fallbackProfiles = fallbackProfiles;
    this.sleep = sleep;
    this.name = `openai:${profile.model || 'default'}`;
  }

  reason(request: ReasoningRequest, signal?: AbortSignal): Promise<string> {
    return chatCompletion(this.profile, this.prompts.buildMessages(request, this.profile.sampler?.maxContextTokens), {
      fallbackProfiles: this.fallbackProfiles,
      signal,
      sleep: this.sleep
    });
  }
}

export class CustomReasoningClient implements ReasoningClient {
  readonly name: string;
  private readonly profile: LLMProfile;
  private readonly prompts: PromptBuilder;

  constructor(profile: LLMProfile, prompts: PromptBuilder) {
    this.profile = profile;
    this.prompts = prompts;
    this.name = `custom:${profile.model || profile.baseURL || 'default'}`;
  }

  reason(request: ReasoningRequest, signal?: AbortSignal): Promise<string> {
    const prompt = this.prompts.renderRaw(this.profile.template || 'chatml', request, this.profile.sampler?.maxContextTokens);
    return customLLMRequest(this.profile, prompt, { signal });
  }
}

// What an agent does first when an event lands, before any other heuristic.
const EVENT_RESPONSES: Record<string, { action: string; thought: string }> = {
  WarDeclared: { action: 'RecruitTroops', thought: 'War is upon us. We need more swords.' },
  PeaceMade: { action: 'Trade', thought: 'Peace gives us time to refill the treasury.' },
  BattleWon: { action: 'MoveArmy', thought: 'Victory. We press the advantage.' },
  BattleLost: { action: 'Retreat', thought: 'We were beaten. Regroup before the next fight.' },
  SiegeStarted: { action: 'StartSiege', thought: 'The walls will fall if we hold the line.' },
  SettlementUnderSiege: { action: 'Defend', thought: 'Our walls are under attack. Every man to the ramparts.' },
  SettlementCaptured: { action: 'Patrol', thought: 'The town is ours. Secure the roads around it.' },
  SettlementLost: { action: 'RecruitTroops', thought: 'We lost ground. We must rebuild our strength.' },
  VillageRaided: { action: 'Patrol', thought: 'Raiders burned our fields. The villages need protection.' },
  AllyDied: { action: 'ChangeRelation', thought: 'A friend has fallen. His kin must know we stand with them.' },
  EnemyCaptured: { action: 'GiveGold', thought: 'A valuable prisoner. Ransom could serve us well.' },
  AllyCaptured: { action: 'GiveGold', thought: 'Our ally is in chains. Gold may buy his freedom.' },
  Released: { action: 'MoveArmy', thought: 'Free at last. Back to my own lands.' },
  VassalDefected: { action: 'ChangeRelation', thought: 'Betrayal. The remaining clans must be reassured.' },
  NewVassal: { action: 'GiveGold', thought: 'A new clan joins us. A gift will cement their loyalty.' }
};

/**
 * Deterministic stand-in for a language model: reads the perception and
 * answers in the THOUGHT/ACTION/DETAIL format. Used by the mock profile and
 * as the last fallback.
 */
export class MockReasoningClient implements ReasoningClient {
  readonly name = 'mock';
  calls = 0;

  async reason(request: ReasoningRequest, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    this.calls++;
    const { thought, action, detail } = this.decide(request);
    mockLog('%s -> %s', request.agentId, action);
    return `THOUGHT: ${thought}\nACTION: ${action}\nDETAIL: ${detail}`;
  }

  decide(request: ReasoningRequest): { thought: string; action: string; detail: string } {
    const { perception, trigger } = request;

    if (trigger.source === 'event') {
      const response = EVENT_RESPONSES[trigger.eventKind];
      if (response) {
        return { ...response, detail: trigger.description || perception.location };
      }
    }

    let enemy: string | null = null;
    let score = 0;
    for (const [name, value] of Object.entries(perception.relations)) {
      if (value < score) {
        enemy = name;
        score = value;
      }
    }

    switch (archetypeOf(request.agentId)) {
      case 'merchant':
        return { thought: 'The markets are where fortunes are made.', action: 'Trade', detail: `Buy low at ${perception.location}` };
      case 'peasant':
        if (enemy && describeRelation(score) === 'Hostile') {
          return { thought: `${enemy} are too close. Better to stay out of sight.`, action: 'Hide', detail: enemy };
        }
        return { thought: 'The harvest will not bring itself in.', action: 'Work', detail: perception.location };
      default:
        break;
    }

    if (perception.economy.foodSupply < 50) {
      return { thought: 'Our granaries are nearly empty.', action: 'Trade', detail: 'Buy grain' };
    }
    if (enemy && describeRelation(score) === 'Hostile') {
      return { thought: `${enemy} is our gravest threat and must be answered.`, action: 'Attack', detail: enemy };
    }
    if (perception.economy.prosperity > 5000) {
      return { thought: 'Coffers are full. Time to grow the army.', action: 'RecruitTroops', detail: perception.location };
    }
    return { thought: 'Nothing demands action yet.', action: 'Wait', detail: 'Watch and wait' };
  }
}

/**
 * Tries each client in order until one answers. An abort ends the chain
 * immediately.
 */
export class ChainedReasoningClient implements ReasoningClient {
  readonly name: string;
  private readonly clients: ReasoningClient[];

  constructor(clients: ReasoningClient[]) {
    if (clients.length === 0) {
      throw new Error('ChainedReasoningClient needs at least one client');
    }
    this.clients = clients;
    this.name = clients.map(client => client.name).join(' -> ');
  }

  async reason(request: ReasoningRequest, signal?: AbortSignal): Promise<string> {
    let lastError: unknown = null;
    for (const client of this.clients) {
      try {
        return await client.reason(request, signal);
      } catch (error) {
        if (signal?.aborted || isAbortError(error)) throw error;
        lastError = error;
        clientLog('%s failed for %s, trying next: %s', client.name, request.agentId, toError(error).message);
      }
    }
    throw toError(lastError);
  }
}

export interface ReasoningClientOptions {
  fallbackProfiles?: LLMProfile[];
  prompts?: PromptBuilder;
  sleep?: (ms: number) => Promise<void>;
}

function createSingleClient(profile: LLMProfile, prompts: PromptBuilder, options: ReasoningClientOptions, openAIFallbacks: LLMProfile[]): ReasoningClient {
  switch (profile.type) {
    case 'openai':
      return new OpenAIReasoningClient(profile, prompts, openAIFallbacks, options.sleep);
    case 'custom':
      return new CustomReasoningClient(profile, prompts);
    case 'mock':
      return new MockReasoningClient();
  }
}

/**
 * Picks the implementation for a profile once. OpenAI-type fallbacks of an
 * OpenAI profile are retried inside the chat client; any other fallback
 * becomes its own client tried afterwards.
 */
export function createReasoningClient(profile: LLMProfile, options: ReasoningClientOptions = {}): ReasoningClient {
  const prompts = options.prompts ?? new PromptBuilder();
  const fallbacks = options.fallbackProfiles ?? [];
  const inline = profile.type === 'openai' ? fallbacks.filter(candidate => candidate.type === 'openai') : [];
  const chained = fallbacks.filter(candidate => !inline.includes(candidate));

  const primary = createSingleClient(profile, prompts, options, inline);
  if (chained.length === 0) return primary;
  return new ChainedReasoningClient([primary, ...chained.map(candidate => createSingleClient(candidate, prompts, options, []))]);
}
