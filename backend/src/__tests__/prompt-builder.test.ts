import { describe, it, expect } from 'vitest';
import { formatTimestamp, PromptBuilder } from '../llm/promptBuilder.js';
import type { ReasoningRequest } from '../interfaces/ReasoningClientInterface.js';
import { keepRecentDecisions, OMITTED_MEMORY_CONTEXT } from '../agents/AgentMemory.js';
import { countMessageTokens, countTokens } from '../utils/tokenCounter.js';
import { perceptionAt } from './fixtures/world.js';

function requestFor(agentId: string, overrides: Partial<ReasoningRequest> = {}): ReasoningRequest {
  return {
    agentId,
    perception: perceptionAt('Pravend'),
    memoryContext: 'No previous decisions - this is your first decision.',
    trigger: { source: 'proactive' },
    ...overrides
  };
}

describe('PromptBuilder', () => {
  const builder = new PromptBuilder({ actionVocabulary: ['Wait', 'Attack'] });

  it('renders the full situation prompt', () => {
    expect(builder.buildUserPrompt(requestFor('Lord_Aldric_Vlandia'))).toBe([
      'CURRENT SITUATION:',
      'Character: Lord_Aldric_Vlandia',
      'Location: Pravend',
      'Time: 2024-05-01 13:45',
      'Weather: Clear (18°C)',
      '',
      'ECONOMY:',
      'Prosperity: 4000',
      'Food Supply: 120',
      'Tax Rate: 15%',
      '',
      'RELATIONS:',
      '  Empire: -60 (Hostile)',
      '  Sturgia: 40 (Neutral)',
      '',
      'MEMORY:',
      'No previous decisions - this is your first decision.',
      '',
      'QUESTION: What should you do in this situation?',
      '',
      'Format:',
      'THOUGHT: [Analysis]',
      'ACTION: [Wait/Attack]',
      'DETAIL: [Details]'
    ].join('\n'));
  });

  it('includes the triggering event', () => {
    const prompt = builder.buildUserPrompt(requestFor('Lord_Aldric_Vlandia', {
      trigger: { source: 'event', eventKind: 'WarDeclared', description: 'Sturgia marches on Pravend' }
    }));
    expect(prompt.split('\n')).toContain('EVENT: WarDeclared - Sturgia marches on Pravend');
  });

  it('embeds the memory context verbatim', () => {
    const memoryContext = 'Your last 1 decisions:\n  1. [just now] Trade: Buy grain';
    const prompt = builder.buildUserPrompt(requestFor('Lord_Aldric_Vlandia', { memoryContext }));
    expect(prompt).toContain(`MEMORY:\n${memoryContext}\n`);
  });

  it('offers the default vocabulary when none is given', () => {
    const prompt = new PromptBuilder().buildUserPrompt(requestFor('Lord_Aldric_Vlandia'));
    expect(prompt.split('\n')).toContain(
      'ACTION: [Wait/LogReasoning/StartSiege/GiveGold/ChangeRelation/MoveArmy/RecruitTroops/Trade/Patrol/Retreat/Attack/Defend/Hide/Work]'
    );
  });

  it('picks the persona from the agent id', () => {
    expect(builder.buildSystemPrompt('Lord_Aldric_Vlandia')).toBe(
      'You are the ruler of a kingdom. You are a powerful, honorable warrior. ' +
      'Your decisions should benefit your people and expand your realm. ' +
      'Consider your previous decisions. Be consistent.'
    );
    expect(builder.buildSystemPrompt('Stranger_1')).toBe(
      'You are a character living in a medieval world. Make decisions using logic and reason. ' +
      'Consider your previous decisions. Be consistent.'
    );
    expect(builder.buildSystemPrompt('Merchant_Ysa').startsWith('You are a wealthy merchant.')).toBe(true);
  });

  it('builds a system and a user message', () => {
    const messages = builder.buildMessages(requestFor('Villager_Omor'));
    expect(messages.map(message => message.role)).toEqual(['system', 'user']);
    expect(messages[0].content.startsWith('You are a peasant.')).toBe(true);
    expect(messages[1].content.startsWith('CURRENT SITUATION:')).toBe(true);
  });

  describe('Turkish prompts', () => {
    const tr = new PromptBuilder({ language: 'tr', actionVocabulary: ['Wait', 'Attack'] });

    it('renders the situation in Turkish', () => {
      const lines = tr.buildUserPrompt(requestFor('Lord_Aldric_Vlandia')).split('\n');
      expect(lines[0]).toBe('MEVCUT DURUM:');
      expect(lines).toContain('Konum: Pravend');
      expect(lines).toContain('Vergi: %15');
      expect(lines).toContain('  Empire: -60 (Dusman)');
      expect(lines).toContain('  Sturgia: 40 (Notr)');
      expect(lines).toContain('AKSIYON: [Wait/Attack]');
      expect(lines[lines.length - 1]).toBe('DETAY: [Detaylar]');
    });

    it('renders the persona in Turkish', () => {
      const system = tr.buildSystemPrompt('Lord_Aldric_Vlandia');
      expect(system.startsWith('Sen bir kralligin hukumdarisin.')).toBe(true);
      expect(system).toContain('Onceki kararlarini goz onunde bulundur. Tutarli ol.');
    });
  });
});

describe('formatTimestamp', () => {
  it('formats in UTC to the minute', () => {
    expect(formatTimestamp(new Date(Date.UTC(2024, 0, 9, 5, 7, 59)))).toBe('2024-01-09 05:07');
  });
});

describe('PromptBuilder token budget', () => {
  const builder = new PromptBuilder();
  const memoryContext = [
    'Your last 3 decisions:',
    '  1. [9 minutes ago] RecruitTroops: Coffers are full. Time to grow the army.',
    '  2. [5 minutes ago] MoveArmy: Victory. We press the advantage.',
    '  3. [just now] Attack: Empire is our gravest threat and must be answered.'
  ].join('\n');
  const request = requestFor('Lord_Aldric_Vlandia', { memoryContext });

  it('leaves the prompt alone without a budget or when it fits', () => {
    const full = builder.buildMessages(request);
    expect(builder.buildMessages(request, 0)).toEqual(full);
    expect(builder.buildMessages(request, countMessageTokens(full))).toEqual(full);
  });

  it('drops the oldest decisions until the prompt fits', () => {
    const twoKept = builder.buildMessages({ ...request, memoryContext: keepRecentDecisions(memoryContext, 2) });
    const fitted = builder.buildMessages(request, countMessageTokens(twoKept));
    expect(fitted).toEqual(twoKept);
    expect(fitted[1].content).toContain('MEMORY:\nYour last 2 decisions:\n  1. [5 minutes ago] MoveArmy:');
  });

  it('omits memory entirely when even one decision is too many', () => {
    const fitted = builder.buildMessages(request, 1);
    expect(fitted[1].content).toContain(`MEMORY:\n${OMITTED_MEMORY_CONTEXT}\n`);
  });

  it('applies the same budget to raw prompts', () => {
    const oneKept = builder.renderRaw('chatml', { ...request, memoryContext: keepRecentDecisions(memoryContext, 1) });
    expect(builder.renderRaw('chatml', request, countTokens(oneKept))).toBe(oneKept);
  });
});
