import { describe, it, expect } from 'vitest';
import {
  normalizeActionType,
  parseDecision,
  scanDecisionFields,
  summarizeReasoning
} from '../agents/decisionParser.js';

describe('parseDecision', () => {
  it('parses thought, action and detail lines', () => {
    const raw = 'THOUGHT: The Empire is weak\nACTION: DeclareWar\nDETAIL: Empire';
    const decision = parseDecision('Lord_Aldric_Vlandia', raw);

    expect(decision.agentId).toBe('Lord_Aldric_Vlandia');
    expect(decision.reasoning).toBe(raw);
    expect(decision.thought).toBe('The Empire is weak');
    expect(decision.actions).toEqual([{ type: 'DeclareWar', parameters: { detail: 'Empire' } }]);
  });

  it('accepts lower-case keys and the Turkish aliases', () => {
    expect(parseDecision('a', 'action: Trade').actions[0].type).toBe('Trade');

    const decision = parseDecision('a', 'DUSUNCE: Kis geliyor\nAKSIYON: Trade\nDETAY: Pravend');
    expect(decision.thought).toBe('Kis geliyor');
    expect(decision.actions).toEqual([{ type: 'Trade', parameters: { detail: 'Pravend' } }]);
  });

  it('keeps only the first word before a comma or space', () => {
    expect(parseDecision('a', 'ACTION: Attack, the Empire').actions[0].type).toBe('Attack');
    expect(parseDecision('a', 'ACTION: Move Army').actions[0].type).toBe('Move');
    expect(normalizeActionType('  Recruit   troops ')).toBe('Recruit');
  });

  it('falls back to a 60 second Wait without a usable action', () => {
    const wait = [{ type: 'Wait', parameters: { duration: 60 } }];
    expect(parseDecision('a', '').actions).toEqual(wait);
    expect(parseDecision('a', 'I am not sure what to do.').actions).toEqual(wait);
    expect(parseDecision('a', 'ACTION:').actions).toEqual(wait);
    expect(parseDecision('a', 'ACTION: wait\nDETAIL: until dawn').actions).toEqual(wait);
  });

  it('lets the first line of each field win', () => {
    const decision = parseDecision('a', 'ACTION: Trade\nACTION: Attack\nDETAIL: grain\nDETAIL: iron');
    expect(decision.actions).toEqual([{ type: 'Trade', parameters: { detail: 'grain' } }]);
  });

  it('tolerates indentation and spaces before the colon', () => {
    const fields = scanDecisionFields('   THOUGHT  : spaced out\r\n\tACTION: Patrol');
    expect(fields).toEqual({ thought: 'spaced out', action: 'Patrol' });
  });

  it('returns frozen decisions', () => {
    const decision = parseDecision('a', 'ACTION: Trade');
    expect(Object.isFrozen(decision)).toBe(true);
    expect(Object.isFrozen(decision.actions[0].parameters)).toBe(true);
  });
});

describe('summarizeReasoning', () => {
  it('prefers the thought line', () => {
    expect(summarizeReasoning('THOUGHT: Hold the bridge\nACTION: Defend')).toBe('Hold the bridge');
  });

  it('flattens and truncates free text', () => {
    expect(summarizeReasoning('line one\n  line two')).toBe('line one line two');
    expect(summarizeReasoning('a'.repeat(150))).toBe(`${'a'.repeat(97)}...`);
  });
});
