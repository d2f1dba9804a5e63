import { ActionParameter, AgentAction, AgentDecision, createAction } from '../types/Decision.js';

export type DecisionField = 'thought' | 'action' | 'detail';

/**
 * Line prefixes the reasoning backend is asked to use, keyed by upper-case prefix.
 * The Turkish aliases match the prompts rendered when `language` is `tr`.
 */
export const DECISION_GRAMMAR: Readonly<Record<string, DecisionField>> = {
  THOUGHT: 'thought',
  DUSUNCE: 'thought',
  ACTION: 'action',
  AKSIYON: 'action',
  DETAIL: 'detail',
  DETAY: 'detail'
};

export const WAIT_ACTION = 'Wait';
export const DEFAULT_WAIT_SECONDS = 60;

const LINE_PATTERN = /^([A-Za-z_]+)\s*:(.*)$/;

export type DecisionFields = Partial<Record<DecisionField, string>>;

/**
 * Maps recognised lines to fields. The first line for a field wins; later
 * duplicates are ignored rather than merged.
 */
export function scanDecisionFields(rawText: string): DecisionFields {
  const fields: DecisionFields = {};
  if (!rawText) return fields;

  for (const line of rawText.split(/\r?\n/)) {
    const match = LINE_PATTERN.exec(line.trim());
    if (!match) continue;
    const field = DECISION_GRAMMAR[match[1].toUpperCase()];
    if (!field || fields[field] !== undefined) continue;
    fields[field] = match[2].trim();
  }
  return fields;
}

/** "Attack, the Empire" -> "Attack"; "Move Army" -> "Move". */
export function normalizeActionType(value: string): string {
  const beforeComma = value.split(',')[0].trim();
  return beforeComma.split(/\s+/)[0] ?? '';
}

export function waitAction(): AgentAction {
  return createAction(WAIT_ACTION, { duration: DEFAULT_WAIT_SECONDS });
}

/**
 * Best-effort parse of backend output into a decision. Never throws: input
 * without a usable action line yields a single Wait.
 */
export function parseDecision(agentId: string, rawText: string): AgentDecision {
  const text = rawText ?? '';
  const fields = scanDecisionFields(text);
  const actionType = fields.action !== undefined ? normalizeActionType(fields.action) : '';

  let action: AgentAction;
  if (!actionType || actionType.toLowerCase() === WAIT_ACTION.toLowerCase()) {
    action = waitAction();
  } else {
    const parameters: Record<string, ActionParameter> = {};
    if (fields.detail) parameters.detail = fields.detail;
    action = createAction(actionType, parameters);
  }

  return Object.freeze({
    agentId,
    reasoning: text,
    ...(fields.thought ? { thought: fields.thought } : {}),
    actions: Object.freeze([action])
  });
}

/**
 * Short form of a decision for memory and the thought log: the THOUGHT line
 * when present, otherwise the flattened text.
 */
export function summarizeReasoning(rawText: string, limit: number = 100): string {
  const { thought } = scanDecisionFields(rawText);
  const text = thought || (rawText ?? '').replace(/\s+/g, ' ').trim();
  if (text.length <= limit) return text;
  return `${text.slice(0, limit - 3)}...`;
}
