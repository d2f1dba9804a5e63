import type { Perception } from './Perception.js';

export type ActionParameter = string | number | boolean;

export interface AgentAction {
  readonly type: string;
  readonly parameters: Readonly<Record<string, ActionParameter>>;
}

export interface AgentDecision {
  readonly agentId: string;
  /** Raw text returned by the reasoning backend. */
  readonly reasoning: string;
  /** The THOUGHT line, when the backend produced one. */
  readonly thought?: string;
  /** Never empty; a decision without a usable action carries a Wait. */
  readonly actions: readonly AgentAction[];
}

export interface ActionResult {
  succeeded: boolean;
  message: string;
  error?: Error;
}

export const ActionResults = {
  ok(message: string): ActionResult {
    return { succeeded: true, message };
  },
  failed(message: string, error?: Error): ActionResult {
    return error ? { succeeded: false, message, error } : { succeeded: false, message };
  }
};

export function createAction(type: string, parameters: Record<string, ActionParameter> = {}): AgentAction {
  return Object.freeze({ type, parameters: Object.freeze({ ...parameters }) });
}

export type FailureStage = 'sense' | 'reason' | 'stale' | 'busy';

export class WorkflowError extends Error {
  readonly stage: FailureStage;
  readonly agentId: string;

  constructor(stage: FailureStage, agentId: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'WorkflowError';
    this.stage = stage;
    this.agentId = agentId;
  }
}

export interface WorkflowSuccess {
  kind: 'success';
  agentId: string;
  perception: Perception;
  decision: AgentDecision;
  actionResults: ActionResult[];
}

export interface WorkflowFailure {
  kind: 'failure';
  agentId: string;
  stage: FailureStage;
  error: WorkflowError;
}

export type WorkflowResult = WorkflowSuccess | WorkflowFailure;

export type TriggerSource = 'event' | 'proactive' | 'manual';

export type Trigger =
  | { source: 'event'; eventKind: string; description: string }
  | { source: 'proactive' }
  | { source: 'manual' };

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : String(value));
}
