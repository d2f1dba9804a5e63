import { createLogger, NAMESPACES } from '../logging.js';
import { AgentMemory } from './AgentMemory.js';
import { parseDecision, summarizeReasoning, WAIT_ACTION } from './decisionParser.js';
import { OrchestrationContext } from './context/orchestrationContext.js';
import { InFlightRegistry } from '../jobs/inFlightRegistry.js';
import { linkSignals, raceAbort } from '../utils/abort.js';
import type { ReasoningClient } from '../interfaces/ReasoningClientInterface.js';
import type { ActionExecutor, WorldSensor } from '../interfaces/WorldInterface.js';
import type { Perception } from '../types/Perception.js';
import {
  ActionResult,
  ActionResults,
  AgentAction,
  AgentDecision,
  createAction,
  FailureStage,
  toError,
  Trigger,
  WorkflowError,
  WorkflowFailure,
  WorkflowResult
} from '../types/Decision.js';

const workflowLog = createLogger(NAMESPACES.engine.workflow);

export interface ExecuteOptions {
  signal?: AbortSignal;
  trigger?: Trigger;
}

/** What the drivers need from a workflow; lets tests hand them a fake. */
export interface WorkflowRunner {
  execute(agentId: string, options?: ExecuteOptions): Promise<WorkflowResult>;
}

export interface AgentWorkflowDeps {
  sensor: WorldSensor;
  reasoner: ReasoningClient;
  executor: ActionExecutor;
  memory: AgentMemory;
  inFlight: InFlightRegistry;
  context: OrchestrationContext;
  /** Defaults to the THOUGHT/ACTION/DETAIL line parser. */
  parser?: DecisionParserFn;
}

export type DecisionParserFn = (agentId: string, rawText: string) => AgentDecision;

/**
 * One perceive -> reason -> act cycle per call. Every failure comes back as a
 * `failure` result; execute never rejects.
 */
export class AgentWorkflow implements WorkflowRunner {
  private readonly sensor: WorldSensor;
  private readonly reasoner: ReasoningClient;
  private readonly executor: ActionExecutor;
  private readonly memory: AgentMemory;
  private readonly inFlight: InFlightRegistry;
  private readonly context: OrchestrationContext;
  private readonly parse: DecisionParserFn;

  constructor(deps: AgentWorkflowDeps) {
    this.sensor = deps.sensor;
    this.reasoner = deps.reasoner;
    this.executor = deps.executor;
    this.memory = deps.memory;
    this.inFlight = deps.inFlight;
    this.context = deps.context;
    this.parse = deps.parser ?? parseDecision;
  }

  async execute(agentId: string, options: ExecuteOptions = {}): Promise<WorkflowResult> {
    if (!this.inFlight.acquire(agentId)) {
      return this.fail('busy', agentId, `Agent ${agentId} already has a cycle in flight`);
    }
    try {
      return await this.runCycle(agentId, options.trigger ?? { source: 'manual' }, options.signal);
    } finally {
      this.inFlight.release(agentId);
    }
  }

  private async runCycle(agentId: string, trigger: Trigger, signal?: AbortSignal): Promise<WorkflowResult> {
    workflowLog('cycle start agent=%s source=%s', agentId, trigger.source);

    let perception: Perception;
    try {
      signal?.throwIfAborted();
      perception = await raceAbort(this.sensor.perceive(agentId, signal), signal);
    } catch (e) {
      return this.fail('sense', agentId, `Perception failed for ${agentId}: ${toError(e).message}`, e);
    }

    const memoryContext = this.memory.getContext(agentId);
    const linked = linkSignals(signal, this.context.settings.reasoningTimeoutMs);
    let decision: AgentDecision;
    try {
      const raw = await raceAbort(
        this.reasoner.reason({ agentId, perception, memoryContext, trigger }, linked.signal),
        linked.signal
      );
      decision = this.parse(agentId, raw);
    } catch (e) {
      return this.fail('reason', agentId, `Reasoning failed for ${agentId}: ${toError(e).message}`, e);
    } finally {
      linked.dispose();
    }

    if (!this.context.isWorldReady()) {
      return this.fail('stale', agentId, `World not ready; discarding decision for ${agentId}`);
    }
    if (signal?.aborted) {
      return this.fail('stale', agentId, `Cycle for ${agentId} cancelled before acting`, signal.reason);
    }

    const actions = decision.actions.map(action => withAgentId(action, agentId));
    decision = Object.freeze({ ...decision, actions: Object.freeze(actions) });

    const actionResults: ActionResult[] = [];
    for (const action of actions) {
      actionResults.push(await this.apply(agentId, action, signal));
    }

    this.memory.remember(
      agentId,
      perception.location,
      summarizeReasoning(decision.reasoning),
      actions[0]?.type ?? WAIT_ACTION
    );

    return { kind: 'success', agentId, perception, decision, actionResults };
  }

  private async apply(agentId: string, action: AgentAction, signal?: AbortSignal): Promise<ActionResult> {
    let result: ActionResult;
    try {
      result = this.executor.canExecute(action.type)
        ? await this.executor.execute(action, signal)
        : ActionResults.failed(`Unknown action: ${action.type}`);
    } catch (e) {
      const error = toError(e);
      result = ActionResults.failed(`Error executing ${action.type}: ${error.message}`, error);
    }
    if (this.context.logging.actions) {
      workflowLog('action agent=%s type=%s ok=%s %s', agentId, action.type, result.succeeded, result.message);
    }
    return result;
  }

  private fail(stage: FailureStage, agentId: string, message: string, cause?: unknown): WorkflowFailure {
    const error = new WorkflowError(stage, agentId, message, cause);
    workflowLog('cycle failed agent=%s stage=%s: %s', agentId, stage, message);
    return { kind: 'failure', agentId, stage, error };
  }
}

/** Executors receive the acting agent even when the backend did not name it. */
export function withAgentId(action: AgentAction, agentId: string): AgentAction {
  if (action.parameters.agentId !== undefined) return action;
  return createAction(action.type, { ...action.parameters, agentId });
}
