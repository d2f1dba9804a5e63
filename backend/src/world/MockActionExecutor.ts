import { createLogger, NAMESPACES } from '../logging.js';
import type { ActionExecutor } from '../interfaces/WorldInterface.js';
import { ActionParameter, ActionResult, ActionResults, AgentAction } from '../types/Decision.js';
import { DEFAULT_WAIT_SECONDS } from '../agents/decisionParser.js';
import { DelegatingActionExecutor } from './DelegatingActionExecutor.js';

const executorLog = createLogger(NAMESPACES.world.executor);

export interface ExecutedAction {
  agentId: string;
  type: string;
  detail?: string;
  message: string;
}

export interface MockActionExecutorOptions {
  /** Accept unregistered types and log them as unknown (the default), instead of refusing them. */
  acceptUnknown?: boolean;
}

function param(action: AgentAction, key: string): ActionParameter | undefined {
  return action.parameters[key];
}

/**
 * Stand-in for a live world: every action in the default vocabulary succeeds
 * with a descriptive message and is kept in `history` for inspection.
 */
export class MockActionExecutor implements ActionExecutor {
  private readonly delegate = new DelegatingActionExecutor();
  private readonly acceptUnknown: boolean;
  readonly history: ExecutedAction[] = [];

  constructor(options: MockActionExecutorOptions = {}) {
    this.acceptUnknown = options.acceptUnknown ?? true;
    this.registerDefaults();
  }

  get actionCount(): number {
    return this.history.length;
  }

  canExecute(actionType: string): boolean {
    return this.acceptUnknown || this.delegate.canExecute(actionType);
  }

  async execute(action: AgentAction, signal?: AbortSignal): Promise<ActionResult> {
    signal?.throwIfAborted();
    let result: ActionResult;
    if (this.delegate.canExecute(action.type)) {
      result = await this.delegate.execute(action, signal);
    } else {
      result = ActionResults.ok(`Unknown action '${action.type}' logged`);
    }
    const detail = param(action, 'detail');
    this.history.push({
      agentId: String(param(action, 'agentId') ?? ''),
      type: action.type,
      ...(detail !== undefined ? { detail: String(detail) } : {}),
      message: result.message
    });
    executorLog('%s %s -> %s', param(action, 'agentId') ?? '?', action.type, result.message);
    return result;
  }

  private registerDefaults(): void {
    const d = this.delegate;
    d.register('Wait', action => ActionResults.ok(`Agent waiting for ${param(action, 'duration') ?? DEFAULT_WAIT_SECONDS} seconds`));
    d.register('LogReasoning', () => ActionResults.ok('Reasoning logged'));
    d.register('StartSiege', action => ActionResults.ok(`Siege started on ${param(action, 'settlementId') ?? 'an unknown castle'}`));
    d.register('GiveGold', action => ActionResults.ok(`Transferred ${param(action, 'amount') ?? '?'} gold`));
    d.register('ChangeRelation', () => ActionResults.ok('Relation changed'));
    d.register('MoveArmy', action => ActionResults.ok(`Army moving to ${param(action, 'targetLocation') ?? 'an unknown location'}`));
    d.register('RecruitTroops', action => ActionResults.ok(`Recruited ${param(action, 'troopCount') ?? '?'} troops`));
    d.register('Trade', () => ActionResults.ok('Trade completed'));
    d.register('Patrol', () => ActionResults.ok('Patrol completed'));
    d.register('Retreat', () => ActionResults.ok('Retreated successfully'));
    d.register('Attack', () => ActionResults.ok('Attack initiated'));
    d.register('Defend', () => ActionResults.ok('Defense position taken'));
    d.register('Hide', () => ActionResults.ok('Hidden successfully'));
    d.register('Work', () => ActionResults.ok('Work completed'));
  }
}
