import { createLogger, NAMESPACES } from '../logging.js';
import type { ActionExecutor } from '../interfaces/WorldInterface.js';
import { ActionResult, ActionResults, AgentAction, toError } from '../types/Decision.js';

const executorLog = createLogger(NAMESPACES.world.executor);

export type ActionHandler = (action: AgentAction, signal?: AbortSignal) => ActionResult | Promise<ActionResult>;

/**
 * Routes each action to the handler registered for its type. Types are
 * matched case-insensitively; a handler that throws yields a failed result.
 */
export class DelegatingActionExecutor implements ActionExecutor {
  private readonly handlers = new Map<string, ActionHandler>();

  register(actionType: string, handler: ActionHandler): this {
    const key = actionType.trim().toLowerCase();
    if (!key) {
      throw new Error('Action type cannot be empty');
    }
    this.handlers.set(key, handler);
    return this;
  }

  unregister(actionType: string): boolean {
    return this.handlers.delete(actionType.trim().toLowerCase());
  }

  registeredTypes(): string[] {
    return [...this.handlers.keys()];
  }

  canExecute(actionType: string): boolean {
    return this.handlers.has(actionType.toLowerCase());
  }

  async execute(action: AgentAction, signal?: AbortSignal): Promise<ActionResult> {
    const handler = this.handlers.get(action.type.toLowerCase());
    if (!handler) {
      return ActionResults.failed(`No handler registered for action type: ${action.type}`);
    }
    try {
      return await handler(action, signal);
    } catch (e) {
      const error = toError(e);
      executorLog('handler for %s threw: %s', action.type, error.message);
      return ActionResults.failed(`Error executing action ${action.type}: ${error.message}`, error);
    }
  }
}
