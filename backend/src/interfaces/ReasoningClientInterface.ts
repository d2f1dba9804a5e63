/**
 * ReasoningClientInterface - provider-agnostic boundary to the text-generation backend.
 * Implementations own the wire protocol, prompt text and any retry policy.
 */

import type { Perception } from '../types/Perception.js';
import type { Trigger } from '../types/Decision.js';

export interface ReasoningRequest {
  agentId: string;
  perception: Perception;
  /** Rendered by AgentMemory.getContext for the same agent. */
  memoryContext: string;
  trigger: Trigger;
}

export interface ReasoningClient {
  /** Short label for logs, e.g. the provider and model. */
  readonly name: string;

  /**
   * Returns the raw decision text. May reject on network errors, timeouts or
   * when the signal aborts.
   */
  reason(request: ReasoningRequest, signal?: AbortSignal): Promise<string>;
}
