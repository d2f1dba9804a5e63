import { createLogger, NAMESPACES } from '../logging.js';

const memoryLog = createLogger(NAMESPACES.engine.memory);

export const EMPTY_MEMORY_CONTEXT = 'No previous decisions - this is your first decision.';
export const OMITTED_MEMORY_CONTEXT = 'Earlier decisions omitted to fit the context window.';

const CONTEXT_ENTRY = /^  \d+\. (.*)$/;

const DEFAULT_CAPACITY = 5;
const DECISION_PREVIEW_CHARS = 80;

export interface MemoryEntry {
  timestamp: number; // epoch ms
  situation: string;
  decision: string;
  action: string;
}

export interface AgentMemoryOptions {
  capacity?: number;
  now?: () => number;
}

/**
 * Bounded per-agent history of past decisions, fed back into the next reasoning
 * call so an agent stays consistent. Oldest entries are evicted first.
 * Process-lifetime only.
 */
export class AgentMemory {
  private readonly histories = new Map<string, MemoryEntry[]>();
  private readonly capacity: number;
  private readonly now: () => number;

  constructor(options: AgentMemoryOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Memory capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.now = options.now ?? Date.now;
  }

  get maxEntriesPerAgent(): number {
    return this.capacity;
  }

  remember(agentId: string, situation: string, decision: string, action: string): void {
    let history = this.histories.get(agentId);
    if (!history) {
      history = [];
      this.histories.set(agentId, history);
    }

    history.push({ timestamp: this.now(), situation, decision, action });

    while (history.length > this.capacity) {
      history.shift();
    }
    memoryLog('remember agent=%s action=%s size=%d', agentId, action, history.length);
  }

  getContext(agentId: string): string {
    const history = this.histories.get(agentId);
    if (!history || history.length === 0) {
      return EMPTY_MEMORY_CONTEXT;
    }

    const now = this.now();
    const lines = [`Your last ${history.length} decisions:`];
    history.forEach((entry, i) => {
      lines.push(`  ${i + 1}. [${formatAge(now - entry.timestamp)}] ${entry.action}: ${truncate(entry.decision, DECISION_PREVIEW_CHARS)}`);
    });
    return lines.join('\n');
  }

  /** Value copies, oldest first. */
  entries(agentId: string): MemoryEntry[] {
    return (this.histories.get(agentId) ?? []).map(entry => ({ ...entry }));
  }

  forget(agentId: string): void {
    this.histories.delete(agentId);
  }

  forgetAll(): void {
    this.histories.clear();
  }

  get totalEntries(): number {
    let total = 0;
    for (const history of this.histories.values()) {
      total += history.length;
    }
    return total;
  }
}

export function formatAge(elapsedMs: number): string {
  const minutes = elapsedMs / 60000;
  if (minutes < 1) return 'just now';
  return `${Math.round(minutes)} minutes ago`;
}

export function truncate(text: string, maxLength: number): string {
  if (!text || text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 3)}...`;
}

function contextEntries(context: string): string[] {
  const [header, ...rest] = context.split('\n');
  if (!header?.startsWith('Your last ')) return [];
  const entries: string[] = [];
  for (const line of rest) {
    const match = CONTEXT_ENTRY.exec(line);
    if (match) entries.push(match[1]);
  }
  return entries;
}

/** Number of decision lines in a rendered context. */
export function countContextEntries(context: string): number {
  return contextEntries(context).length;
}

/** Re-renders a context with only its `keep` most recent decisions, renumbered from 1. */
export function keepRecentDecisions(context: string, keep: number): string {
  const entries = contextEntries(context);
  if (keep >= entries.length) return context;
  if (keep <= 0) return OMITTED_MEMORY_CONTEXT;
  const kept = entries.slice(entries.length - keep);
  return [`Your last ${kept.length} decisions:`, ...kept.map((entry, i) => `  ${i + 1}. ${entry}`)].join('\n');
}
