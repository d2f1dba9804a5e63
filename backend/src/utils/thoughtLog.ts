import { summarizeReasoning, WAIT_ACTION } from '../agents/decisionParser.js';
import { createLogger, NAMESPACES } from '../logging.js';
import type { FailureStage, TriggerSource, WorkflowResult } from '../types/Decision.js';

const thoughtsLog = createLogger(NAMESPACES.engine.thoughts);

export interface ThoughtRecord {
  agentId: string;
  source: TriggerSource;
  thought: string;
  action: string;
  succeeded: boolean;
  stage?: FailureStage;
  error?: string;
  timestamp: number;
}

export interface ThoughtLogOptions {
  maxSize?: number;
  now?: () => number;
  /** Echo each successful thought to the worldmind:thoughts namespace. */
  logThoughts?: boolean;
}

export class ThoughtLog {
  private buffer: ThoughtRecord[] = [];
  private readonly maxSize: number;
  private readonly now: () => number;
  private readonly logThoughts: boolean;

  constructor(options: ThoughtLogOptions = {}) {
    this.maxSize = options.maxSize ?? 200;
    this.now = options.now ?? Date.now;
    this.logThoughts = options.logThoughts ?? true;
  }

  record(record: ThoughtRecord): void {
    this.buffer.push(record);
    if (this.buffer.length > this.maxSize) {
      this.buffer.splice(0, this.buffer.length - this.maxSize);
    }
  }

  recordResult(result: WorkflowResult, source: TriggerSource): ThoughtRecord {
    const timestamp = this.now();
    let record: ThoughtRecord;
    if (result.kind === 'success') {
      const { decision } = result;
      record = {
        agentId: result.agentId,
        source,
        thought: decision.thought ?? summarizeReasoning(decision.reasoning),
        action: decision.actions[0]?.type ?? WAIT_ACTION,
        succeeded: true,
        timestamp
      };
      if (this.logThoughts) {
        thoughtsLog('[%s] %s: %s -> %s', source, record.agentId, record.thought, record.action);
      }
    } else {
      record = {
        agentId: result.agentId,
        source,
        thought: '',
        action: '',
        succeeded: false,
        stage: result.stage,
        error: result.error.message,
        timestamp
      };
    }
    this.record(record);
    return record;
  }

  latest(count: number = 10): ThoughtRecord[] {
    const start = Math.max(0, this.buffer.length - count);
    return this.buffer.slice(start);
  }

  forAgent(agentId: string, count: number = 10): ThoughtRecord[] {
    const matching = this.buffer.filter(record => record.agentId === agentId);
    return matching.slice(Math.max(0, matching.length - count));
  }

  get size(): number {
    return this.buffer.length;
  }

  clear(): void {
    this.buffer = [];
  }
}
