import * as nunjucks from 'nunjucks';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import type { Language } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import type { ReasoningRequest } from '../interfaces/ReasoningClientInterface.js';
import { describeRelation, formatWeather, RelationStance } from '../types/Perception.js';
import { archetypeOf } from '../world/archetypes.js';
import { DEFAULT_ACTION_TYPES } from '../world/actionVocabulary.js';
import type { ChatMessage } from './types.js';
import { countContextEntries, keepRecentDecisions } from '../agents/AgentMemory.js';
import { countMessageTokens, countTokens } from '../utils/tokenCounter.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const promptLog = createLogger(NAMESPACES.llm.client);

export const PROMPTS_DIR = path.join(__dirname, '..', 'prompts');
export const RAW_TEMPLATES_DIR = path.join(__dirname, '..', 'llm_templates');

const STANCE_TR: Record<RelationStance, string> = {
  Allied: 'Muttefik',
  Neutral: 'Notr',
  Tense: 'Gergin',
  Hostile: 'Dusman'
};

export interface PromptBuilderOptions {
  language?: Language;
  /** Action names offered in the format hint. */
  actionVocabulary?: readonly string[];
  promptsDir?: string;
  rawTemplatesDir?: string;
}

/** "2024-05-01 13:45" in UTC. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

export class PromptBuilder {
  private readonly env: nunjucks.Environment;
  private readonly rawEnv: nunjucks.Environment;
  private readonly language: Language;
  private readonly actionVocabulary: readonly string[];

  constructor(options: PromptBuilderOptions = {}) {
    this.language = options.language ?? 'en';
    this.actionVocabulary = options.actionVocabulary ?? DEFAULT_ACTION_TYPES;
    this.env = new nunjucks.Environment(new nunjucks.FileSystemLoader(options.promptsDir ?? PROMPTS_DIR), { autoescape: false });
    this.rawEnv = new nunjucks.Environment(new nunjucks.FileSystemLoader(options.rawTemplatesDir ?? RAW_TEMPLATES_DIR), { autoescape: false });
  }

  buildSystemPrompt(agentId: string): string {
    return this.env.render('system.njk', { language: this.language, archetype: archetypeOf(agentId) }).trim();
  }

  buildUserPrompt(request: ReasoningRequest): string {
    const { agentId, perception, memoryContext, trigger } = request;
    const relations = Object.entries(perception.relations).map(([name, score]) => {
      const stance = describeRelation(score);
      return { name, score, stance, stanceTr: STANCE_TR[stance] };
    });
    return this.env.render('decision.njk', {
      language: this.language,
      agentId,
      location: perception.location,
      time: formatTimestamp(perception.timestamp),
      weather: formatWeather(perception.weather),
      economy: perception.economy,
      relations,
      memoryContext,
      event: trigger.source === 'event' ? { kind: trigger.eventKind, description: trigger.description } : null,
      actionVocabulary: this.actionVocabulary.join('/')
    }).trim();
  }

  /** With `maxContextTokens`, the oldest remembered decisions are dropped until the prompt fits. */
  buildMessages(request: ReasoningRequest, maxContextTokens = 0): ChatMessage[] {
    const render = (req: ReasoningRequest): ChatMessage[] => [
      { role: 'system', content: this.buildSystemPrompt(req.agentId) },
      { role: 'user', content: this.buildUserPrompt(req) }
    ];
    return this.fitMemory(request, maxContextTokens, render, countMessageTokens);
  }

  /** Flattens the chat into one prompt for raw completion endpoints (chatml, alpaca, llama3). */
  renderRaw(templateName: string, request: ReasoningRequest, maxContextTokens = 0): string {
    const render = (req: ReasoningRequest): string => this.rawEnv.render(`${templateName}.njk`, {
      system_prompt: this.buildSystemPrompt(req.agentId),
      user_message: this.buildUserPrompt(req),
      assistant_message: ''
    });
    return this.fitMemory(request, maxContextTokens, render, countTokens);
  }

  private fitMemory<T>(
    request: ReasoningRequest,
    maxContextTokens: number,
    render: (request: ReasoningRequest) => T,
    measure: (prompt: T) => number
  ): T {
    let prompt = render(request);
    if (!maxContextTokens) return prompt;

    let keep = countContextEntries(request.memoryContext);
    while (keep > 0 && measure(prompt) > maxContextTokens) {
      keep--;
      prompt = render({ ...request, memoryContext: keepRecentDecisions(request.memoryContext, keep) });
    }
    if (measure(prompt) > maxContextTokens) {
      promptLog('prompt for %s exceeds %d tokens even without memory', request.agentId, maxContextTokens);
    }
    return prompt;
  }
}
