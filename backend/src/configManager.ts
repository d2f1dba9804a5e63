import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { Ajv, type ErrorObject } from 'ajv';
import { createLogger, NAMESPACES } from './logging.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const configLog = createLogger(NAMESPACES.config);

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';
export const OPENAI_BASE_URL = 'https://api.openai.com/v1';

export interface SamplerSettings {
  temperature?: number;
  topP?: number;
  max_completion_tokens?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  stop?: string[];
  maxContextTokens?: number; // Prompt token budget; older remembered decisions are dropped to fit
}

export interface DebugSettings {
  enabledNamespaces?: string;
}

export type ProfileType = 'openai' | 'custom' | 'mock';

export interface LLMProfile {
  type: ProfileType; // 'openai' uses the OpenAI SDK, 'custom' posts raw prompts with axios, 'mock' never leaves the process
  apiKey?: string;
  baseURL?: string;
  model?: string;
  template?: string; // raw prompt layout for 'custom' profiles
  timeoutMs?: number;
  sampler?: SamplerSettings;
  fallbackProfiles?: string[]; // Profile names to try if this one fails
}

export interface OrchestrationConfig {
  enableWorldAI?: boolean;
  eventCooldownMinutes?: number;
  schedulerCooldownMinutes?: number;
  tickIntervalSeconds?: number;
  agentsPerTick?: number;
  memoryCapacity?: number;
  queueDelayMs?: number;
  dispatchDelayMs?: number;
  reasoningTimeoutMs?: number;
  prioritizeImportant?: boolean;
}

export interface LoggingConfig {
  thoughts?: boolean;
  actions?: boolean;
  events?: boolean;
}

export type Language = 'en' | 'tr';

export interface Config {
  defaultProfile: string;
  profiles: Record<string, LLMProfile>;
  language?: Language;
  orchestration?: OrchestrationConfig;
  logging?: LoggingConfig;
  debug?: DebugSettings;
  server?: { port?: number };
}

/** Engine tunables with every default resolved and durations in milliseconds. */
export interface OrchestrationSettings {
  enableWorldAI: boolean;
  eventCooldownMs: number;
  schedulerCooldownMs: number;
  tickIntervalSeconds: number;
  agentsPerTick: number;
  memoryCapacity: number;
  queueDelayMs: number;
  dispatchDelayMs: number;
  reasoningTimeoutMs: number;
  prioritizeImportant: boolean;
}

export interface LogToggles {
  thoughts: boolean;
  actions: boolean;
  events: boolean;
}

export const DEFAULT_EVENT_COOLDOWN_MINUTES = 15;
const MINUTE_MS = 60_000;

export function resolveOrchestrationSettings(cfg: OrchestrationConfig = {}): OrchestrationSettings {
  const eventCooldownMinutes = cfg.eventCooldownMinutes ?? DEFAULT_EVENT_COOLDOWN_MINUTES;
  // Proactive thinking is rarer than event reactions unless configured otherwise.
  const schedulerCooldownMinutes = cfg.schedulerCooldownMinutes ?? Math.max(5, eventCooldownMinutes * 2);
  return {
    enableWorldAI: cfg.enableWorldAI ?? true,
    eventCooldownMs: eventCooldownMinutes * MINUTE_MS,
    schedulerCooldownMs: schedulerCooldownMinutes * MINUTE_MS,
    tickIntervalSeconds: cfg.tickIntervalSeconds ?? 60,
    agentsPerTick: cfg.agentsPerTick ?? 2,
    memoryCapacity: cfg.memoryCapacity ?? 5,
    queueDelayMs: cfg.queueDelayMs ?? 1000,
    dispatchDelayMs: cfg.dispatchDelayMs ?? 2000,
    reasoningTimeoutMs: cfg.reasoningTimeoutMs ?? 60_000,
    prioritizeImportant: cfg.prioritizeImportant ?? true
  };
}

export function resolveLogToggles(cfg: LoggingConfig = {}): LogToggles {
  return {
    thoughts: cfg.thoughts ?? true,
    actions: cfg.actions ?? true,
    events: cfg.events ?? true
  };
}

export class ConfigError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'ConfigError';
    this.details = details;
  }
}

const SCHEMA_PATH = path.join(__dirname, '..', 'config', 'configSchema.json');
const ajv = new Ajv({ allErrors: true, strict: false });
const validateConfigShape = ajv.compile<Config>(JSON.parse(fs.readFileSync(SCHEMA_PATH, 'utf-8')));

export function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors || []).map(err => `${err.instancePath || '(root)'} ${err.message || ''}`.trim());
}

/**
 * Builds a config from environment variables when no config file exists.
 * GROQ_API_KEY wins over OPENAI_API_KEY; with neither, the mock provider is used.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Config {
  const model = env.WORLDMIND_MODEL;
  if (env.GROQ_API_KEY) {
    return {
      defaultProfile: 'groq',
      profiles: {
        groq: { type: 'openai', apiKey: env.GROQ_API_KEY, baseURL: GROQ_BASE_URL, model: model || 'llama-3.1-8b-instant', sampler: { temperature: 0.7, max_completion_tokens: 600 }, fallbackProfiles: ['mock'] },
        mock: { type: 'mock' }
      }
    };
  }
  if (env.OPENAI_API_KEY) {
    return {
      defaultProfile: 'openai',
      profiles: {
        openai: { type: 'openai', apiKey: env.OPENAI_API_KEY, baseURL: OPENAI_BASE_URL, model: model || 'gpt-4o-mini', sampler: { temperature: 0.7, max_completion_tokens: 600 }, fallbackProfiles: ['mock'] },
        mock: { type: 'mock' }
      }
    };
  }
  return {
    defaultProfile: 'mock',
    profiles: { mock: { type: 'mock' } }
  };
}

export function validateConfig(candidate: unknown): Config {
  if (!validateConfigShape(candidate)) {
    throw new ConfigError('Invalid configuration', formatErrors(validateConfigShape.errors));
  }
  const config = candidate;
  if (!config.profiles[config.defaultProfile]) {
    throw new ConfigError(`Default profile ${config.defaultProfile} not found`);
  }
  for (const [name, profile] of Object.entries(config.profiles)) {
    for (const fallback of profile.fallbackProfiles || []) {
      if (!config.profiles[fallback]) {
        throw new ConfigError(`Profile ${name} names unknown fallback profile ${fallback}`);
      }
    }
  }
  return config;
}

export class ConfigManager {
  private config: Config;
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(configPath: string = path.join(__dirname, '..', '..', 'localConfig', 'config.json'), env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
    this.config = this.loadConfig(configPath);
  }

  private loadConfig(configPath: string): Config {
    if (!fs.existsSync(configPath)) {
      const fromEnv = configFromEnv(this.env);
      configLog('No config at %s; using %s profile from environment', configPath, fromEnv.defaultProfile);
      return fromEnv;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (e) {
      throw new ConfigError(`Failed to read ${configPath}`, [e instanceof Error ? e.message : String(e)]);
    }
    const config = validateConfig(parsed);
    configLog('Loaded %s (default profile %s)', configPath, config.defaultProfile);
    return config;
  }

  getProfile(name?: string): LLMProfile {
    const profileName = name || this.config.defaultProfile;
    const profile = this.config.profiles[profileName];
    if (!profile) {
      throw new Error(`Profile ${profileName} not found`);
    }
    return profile;
  }

  getDefaultProfile(): LLMProfile {
    return this.getProfile();
  }

  /** Resolves a profile's fallback names into profiles, skipping itself. */
  getFallbackProfiles(profile: LLMProfile): LLMProfile[] {
    return (profile.fallbackProfiles || [])
      .map(name => this.getProfile(name))
      .filter(candidate => candidate !== profile);
  }

  getConfig(): Config {
    return { ...this.config };
  }

  getLanguage(): Language {
    return this.config.language ?? 'en';
  }

  getOrchestrationSettings(): OrchestrationSettings {
    return resolveOrchestrationSettings(this.config.orchestration);
  }

  getLogToggles(): LogToggles {
    return resolveLogToggles(this.config.logging);
  }

  getServerPort(): number {
    return this.config.server?.port ?? Number(this.env.PORT ?? 3001);
  }

  reload(): void {
    this.config = this.loadConfig(this.configPath);
  }
}
