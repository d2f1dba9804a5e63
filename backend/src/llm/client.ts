import OpenAI from 'openai';
import { LLMProfile } from '../configManager.js';
import { raceAbort } from '../utils/abort.js';
import { sleep as defaultSleep } from '../agents/context/orchestrationContext.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { toError } from '../types/Decision.js';
import type { ChatMessage } from './types.js';

const llmLog = createLogger(NAMESPACES.llm.client);

// Retry configuration
export const MAX_RETRIES = 3;
const INITIAL_BACKOFF_MS = 1000;
const BACKOFF_MULTIPLIER = 2;

// Network, rate limit and temporary server errors
const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504];
const RETRYABLE_NETWORK_CODES = ['ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', 'ECONNRESET'];

function readField(error: unknown, key: 'code' | 'status' | 'name'): unknown {
  if (typeof error !== 'object' || error === null || !(key in error)) return undefined;
  return Reflect.get(error, key);
}

export function isAbortError(error: unknown): boolean {
  const name = readField(error, 'name');
  return name === 'AbortError' || name === 'APIUserAbortError' || name === 'TimeoutError';
}

export function isRetryableError(error: unknown): boolean {
  if (!error || isAbortError(error)) return false;

  const code = readField(error, 'code');
  if (typeof code === 'string' && RETRYABLE_NETWORK_CODES.includes(code)) {
    return true;
  }

  const status = readField(error, 'status');
  return typeof status === 'number' && RETRYABLE_STATUS_CODES.includes(status);
}

export function calculateBackoff(retryCount: number): number {
  return INITIAL_BACKOFF_MS * Math.pow(BACKOFF_MULTIPLIER, retryCount);
}

function cleanPromptBackslashes(text: string): string {
  return text.replace(/\\\\\\/g, '\\');
}

export interface ChatCompletionOptions {
  fallbackProfiles?: LLMProfile[];
  signal?: AbortSignal;
  /** Backoff wait; tests pass a no-op. */
  sleep?: (ms: number) => Promise<void>;
}

export class LLMRequestError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LLMRequestError';
  }
}

/**
 * OpenAI-compatible chat completion. Retryable failures are retried with
 * exponential backoff on each profile before moving to the next fallback.
 * An abort is never retried.
 */
export async function chatCompletion(
  profile: LLMProfile,
  messages: ChatMessage[],
  options: ChatCompletionOptions = {}
): Promise<string> {
  const { signal } = options;
  const sleep = options.sleep ?? defaultSleep;
  const profilesToTry: LLMProfile[] = [profile, ...(options.fallbackProfiles || [])];
  let lastError: unknown = null;

  for (let profileIndex = 0; profileIndex < profilesToTry.length; profileIndex++) {
    const currentProfile = profilesToTry[profileIndex];

    for (let retryCount = 0; retryCount < MAX_RETRIES; retryCount++) {
      signal?.throwIfAborted();
      try {
        llmLog('Attempt %d/%d on profile %s', retryCount + 1, MAX_RETRIES, currentProfile.baseURL);
        const result = await attemptChatCompletion(currentProfile, messages, signal);
        if (retryCount > 0) {
          llmLog('Retry succeeded on attempt %d', retryCount + 1);
        }
        return result;
      } catch (error) {
        lastError = error;
        if (signal?.aborted || isAbortError(error)) throw error;

        if (!isRetryableError(error)) {
          llmLog('Non-retryable error: %s', toError(error).message);
          break;
        }

        if (retryCount < MAX_RETRIES - 1) {
          const backoffMs = calculateBackoff(retryCount);
          llmLog('Retryable error, waiting %dms before retry: %s', backoffMs, toError(error).message);
          await raceAbort(sleep(backoffMs), signal);
        } else {
          llmLog('Max retries (%d) reached on this profile', MAX_RETRIES);
        }
      }
    }

    if (profileIndex < profilesToTry.length - 1) {
      llmLog('Profile %s failed, trying fallback profile', currentProfile.baseURL);
    }
  }

  const message = `All LLM profiles failed. Last error: ${lastError ? toError(lastError).message : 'Unknown error'}`;
  llmLog(message);
  throw new LLMRequestError(message, lastError);
}

async function attemptChatCompletion(profile: LLMProfile, messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
  const client = new OpenAI({
    apiKey: profile.apiKey || 'dummy',
    baseURL: profile.baseURL,
    maxRetries: 0,
    ...(profile.timeoutMs ? { timeout: profile.timeoutMs } : {})
  });

  const model = profile.model || 'gpt-3.5-turbo';
  const cleanedMessages = messages.map(msg => ({
    ...msg,
    content: cleanPromptBackslashes(msg.content)
  }));

  const sampler = profile.sampler;
  try {
    llmLog('Making call to %s at %s', model, profile.baseURL);
    const response = await client.chat.completions.create(
      {
        model,
        messages: cleanedMessages,
        temperature: sampler?.temperature,
        top_p: sampler?.topP,
        max_completion_tokens: sampler?.max_completion_tokens,
        frequency_penalty: sampler?.frequencyPenalty,
        presence_penalty: sampler?.presencePenalty,
        stop: sampler?.stop
      },
      { signal }
    );
    return response.choices[0]?.message?.content || '';
  } catch (error) {
    llmLog('API call failed: profile=%s model=%s status=%o code=%o error=%s',
      profile.baseURL, model, readField(error, 'status'), readField(error, 'code'), toError(error).message);
    throw error;
  }
}
