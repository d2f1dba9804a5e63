import axios from 'axios';
import { LLMProfile } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';

const customLog = createLogger(NAMESPACES.llm.custom);

export interface CustomClientOptions {
  timeout?: number;
  signal?: AbortSignal;
}

function field(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  return Reflect.get(value, key);
}

/**
 * Pulls the generated text out of the shapes common completion servers return:
 * `choices[0].text`, `choices[0].message.content` or `result`.
 */
export function extractCompletionText(data: unknown): string {
  const choices = field(data, 'choices');
  if (Array.isArray(choices) && choices.length > 0) {
    const choice: unknown = choices[0];
    const text = field(choice, 'text');
    if (typeof text === 'string' && text) return text;
    const content = field(field(choice, 'message'), 'content');
    return typeof content === 'string' ? content : '';
  }

  const result = field(data, 'result');
  if (typeof result === 'string') return result;

  customLog('Unexpected response format: %o', data);
  return '';
}

/**
 * Custom LLM client using axios for non-OpenAI compatible endpoints.
 * Sends raw rendered prompts directly to the LLM backend.
 */
export async function customLLMRequest(
  profile: LLMProfile,
  renderedPrompt: string,
  options: CustomClientOptions = {}
): Promise<string> {
  const { timeout = profile.timeoutMs ?? 120000, signal } = options;
  const sampler = profile.sampler;

  const requestBody = {
    prompt: renderedPrompt,
    model: profile.model,
    max_tokens: sampler?.max_completion_tokens || 512,
    temperature: sampler?.temperature ?? 0.7,
    top_p: sampler?.topP ?? 0.9,
    ...(sampler?.frequencyPenalty !== undefined ? { frequency_penalty: sampler.frequencyPenalty } : {}),
    ...(sampler?.presencePenalty !== undefined ? { presence_penalty: sampler.presencePenalty } : {}),
    ...(sampler?.stop && sampler.stop.length > 0 ? { stop: sampler.stop } : {}),
  };

  try {
    customLog('Posting to %s with model %s', profile.baseURL, profile.model);
    const response = await axios.post<unknown>(`${profile.baseURL}/completions`, requestBody, {
      timeout,
      signal,
      headers: {
        'Content-Type': 'application/json',
        ...(profile.apiKey ? { Authorization: `Bearer ${profile.apiKey}` } : {}),
      },
    });
    return extractCompletionText(response.data);
  } catch (error) {
    const apiMessage = field(field(field(field(error, 'response'), 'data'), 'error'), 'message');
    const errorMessage = typeof apiMessage === 'string'
      ? apiMessage
      : error instanceof Error ? error.message : 'Unknown error';
    customLog('Request failed: %s', errorMessage);
    throw error;
  }
}
