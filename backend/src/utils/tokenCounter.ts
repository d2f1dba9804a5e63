import { encode } from 'gpt-tokenizer';
import { createLogger, NAMESPACES } from '../logging.js';
import type { ChatMessage } from '../llm/types.js';

const tokenLog = createLogger(NAMESPACES.llm.client);

/**
 * Count tokens with the GPT tokenizer.
 * Falls back to character-based estimation if tokenization fails
 */
export function countTokens(text: string): number {
  if (!text) return 0;

  try {
    return encode(text).length;
  } catch (error) {
    tokenLog('Tokenization failed, using fallback estimation: %s', error instanceof Error ? error.message : String(error));
    // ~4 characters per token
    return Math.max(1, Math.round(text.length / 4));
  }
}

export function countMessageTokens(messages: ChatMessage[]): number {
  return messages.reduce((total, message) => total + countTokens(message.content), 0);
}
