import Anthropic from '@anthropic-ai/sdk';
import type { BaseLogger } from 'pino';
import type { NarrativeOverlay } from '../../application/aggregator.js';
import { buildNarrativePrompt } from '../../application/narrative-prompt.js';

const MAX_TOKENS = 500;

export interface AnthropicNarrativeOptions {
  apiKey: string | null;
  model: string;
  /** Per-request timeout handed to the SDK. */
  timeoutMs: number;
  maxRetries: number;
  log: BaseLogger;
}

/**
 * Narrative overlay backed by the Anthropic Messages API.
 *
 * Returns `null` (overlay disabled) when no API key is configured. API
 * errors and timeouts propagate; the aggregator logs them and freezes
 * without narrative.
 */
export function createAnthropicNarrative(options: AnthropicNarrativeOptions): NarrativeOverlay | null {
  if (options.apiKey === null) {
    options.log.info('ANTHROPIC_API_KEY not set, report narratives disabled');
    return null;
  }

  const client = new Anthropic({
    apiKey: options.apiKey,
    timeout: options.timeoutMs,
    maxRetries: options.maxRetries,
  });

  return async (input) => {
    const message = await client.messages.create({
      model: options.model,
      max_tokens: MAX_TOKENS,
      messages: [{ role: 'user', content: buildNarrativePrompt(input) }],
    });

    const first = message.content[0];
    const text = first?.type === 'text' ? first.text.trim() : '';

    options.log.debug(
      { model: options.model, input_tokens: message.usage.input_tokens, output_tokens: message.usage.output_tokens },
      'Narrative generated',
    );

    return text === '' ? null : text;
  };
}
