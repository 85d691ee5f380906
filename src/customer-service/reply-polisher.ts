import { Logger } from '@nestjs/common';
import type OpenAI from 'openai';

export const REPLY_POLISHER = Symbol('REPLY_POLISHER');

export interface PolishRequest {
  customerMessage: string;
  draft: string;
}

export type PolishResult =
  | { source: 'enriched'; text: string }
  | { source: 'fallback'; text: string; reason: string };

/** Rewrites a draft reply. Implementations never throw: failures fall back to the draft. */
export interface ReplyPolisher {
  polish(request: PolishRequest): Promise<PolishResult>;
}

export interface OpenAiReplyPolisherOptions {
  model: string;
  timeoutMs: number;
  maxTokens?: number;
  temperature?: number;
}

export const TONE_SYSTEM_PROMPT =
  'You are a friendly customer service agent. ' +
  'Rewrite the draft reply with empathy and professionalism. ' +
  'Keep it concise (2-3 sentences).';

export class OpenAiReplyPolisher implements ReplyPolisher {
  private readonly logger = new Logger(OpenAiReplyPolisher.name);

  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAiReplyPolisherOptions,
  ) {}

  async polish(request: PolishRequest): Promise<PolishResult> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.options.model,
          messages: [
            { role: 'system', content: TONE_SYSTEM_PROMPT },
            {
              role: 'user',
              content: `Customer: ${request.customerMessage}\n\nDraft reply: ${request.draft}`,
            },
          ],
          max_tokens: this.options.maxTokens ?? 150,
          temperature: this.options.temperature ?? 0.7,
        },
        { timeout: this.options.timeoutMs, maxRetries: 0 },
      );

      const text = response.choices[0]?.message.content?.trim();
      if (!text) {
        return this.fallback(request, 'empty completion');
      }
      return { source: 'enriched', text };
    } catch (error) {
      return this.fallback(
        request,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  private fallback(request: PolishRequest, reason: string): PolishResult {
    this.logger.warn(`Tone adjustment failed: ${reason}, using draft`);
    return { source: 'fallback', text: request.draft, reason };
  }
}

/** Used when no language model is configured. */
export class PassthroughReplyPolisher implements ReplyPolisher {
  async polish(request: PolishRequest): Promise<PolishResult> {
    return {
      source: 'fallback',
      text: request.draft,
      reason: 'no language model configured',
    };
  }
}
