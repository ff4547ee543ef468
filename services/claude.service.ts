/**
 * Claude (Anthropic) AI Servisi
 * Messages API üzerinden tur üretimi
 */

import logger from '@/lib/logger';
import { ModelError } from '@/lib/errors';
import { createTimeoutSignal } from '@/lib/utils';
import { SYSTEM_PROMPT } from '@/lib/constants';
import { retryClaude } from './retry.service';
import type { CompletionOptions, ModelClient } from './llm-router.service';

const CLAUDE_API_URL = 'https://api.anthropic.com/v1/messages';

// Claude API types
interface ClaudeResponse {
  id: string;
  type: 'message';
  role: 'assistant';
  content: Array<{
    type: 'text';
    text: string;
  }>;
  model: string;
  stop_reason: string;
  usage: {
    input_tokens: number;
    output_tokens: number;
  };
}

export interface ClaudeClientOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

export class ClaudeModelClient implements ModelClient {
  readonly provider = 'claude' as const;
  readonly model: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(options: ClaudeClientOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? 120000;

    logger.info('Claude istemcisi başlatıldı', { model: this.model });
  }

  complete(prompt: string, options: CompletionOptions): Promise<string> {
    return retryClaude(() => this.createMessage(prompt, options), 'turn', options.signal);
  }

  private async createMessage(prompt: string, options: CompletionOptions): Promise<string> {
    const timeout = createTimeoutSignal(this.timeoutMs, options.signal);

    try {
      logger.debug('Claude completion başlatılıyor', {
        model: this.model,
        temperature: options.temperature,
        promptLength: prompt.length
      });

      const response = await fetch(CLAUDE_API_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.apiKey,
          'anthropic-version': '2023-06-01'
        },
        body: JSON.stringify({
          model: this.model,
          max_tokens: options.maxTokens ?? 500,
          system: SYSTEM_PROMPT,
          messages: [{ role: 'user', content: prompt }],
          temperature: options.temperature
        }),
        signal: timeout.signal
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => '');
        logger.error('Claude API hatası', {
          status: response.status,
          error: errorText.substring(0, 500)
        });

        throw new ModelError(
          `Claude API hatası (status: ${response.status}): ${errorText.substring(0, 200)}`,
          'claude'
        );
      }

      const data = await response.json() as ClaudeResponse;
      const content = data.content[0]?.text;

      if (!content) {
        throw new ModelError('Claude yanıtı boş', 'claude');
      }

      logger.debug('Claude completion tamamlandı', {
        model: this.model,
        inputTokens: data.usage.input_tokens,
        outputTokens: data.usage.output_tokens,
        stopReason: data.stop_reason
      });

      return content;

    } catch (error) {
      // AbortError'u daha anlamlı hata mesajına çevir
      if (timeout.timedOut()) {
        throw new ModelError(
          `Claude API isteği zaman aşımına uğradı (${this.timeoutMs / 1000} saniye)`,
          'claude'
        );
      }

      throw error;
    } finally {
      timeout.cleanup();
    }
  }
}
