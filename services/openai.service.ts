/**
 * OpenAI Servisi
 * Chat Completions API üzerinden tur üretimi
 */

import OpenAI from 'openai';
import logger from '@/lib/logger';
import { ModelError } from '@/lib/errors';
import { createTimeoutSignal } from '@/lib/utils';
import { SYSTEM_PROMPT } from '@/lib/constants';
import { retryOpenAI } from './retry.service';
import type { CompletionOptions, ModelClient } from './llm-router.service';

export interface OpenAIClientOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

export class OpenAIModelClient implements ModelClient {
  readonly provider = 'openai' as const;
  readonly model: string;
  private readonly client: OpenAI;
  private readonly timeoutMs: number;

  constructor(options: OpenAIClientOptions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? 120000; // 2 dakika varsayılan
    this.client = new OpenAI({
      apiKey: options.apiKey,
      maxRetries: 0 // Retry'ı manuel olarak yönetiyoruz
    });

    logger.info('OpenAI istemcisi başlatıldı', { model: this.model });
  }

  complete(prompt: string, options: CompletionOptions): Promise<string> {
    return retryOpenAI(() => this.createChatCompletion(prompt, options), 'turn', options.signal);
  }

  private async createChatCompletion(prompt: string, options: CompletionOptions): Promise<string> {
    const timeout = createTimeoutSignal(this.timeoutMs, options.signal);

    try {
      logger.debug('Chat completion başlatılıyor', {
        model: this.model,
        temperature: options.temperature,
        promptLength: prompt.length
      });

      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt }
        ],
        temperature: options.temperature,
        max_tokens: options.maxTokens ?? 500,
        response_format: { type: 'json_object' }
      }, {
        signal: timeout.signal
      });

      const content = response.choices[0]?.message?.content;

      if (!content) {
        throw new ModelError('OpenAI yanıtı boş', 'openai');
      }

      logger.debug('Chat completion tamamlandı', {
        model: this.model,
        promptTokens: response.usage?.prompt_tokens,
        completionTokens: response.usage?.completion_tokens
      });

      return content;

    } catch (error) {
      if (timeout.timedOut()) {
        logger.error('OpenAI timeout', { model: this.model, timeout: this.timeoutMs });
        throw new ModelError(`OpenAI isteği zaman aşımına uğradı (${this.timeoutMs / 1000}s)`, 'openai');
      }

      if (error instanceof OpenAI.APIError) {
        logger.error('OpenAI API hatası', {
          status: error.status,
          message: error.message,
          code: error.code
        });

        throw new ModelError(
          `OpenAI API hatası (status: ${error.status ?? 'yok'}, code: ${error.code ?? 'yok'}): ${error.message}`,
          'openai'
        );
      }

      throw error;
    } finally {
      timeout.cleanup();
    }
  }
}
