/**
 * LLM Router Servisi
 * OpenAI ve Claude arasında provider seçimi yapar
 */

import logger from '@/lib/logger';
import { ConfigurationError } from '@/lib/errors';
import type { GeneratorConfig, LLMProvider } from '@/lib/config';
import { OpenAIModelClient } from './openai.service';
import { ClaudeModelClient } from './claude.service';

export interface CompletionOptions {
  temperature: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * Tek bir prompt alıp ham metin yanıtı döndüren model istemcisi.
 * Taşıma seviyesindeki yeniden denemeler istemcinin içindedir.
 */
export interface ModelClient {
  readonly provider: LLMProvider;
  readonly model: string;
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

/**
 * Yapılandırmaya göre model istemcisi oluştur
 */
export function createModelClient(config: GeneratorConfig): ModelClient {
  const { provider, model, apiKey, timeoutMs } = config.llm;

  if (!apiKey) {
    throw new ConfigurationError(`${provider} API key tanımlanmamış`, [`llm.apiKey (${provider})`]);
  }

  logger.info('LLM istemcisi hazırlanıyor', { provider, model });

  return provider === 'claude'
    ? new ClaudeModelClient({ apiKey, model, timeoutMs })
    : new OpenAIModelClient({ apiKey, model, timeoutMs });
}
