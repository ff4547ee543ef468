/**
 * Tur Üretici
 * Model istemcisini bir kez çağırır ve yanıtı ayrıştırır.
 * Taşıma hataları da sonuç olarak döner, exception fırlatılmaz.
 */

import logger from '@/lib/logger';
import { errorMessage } from '@/lib/errors';
import type { ModelClient } from './llm-router.service';
import { parseModelTurn, type TurnParseResult } from './turn-parser.service';

export type TurnGenerationResult =
  | TurnParseResult
  | { kind: 'generation_failed'; detail: string };

export class LLMTurnGenerator {
  constructor(private readonly client: ModelClient) {}

  async generate(prompt: string, temperature: number, signal?: AbortSignal): Promise<TurnGenerationResult> {
    let raw: string;

    try {
      raw = await this.client.complete(prompt, { temperature, signal });
    } catch (error) {
      logger.warn('Model çağrısı başarısız', {
        provider: this.client.provider,
        model: this.client.model,
        error: errorMessage(error)
      });
      return { kind: 'generation_failed', detail: errorMessage(error) };
    }

    const result = parseModelTurn(raw);

    if (result.kind !== 'ok') {
      logger.debug('Model yanıtı ayrıştırılamadı', {
        kind: result.kind,
        detail: result.detail,
        response: raw.substring(0, 300)
      });
    }

    return result;
  }
}
