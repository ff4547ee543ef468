/**
 * ElevenLabs Servisi
 * Text-to-Speech ses üretimi (pcm_16000 → WAV)
 */

import { ElevenLabsClient, ElevenLabsError as ElevenLabsApiError } from '@elevenlabs/elevenlabs-js';
import logger from '@/lib/logger';
import { ElevenLabsError } from '@/lib/errors';
import { pcmToWav } from '@/lib/audio';
import { AUDIO_SETTINGS } from '@/lib/constants';
import { streamToBuffer } from '@/lib/utils';
import { retryElevenLabs } from './retry.service';
import type { TTSProvider } from './tts-router.service';

export interface ElevenLabsProviderOptions {
  apiKey?: string;
  modelId?: string;
}

// Türkçe için çok dilli model
const DEFAULT_MODEL_ID = 'eleven_multilingual_v2';

const VOICE_SETTINGS = {
  stability: 0.5,
  similarityBoost: 0.75,
  style: 0.0,
  useSpeakerBoost: true
};

export class ElevenLabsTTSProvider implements TTSProvider {
  readonly name = 'elevenlabs' as const;
  readonly quality = 'very_high' as const;
  private readonly apiKey?: string;
  private readonly modelId: string;
  private client: ElevenLabsClient | null = null;

  constructor(options: ElevenLabsProviderOptions) {
    this.apiKey = options.apiKey;
    this.modelId = options.modelId ?? DEFAULT_MODEL_ID;
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  private getClient(): ElevenLabsClient {
    if (!this.apiKey) {
      throw new ElevenLabsError('ElevenLabs API Key tanımlanmamış (ELEVENLABS_API_KEY)');
    }

    if (!this.client) {
      this.client = new ElevenLabsClient({ apiKey: this.apiKey, maxRetries: 0 });
      logger.info('ElevenLabs istemcisi başlatıldı', { modelId: this.modelId });
    }

    return this.client;
  }

  async synthesize(text: string, voiceId: string, signal?: AbortSignal): Promise<Buffer> {
    const client = this.getClient();

    logger.debug('ElevenLabs ses üretimi başlatılıyor', {
      voiceId,
      textLength: text.length
    });

    const pcm = await retryElevenLabs(
      async () => {
        try {
          const audioStream = await client.textToSpeech.convert(voiceId, {
            text,
            modelId: this.modelId,
            outputFormat: 'pcm_16000',
            voiceSettings: VOICE_SETTINGS
          }, {
            abortSignal: signal
          });

          // Stream'i Buffer'a çevir
          return await streamToBuffer(audioStream);
        } catch (error) {
          if (error instanceof ElevenLabsApiError && error.statusCode !== undefined) {
            throw new ElevenLabsError(`ElevenLabs API hatası (status: ${error.statusCode}): ${error.message}`);
          }
          throw error;
        }
      },
      `Ses üretimi: ${text.substring(0, 50)}...`,
      signal
    );

    if (pcm.length === 0) {
      throw new ElevenLabsError('ElevenLabs boş ses döndürdü');
    }

    return pcmToWav(pcm, AUDIO_SETTINGS.SAMPLE_RATE, AUDIO_SETTINGS.CHANNELS, AUDIO_SETTINGS.BIT_DEPTH);
  }
}
