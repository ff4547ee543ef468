/**
 * Google Cloud Text-to-Speech Servisi
 * REST API, LINEAR16 (WAV header'lı) çıktı
 */

import { z } from 'zod';
import logger from '@/lib/logger';
import { GoogleTTSError } from '@/lib/errors';
import { AUDIO_SETTINGS } from '@/lib/constants';
import { createTimeoutSignal } from '@/lib/utils';
import { retryGoogleTTS } from './retry.service';
import type { TTSProvider } from './tts-router.service';

const GOOGLE_TTS_URL = 'https://texttospeech.googleapis.com/v1/text:synthesize';

const SynthesizeResponseSchema = z.object({
  audioContent: z.string().min(1)
});

export interface GoogleTTSProviderOptions {
  apiKey?: string;
  timeoutMs?: number;
}

/**
 * Ses adından dil kodunu çıkar (tr-TR-Wavenet-A → tr-TR)
 */
export function languageCodeFromVoice(voiceName: string): string {
  const [language, region] = voiceName.split('-');
  return region ? `${language}-${region}` : 'tr-TR';
}

export class GoogleCloudTTSProvider implements TTSProvider {
  readonly name = 'google_cloud' as const;
  readonly quality = 'high' as const;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;

  constructor(options: GoogleTTSProviderOptions) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  synthesize(text: string, voiceName: string, signal?: AbortSignal): Promise<Buffer> {
    return retryGoogleTTS(
      () => this.request(text, voiceName, signal),
      `Ses üretimi: ${text.substring(0, 50)}...`,
      signal
    );
  }

  private async request(text: string, voiceName: string, signal?: AbortSignal): Promise<Buffer> {
    if (!this.apiKey) {
      throw new GoogleTTSError('Google Cloud TTS API Key tanımlanmamış (GOOGLE_CLOUD_TTS_API_KEY)');
    }

    const timeout = createTimeoutSignal(this.timeoutMs, signal);

    try {
      logger.debug('Google TTS ses üretimi başlatılıyor', { voiceName, textLength: text.length });

      const response = await fetch(`${GOOGLE_TTS_URL}?key=${encodeURIComponent(this.apiKey)}`, {
        method: 'POST',
        signal: timeout.signal,
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          input: { text },
          voice: {
            languageCode: languageCodeFromVoice(voiceName),
            name: voiceName
          },
          audioConfig: {
            audioEncoding: 'LINEAR16',
            sampleRateHertz: AUDIO_SETTINGS.SAMPLE_RATE,
            speakingRate: 1.0,
            pitch: 0.0,
            volumeGainDb: 0.0
          }
        })
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => '');
        throw new GoogleTTSError(`Google TTS hatası (status: ${response.status}): ${errorText.substring(0, 200)}`);
      }

      const parsed = SynthesizeResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new GoogleTTSError('Google TTS yanıtında audioContent yok');
      }

      return Buffer.from(parsed.data.audioContent, 'base64');

    } catch (error) {
      if (timeout.timedOut()) {
        throw new GoogleTTSError(`Google TTS isteği zaman aşımına uğradı (${this.timeoutMs / 1000}s)`);
      }
      throw error;
    } finally {
      timeout.cleanup();
    }
  }
}
