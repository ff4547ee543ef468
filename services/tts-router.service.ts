/**
 * TTS Router Servisi
 * Ses yapılandırmasına göre sağlayıcı zincirini sırayla dener:
 * birincil sağlayıcı → tanımlı yedekler → temel (baseline) sağlayıcı.
 */

import fs from 'fs/promises';
import path from 'path';
import logger from '@/lib/logger';
import { SynthesisError, errorMessage } from '@/lib/errors';
import { estimateDurationFromText, measureWavDuration, parseWavHeader } from '@/lib/audio';
import { AUDIO_SETTINGS } from '@/lib/constants';
import type { GeneratorConfig } from '@/lib/config';
import type {
  AudioResult,
  ProviderAttempt,
  ProviderVoice,
  TTSProviderName,
  TTSQuality,
  VoiceConfig,
  VoiceRegistry
} from '@/types/voice.types';
import { ElevenLabsTTSProvider } from './elevenlabs.service';
import { GoogleCloudTTSProvider } from './google-tts.service';
import { CoquiTTSProvider } from './coqui.service';

/**
 * Tek bir TTS sağlayıcısı. synthesize ses dosyasının baytlarını döndürür
 * (WAV beklenir; header yoksa süre tahmin edilir).
 */
export interface TTSProvider {
  readonly name: TTSProviderName;
  readonly quality: TTSQuality;
  isConfigured(): boolean;
  synthesize(text: string, voice: string, signal?: AbortSignal): Promise<Buffer>;
}

/**
 * Orkestratörün gördüğü arayüz
 */
export interface TTSClient {
  synthesize(text: string, speakerId: string, outputPath: string, signal?: AbortSignal): Promise<AudioResult>;
}

export interface TTSFallbackChainOptions {
  registry: VoiceRegistry;
  providers: TTSProvider[];
  allowBaselineFallback?: boolean;
}

export class TTSFallbackChain implements TTSClient {
  private readonly registry: VoiceRegistry;
  private readonly providers: Map<TTSProviderName, TTSProvider>;
  private readonly allowBaselineFallback: boolean;

  constructor(options: TTSFallbackChainOptions) {
    this.registry = options.registry;
    this.providers = new Map(options.providers.map(provider => [provider.name, provider]));
    this.allowBaselineFallback = options.allowBaselineFallback ?? true;
  }

  /**
   * Ses kimliğinin yapılandırması; bilinmiyorsa varsayılan ses
   */
  resolveVoice(speakerId: string): VoiceConfig {
    const voice = this.registry.voices[speakerId];
    if (voice) return voice;

    const role = speakerId.startsWith('user') ? 'user' : 'agent';
    const fallbackId = this.registry.defaults[role];

    logger.warn('Bilinmeyen ses kimliği, varsayılan kullanılıyor', { speakerId, fallbackId });

    const fallback = this.registry.voices[fallbackId];
    if (!fallback) {
      throw new SynthesisError(`Varsayılan ses bulunamadı: ${fallbackId}`, speakerId);
    }
    return fallback;
  }

  /**
   * Denenecek sağlayıcı sırası
   */
  chainFor(voice: VoiceConfig): ProviderVoice[] {
    const chain: ProviderVoice[] = [
      { provider: voice.provider, voice: voice.voice },
      ...voice.fallbacks
    ];

    if (this.allowBaselineFallback) {
      chain.push({
        provider: this.registry.baseline.provider,
        voice: this.registry.baseline.voices[voice.gender]
      });
    }

    return chain;
  }

  async synthesize(text: string, speakerId: string, outputPath: string, signal?: AbortSignal): Promise<AudioResult> {
    const voice = this.resolveVoice(speakerId);
    const attempts: ProviderAttempt[] = [];

    for (const candidate of this.chainFor(voice)) {
      const provider = this.providers.get(candidate.provider);

      if (!provider || !provider.isConfigured()) {
        attempts.push({ ...candidate, success: false, skipped: true });
        continue;
      }

      let audio: Buffer;
      try {
        audio = await provider.synthesize(text, candidate.voice, signal);
        if (audio.length === 0) {
          throw new Error('Boş ses verisi');
        }
      } catch (error) {
        // İptal: zinciri sürdürme
        if (signal?.aborted) throw error;

        attempts.push({ ...candidate, success: false, error: errorMessage(error) });
        logger.warn('TTS sağlayıcısı başarısız, sıradakine geçiliyor', {
          speakerId,
          provider: candidate.provider,
          error: errorMessage(error)
        });
        continue;
      }

      attempts.push({ ...candidate, success: true });
      const result = await this.persist(audio, text, outputPath, candidate.provider, attempts);

      if (attempts.length > 1) {
        logger.info('Ses yedek sağlayıcı ile üretildi', {
          speakerId,
          provider: candidate.provider,
          quality: provider.quality
        });
      }

      return result;
    }

    const summary = attempts
      .map(attempt => `${attempt.provider}: ${attempt.skipped ? 'yapılandırılmamış' : attempt.error ?? 'hata'}`)
      .join('; ');

    throw new SynthesisError(`Tüm TTS sağlayıcıları başarısız (${summary})`, speakerId);
  }

  private async persist(
    audio: Buffer,
    text: string,
    outputPath: string,
    provider: TTSProviderName,
    attempts: ProviderAttempt[]
  ): Promise<AudioResult> {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    try {
      await fs.writeFile(outputPath, audio);
    } catch (error) {
      // Yarım kalan dosya hiçbir denemenin listesinde yok; burada silinmeli
      await fs.rm(outputPath, { force: true });
      throw error;
    }

    const header = parseWavHeader(audio);
    const measured = header ? measureWavDuration(header) : 0;
    const durationEstimated = measured <= 0;

    return {
      provider,
      filePath: outputPath,
      durationSeconds: durationEstimated
        ? estimateDurationFromText(text, AUDIO_SETTINGS.SECONDS_PER_CHAR_ESTIMATE)
        : measured,
      durationEstimated,
      sampleRate: header?.sampleRate ?? AUDIO_SETTINGS.SAMPLE_RATE,
      channels: header?.numChannels ?? AUDIO_SETTINGS.CHANNELS,
      fileSize: audio.length,
      attempts
    };
  }
}

/**
 * Yapılandırmadan sağlayıcı zinciri oluştur
 */
export function createTTSClient(config: GeneratorConfig, registry: VoiceRegistry): TTSFallbackChain {
  const providers: TTSProvider[] = [
    new ElevenLabsTTSProvider({
      apiKey: config.tts.elevenLabsApiKey,
      modelId: config.tts.elevenLabsModel
    }),
    new GoogleCloudTTSProvider({ apiKey: config.tts.googleApiKey }),
    new CoquiTTSProvider({ tunnelUrl: config.tts.coquiUrl })
  ];

  logger.info('TTS sağlayıcıları hazırlandı', {
    configured: providers.filter(p => p.isConfigured()).map(p => p.name),
    allowBaselineFallback: config.allowBaselineFallback
  });

  return new TTSFallbackChain({
    registry,
    providers,
    allowBaselineFallback: config.allowBaselineFallback
  });
}
