/**
 * Coqui TTS Servisi
 * Kendi sunucumuzda (tunnel üzerinden) çalışan XTTS; temel (baseline) sağlayıcı
 */

import { z } from 'zod';
import logger from '@/lib/logger';
import { CoquiError } from '@/lib/errors';
import { createTimeoutSignal } from '@/lib/utils';
import type { TTSProvider } from './tts-router.service';

export interface CoquiHealthResponse {
  ok: boolean;
  gpu: boolean;
  modelLoaded: boolean;
  version?: string;
}

const HealthSchema = z.object({
  gpu: z.boolean().optional(),
  modelLoaded: z.boolean().optional(),
  version: z.string().optional()
});

export interface CoquiProviderOptions {
  tunnelUrl?: string;
  language?: string;
  speed?: number;
  timeoutMs?: number;
}

/**
 * Tunnel URL'ini normalize et
 */
export function normalizeUrl(tunnelUrl: string): string {
  let url = tunnelUrl.trim();

  // Protokol yoksa ekle
  if (!url.startsWith('http://') && !url.startsWith('https://')) {
    url = `https://${url}`;
  }

  // Sondaki slash'ı kaldır
  return url.replace(/\/$/, '');
}

/**
 * Coqui TTS sunucusu bağlantı testi
 */
export async function testCoquiConnection(tunnelUrl: string): Promise<CoquiHealthResponse> {
  const url = normalizeUrl(tunnelUrl);
  const timeout = createTimeoutSignal(10000); // 10 saniye timeout

  logger.info('Coqui TTS bağlantı testi başlatılıyor', { tunnelUrl: url });

  try {
    const response = await fetch(`${url}/api/health`, {
      method: 'GET',
      signal: timeout.signal,
      headers: {
        'Accept': 'application/json'
      }
    });

    if (!response.ok) {
      logger.error('Coqui TTS bağlantı hatası', { status: response.status });
      return { ok: false, gpu: false, modelLoaded: false };
    }

    const data = HealthSchema.parse(await response.json());

    logger.info('Coqui TTS bağlantı testi başarılı', {
      gpu: data.gpu,
      modelLoaded: data.modelLoaded
    });

    return {
      ok: true,
      gpu: data.gpu || false,
      modelLoaded: data.modelLoaded || false,
      version: data.version
    };

  } catch (error) {
    if (timeout.timedOut()) {
      logger.error('Coqui TTS bağlantı zaman aşımı', { tunnelUrl: url });
    } else {
      logger.error('Coqui TTS bağlantı hatası', {
        error: error instanceof Error ? error.message : 'Bilinmeyen hata',
        tunnelUrl: url
      });
    }

    return { ok: false, gpu: false, modelLoaded: false };
  } finally {
    timeout.cleanup();
  }
}

export class CoquiTTSProvider implements TTSProvider {
  readonly name = 'coqui' as const;
  readonly quality = 'basic' as const;
  private readonly url?: string;
  private readonly language: string;
  private readonly speed: number;
  private readonly timeoutMs: number;

  constructor(options: CoquiProviderOptions) {
    this.url = options.tunnelUrl ? normalizeUrl(options.tunnelUrl) : undefined;
    this.language = options.language ?? 'tr';
    this.speed = options.speed ?? 1.0;
    this.timeoutMs = options.timeoutMs ?? 120000;
  }

  isConfigured(): boolean {
    return Boolean(this.url);
  }

  /**
   * Tek metin için WAV üret
   */
  async synthesize(text: string, voiceId: string, signal?: AbortSignal): Promise<Buffer> {
    if (!this.url) {
      throw new CoquiError('Coqui tunnel URL tanımlanmamış (COQUI_TUNNEL_URL)');
    }

    const timeout = createTimeoutSignal(this.timeoutMs, signal);

    try {
      const response = await fetch(`${this.url}/api/tts`, {
        method: 'POST',
        signal: timeout.signal,
        headers: {
          'Content-Type': 'application/json',
          'Accept': 'audio/wav'
        },
        body: JSON.stringify({
          text,
          language: this.language,
          voice_id: voiceId,
          speed: this.speed
        })
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => '');
        throw new CoquiError(`Coqui TTS hatası (status: ${response.status}): ${errorText.substring(0, 200)}`);
      }

      const arrayBuffer = await response.arrayBuffer();
      return Buffer.from(arrayBuffer);

    } catch (error) {
      if (timeout.timedOut()) {
        throw new CoquiError(`Coqui TTS isteği zaman aşımına uğradı (${this.timeoutMs / 1000}s)`);
      }
      throw error;
    } finally {
      timeout.cleanup();
    }
  }
}
