/**
 * Retry Servisi
 * Dış API çağrıları (LLM, TTS) için üstel geri çekilme ile yeniden deneme.
 * Yalnızca taşıma seviyesindeki hatalar için; model çıktısı hataları
 * konuşma seviyesinde yeniden denenir.
 */

import logger from '@/lib/logger';
import { MaxRetriesExceededError, errorMessage } from '@/lib/errors';
import { defaultRng, sleep, type Rng } from '@/lib/utils';

export interface RetryOptions {
  maxRetries: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  backoffMultiplier: number;
  onRetry?: (attempt: number, error: Error) => void | Promise<void>;
  shouldRetry?: (error: Error) => boolean;
  signal?: AbortSignal;
  // Testlerde beklemeyi ve jitter'ı değiştirmek için
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
  rng?: Rng;
}

type BackoffSettings = Pick<RetryOptions, 'initialBackoffMs' | 'maxBackoffMs' | 'backoffMultiplier'>;

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialBackoffMs: 1000,
  maxBackoffMs: 30000,
  backoffMultiplier: 2
};

/**
 * attempt numaralı başarısız denemeden sonra beklenecek süre (ms).
 * Taban süre üstel büyür, üst sınırla kesilir, ±%25 jitter eklenir.
 */
export function backoffDelay(attempt: number, settings: BackoffSettings, rng: Rng = defaultRng): number {
  const base = Math.min(
    settings.initialBackoffMs * Math.pow(settings.backoffMultiplier, attempt - 1),
    settings.maxBackoffMs
  );
  const jitter = base * 0.25 * (rng() * 2 - 1);
  return Math.max(0, Math.round(base + jitter));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_OPTIONS, ...options };
  const wait = opts.wait ?? sleep;

  for (let attempt = 1; ; attempt++) {
    let error: Error;

    try {
      return await fn();
    } catch (caught) {
      error = toError(caught);
    }

    // İptal edilen çağrı tekrar denenmez
    if (opts.signal?.aborted || isAbortError(error)) {
      throw error;
    }

    if (opts.shouldRetry && !opts.shouldRetry(error)) {
      logger.debug('Hata yeniden denenmeyecek', { attempt, error: error.message });
      throw error;
    }

    if (attempt >= opts.maxRetries) {
      logger.error('Maksimum deneme sayısına ulaşıldı', {
        maxRetries: opts.maxRetries,
        error: error.message
      });
      throw new MaxRetriesExceededError(
        `${opts.maxRetries} denemeden sonra başarısız: ${error.message}`,
        error
      );
    }

    await opts.onRetry?.(attempt, error);

    const delayMs = backoffDelay(attempt, opts, opts.rng);
    logger.debug('Yeniden denemeden önce bekleniyor', { attempt, delayMs });

    await wait(delayMs, opts.signal);

    if (opts.signal?.aborted) {
      throw error;
    }
  }
}

export function isAbortError(error: Error): boolean {
  return error.name === 'AbortError';
}

/**
 * Rate limit hatalarını kontrol eder
 */
export function isRateLimitError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes('rate limit') ||
    message.includes('too many requests') ||
    message.includes('429')
  );
}

const NETWORK_MARKERS = [
  'network',
  'timeout',
  'zaman aşımı',
  'econnrefused',
  'econnreset',
  'enotfound',
  'fetch failed'
];

/**
 * Ağ hatalarını kontrol eder
 */
export function isNetworkError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return NETWORK_MARKERS.some(marker => message.includes(marker));
}

/**
 * Yeniden denenebilir hata: rate limit, ağ hatası, 5xx veya 429
 */
export function isRetryableError(error: Error): boolean {
  if (isRateLimitError(error) || isNetworkError(error)) {
    return true;
  }

  const statusMatch = error.message.match(/status:?\s*(\d{3})/i);
  if (!statusMatch) return false;

  const status = Number(statusMatch[1]);
  return status >= 500 || status === 429;
}

/**
 * Sağlayıcıya özel retry fonksiyonu üret
 */
function providerRetry(name: string, base: BackoffSettings & { maxRetries: number }) {
  return <T>(fn: () => Promise<T>, context?: string, signal?: AbortSignal): Promise<T> =>
    retryWithBackoff(fn, {
      ...base,
      signal,
      shouldRetry: isRetryableError,
      onRetry: (attempt, error) => {
        logger.warn(`${name} çağrısı yeniden deneniyor`, {
          context,
          attempt,
          maxRetries: base.maxRetries,
          error: error.message
        });
      }
    });
}

export const retryOpenAI = providerRetry('OpenAI', {
  maxRetries: 5,
  initialBackoffMs: 2000,
  maxBackoffMs: 60000,
  backoffMultiplier: 2
});

export const retryClaude = providerRetry('Claude', {
  maxRetries: 5,
  initialBackoffMs: 2000,
  maxBackoffMs: 60000,
  backoffMultiplier: 2
});

export const retryElevenLabs = providerRetry('ElevenLabs', {
  maxRetries: 3,
  initialBackoffMs: 1000,
  maxBackoffMs: 10000,
  backoffMultiplier: 2
});

export const retryGoogleTTS = providerRetry('Google TTS', {
  maxRetries: 3,
  initialBackoffMs: 1000,
  maxBackoffMs: 10000,
  backoffMultiplier: 2
});
