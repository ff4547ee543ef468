/**
 * Utility fonksiyonlar
 */

/**
 * [0, 1) aralığında sayı üreten rastgele kaynak.
 * Testlerde deterministik kaynak verilebilir.
 */
export type Rng = () => number;

export const defaultRng: Rng = Math.random;

/**
 * Sleep fonksiyonu (sinyal iptal edilirse erken döner)
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };

    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Diziden rastgele eleman seç
 */
export function pickRandom<T>(items: readonly T[], rng: Rng = defaultRng): T {
  if (items.length === 0) {
    throw new Error('Boş diziden seçim yapılamaz');
  }
  const index = Math.min(items.length - 1, Math.floor(rng() * items.length));
  return items[index];
}

/**
 * Diziden tekrarsız n eleman seç
 */
export function sampleRandom<T>(items: readonly T[], count: number, rng: Rng = defaultRng): T[] {
  return shuffle(items, rng).slice(0, Math.min(count, items.length));
}

/**
 * Fisher-Yates karıştırma (yeni dizi döner)
 */
export function shuffle<T>(items: readonly T[], rng: Rng = defaultRng): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.min(i, Math.floor(rng() * (i + 1)));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * [min, max] aralığında tam sayı
 */
export function randomInt(min: number, max: number, rng: Rng = defaultRng): number {
  return min + Math.min(max - min, Math.floor(rng() * (max - min + 1)));
}

/**
 * Format duration (seconds to MM:SS)
 */
export function formatDuration(seconds: number): string {
  const mins = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);
  return `${mins}:${secs.toString().padStart(2, '0')}`;
}

/**
 * Convert stream to buffer
 */
export async function streamToBuffer(stream: ReadableStream<Uint8Array>): Promise<Buffer> {
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    chunks.push(value);
  }

  return Buffer.concat(chunks);
}

/**
 * Sayıyı baştan sıfırla doldur (0007 gibi)
 */
export function zeroPad(value: number, width: number): string {
  return value.toString().padStart(width, '0');
}

/**
 * Zaman aşımı ve dış iptal sinyalini tek AbortController'da birleştir.
 * İş bitince cleanup() çağrılmalı.
 */
export function createTimeoutSignal(timeoutMs: number, external?: AbortSignal): {
  signal: AbortSignal;
  timedOut: () => boolean;
  cleanup: () => void;
} {
  const controller = new AbortController();
  let expired = false;

  const timeoutId = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);

  const onAbort = () => controller.abort();
  if (external?.aborted) {
    controller.abort();
  } else {
    external?.addEventListener('abort', onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    cleanup: () => {
      clearTimeout(timeoutId);
      external?.removeEventListener('abort', onAbort);
    }
  };
}

/**
 * Görevleri sırayla çalıştıran kuyruk (dosya yazımlarını serileştirmek için).
 * Bir görevin hatası sonrakileri engellemez, çağırana iletilir.
 */
export function createSerialQueue(): <T>(task: () => Promise<T>) => Promise<T> {
  let tail: Promise<unknown> = Promise.resolve();

  return <T>(task: () => Promise<T>): Promise<T> => {
    const run = tail.then(task, task);
    tail = run.catch(() => undefined);
    return run;
  };
}
