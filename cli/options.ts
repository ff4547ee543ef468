import { InvalidArgumentError } from 'commander';
import { ConfigurationError } from '@/lib/errors';
import { loadGeneratorConfig, type ConfigOverrides, type GeneratorConfig } from '@/lib/config';
import { loadCatalog, type Catalog } from '@/lib/catalog';
import type { RunSummary } from '@/jobs/generate-corpus';

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Tam sayı olmalı.');
  }
  return parsed;
}

/**
 * "billing_dispute=0.5,technical_support=0.5" → { billing_dispute: 0.5, ... }
 */
export function parseWeights(value: string): Record<string, number> {
  const weights: Record<string, number> = {};

  for (const pair of value.split(',')) {
    const [label, raw] = pair.split('=').map(part => part.trim());
    const weight = Number(raw);
    if (!label || raw === undefined || Number.isNaN(weight)) {
      throw new InvalidArgumentError(`Geçersiz ağırlık: "${pair}" (senaryo=ağırlık bekleniyor)`);
    }
    weights[label] = weight;
  }

  return weights;
}

export interface GenerateCliOptions {
  count?: number;
  minTurns?: number;
  maxTurns?: number;
  provider?: string;
  model?: string;
  textOnly?: boolean;
  concurrency?: number;
  output?: string;
  strictAudio?: boolean;
  maxAttempts?: number;
  delay?: number;
  weights?: Record<string, number>;
  minChars?: number;
  maxChars?: number;
}

export function toConfigOverrides(options: GenerateCliOptions): ConfigOverrides {
  return {
    numConversations: options.count,
    minTurns: options.minTurns,
    maxTurns: options.maxTurns,
    minTranscriptLength: options.minChars,
    maxTranscriptLength: options.maxChars,
    maxAttempts: options.maxAttempts,
    turnDelayMs: options.delay,
    concurrency: options.concurrency,
    scenarioWeights: options.weights,
    enableAudio: options.textOnly ? false : undefined,
    allowBaselineFallback: options.strictAudio ? false : undefined,
    outputDir: options.output,
    provider: options.provider,
    model: options.model
  };
}

/**
 * Yapılandırma hatasını okunur şekilde yazdır
 */
export function reportConfigurationError(error: ConfigurationError): void {
  console.error(`❌ ${error.message}:`);
  for (const problem of error.problems) {
    console.error(`   • ${problem}`);
  }
}

/**
 * Yapılandırmayı yükle; hata varsa yazdırıp null döndür (çıkış kodu 1)
 */
export function loadConfigOrReport(overrides: ConfigOverrides): { config: GeneratorConfig; catalog: Catalog } | null {
  try {
    const catalog = loadCatalog();
    return { config: loadGeneratorConfig(process.env, overrides, catalog), catalog };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      reportConfigurationError(error);
      process.exitCode = 1;
      return null;
    }
    throw error;
  }
}

/**
 * Tamamlanan çalıştırma 0 ile çıkar; atlanan konuşmalar yalnızca özette
 * görünür. Ctrl+C ile kesilen çalıştırma 130 (SIGINT) döner.
 */
export function exitCodeFor(summary: Pick<RunSummary, 'cancelled'>): number {
  return summary.cancelled > 0 ? 130 : 0;
}
