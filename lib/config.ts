/**
 * Üretici Yapılandırması
 * Varsayılanlar + ortam değişkenleri + CLI seçenekleri, zod ile doğrulanır.
 * Yapılandırma hataları üretim başlamadan önce ölümcüldür.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';
import { loadCatalog, type Catalog } from './catalog';
import {
  DEFAULT_MODELS,
  GENERATION_DEFAULTS,
  OUTPUT_DEFAULTS,
  TEXT_ONLY_TRANSCRIPT_LIMITS
} from './constants';

export const LLM_PROVIDERS = ['openai', 'claude'] as const;
export type LLMProvider = typeof LLM_PROVIDERS[number];

const GeneratorConfigSchema = z.object({
  numConversations: z.number().int().positive(),
  minTurns: z.number().int(),
  maxTurns: z.number().int(),
  temperatureAgent: z.number().min(0).max(2),
  temperatureUser: z.number().min(0).max(2),
  minTranscriptLength: z.number().int().min(1),
  maxTranscriptLength: z.number().int().min(1),
  maxAttempts: z.number().int().min(1),
  turnDelayMs: z.number().int().min(0),
  historyWindow: z.number().int().min(0),
  concurrency: z.number().int().min(1).max(16),
  scenarioWeights: z.record(z.number().min(0).max(1)),
  enableAudio: z.boolean(),
  allowBaselineFallback: z.boolean(),
  outputDir: z.string().min(1),
  llm: z.object({
    provider: z.enum(LLM_PROVIDERS),
    model: z.string().min(1),
    apiKey: z.string().optional(),
    timeoutMs: z.number().int().positive()
  }),
  tts: z.object({
    elevenLabsApiKey: z.string().optional(),
    elevenLabsModel: z.string().min(1),
    googleApiKey: z.string().optional(),
    coquiUrl: z.string().min(1).optional()
  })
});

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;

/**
 * CLI'dan gelebilecek düz seçenekler
 */
export interface ConfigOverrides {
  numConversations?: number;
  minTurns?: number;
  maxTurns?: number;
  minTranscriptLength?: number;
  maxTranscriptLength?: number;
  maxAttempts?: number;
  turnDelayMs?: number;
  concurrency?: number;
  scenarioWeights?: Record<string, number>;
  enableAudio?: boolean;
  allowBaselineFallback?: boolean;
  outputDir?: string;
  provider?: string;
  model?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Yapılandırmayı oluştur ve doğrula.
 * Tüm sorunlar toplanır ve tek bir ConfigurationError ile bildirilir.
 */
export function loadGeneratorConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
  catalog: Catalog = loadCatalog()
): GeneratorConfig {
  const provider = overrides.provider ?? nonEmpty(env.LLM_PROVIDER) ?? 'openai';
  const enableAudio = overrides.enableAudio ?? true;

  // Metin modunda daha esnek uzunluk sınırları
  const transcriptLimits = enableAudio
    ? { MIN: GENERATION_DEFAULTS.MIN_TRANSCRIPT_LENGTH, MAX: GENERATION_DEFAULTS.MAX_TRANSCRIPT_LENGTH }
    : TEXT_ONLY_TRANSCRIPT_LIMITS;

  const candidate = {
    numConversations: overrides.numConversations ?? GENERATION_DEFAULTS.NUM_CONVERSATIONS,
    minTurns: overrides.minTurns ?? GENERATION_DEFAULTS.TURNS_MIN,
    maxTurns: overrides.maxTurns ?? GENERATION_DEFAULTS.TURNS_MAX,
    temperatureAgent: GENERATION_DEFAULTS.TEMPERATURE_AGENT,
    temperatureUser: GENERATION_DEFAULTS.TEMPERATURE_USER,
    minTranscriptLength: overrides.minTranscriptLength ?? transcriptLimits.MIN,
    maxTranscriptLength: overrides.maxTranscriptLength ?? transcriptLimits.MAX,
    maxAttempts: overrides.maxAttempts ?? GENERATION_DEFAULTS.MAX_ATTEMPTS,
    turnDelayMs: overrides.turnDelayMs ?? GENERATION_DEFAULTS.TURN_DELAY_MS,
    historyWindow: GENERATION_DEFAULTS.HISTORY_WINDOW,
    concurrency: overrides.concurrency ?? GENERATION_DEFAULTS.CONCURRENCY,
    scenarioWeights: overrides.scenarioWeights ?? catalog.scenarios.weights,
    enableAudio,
    allowBaselineFallback: overrides.allowBaselineFallback ?? true,
    outputDir: overrides.outputDir ?? OUTPUT_DEFAULTS.DIR,
    llm: {
      provider,
      model: overrides.model
        ?? nonEmpty(env.LLM_MODEL)
        ?? (provider === 'claude' ? DEFAULT_MODELS.claude : DEFAULT_MODELS.openai),
      apiKey: provider === 'claude' ? nonEmpty(env.CLAUDE_API_KEY) : nonEmpty(env.OPENAI_API_KEY),
      timeoutMs: 120000
    },
    tts: {
      elevenLabsApiKey: nonEmpty(env.ELEVENLABS_API_KEY),
      elevenLabsModel: nonEmpty(env.ELEVENLABS_MODEL) ?? 'eleven_multilingual_v2',
      googleApiKey: nonEmpty(env.GOOGLE_CLOUD_TTS_API_KEY),
      coquiUrl: nonEmpty(env.COQUI_TUNNEL_URL)
    }
  };

  const parsed = GeneratorConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Yapılandırma geçersiz',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const config = parsed.data;
  const problems = collectProblems(config, catalog);

  if (problems.length > 0) {
    throw new ConfigurationError('Yapılandırma geçersiz', problems);
  }

  return config;
}

function collectProblems(config: GeneratorConfig, catalog: Catalog): string[] {
  const problems: string[] = [];

  // Senaryo ağırlıkları
  const labels = Object.keys(config.scenarioWeights);
  if (labels.length === 0) {
    problems.push('scenarioWeights: en az bir senaryo gerekli');
  }
  const total = Object.values(config.scenarioWeights).reduce((sum, w) => sum + w, 0);
  if (Math.abs(total - 1.0) > 0.01) {
    problems.push(`scenarioWeights: ağırlık toplamı 1.0 olmalı (şu an ${total.toFixed(3)})`);
  }
  for (const label of labels) {
    if (!catalog.scenarios.scenarios[label]) {
      problems.push(`scenarioWeights: bilinmeyen senaryo "${label}"`);
    }
  }

  // Tur sayısı: karşılama + kapanış + teşekkür için en az 4, çift sayı mümkün olmalı
  if (config.minTurns < 4) {
    problems.push(`minTurns: en az 4 olmalı (şu an ${config.minTurns})`);
  }
  if (config.minTurns > config.maxTurns) {
    problems.push(`minTurns (${config.minTurns}) maxTurns'den (${config.maxTurns}) büyük olamaz`);
  } else if (config.minTurns === config.maxTurns && config.minTurns % 2 !== 0) {
    problems.push(`Tur aralığında çift sayı yok: [${config.minTurns}, ${config.maxTurns}]`);
  }

  if (config.minTranscriptLength >= config.maxTranscriptLength) {
    problems.push(
      `minTranscriptLength (${config.minTranscriptLength}) maxTranscriptLength'den (${config.maxTranscriptLength}) küçük olmalı`
    );
  }

  if (!config.llm.apiKey) {
    const envName = config.llm.provider === 'claude' ? 'CLAUDE_API_KEY' : 'OPENAI_API_KEY';
    problems.push(`${envName} tanımlanmamış (${config.llm.provider} sağlayıcısı için gerekli)`);
  }

  if (config.enableAudio) {
    const hasPrimary = Boolean(config.tts.elevenLabsApiKey || config.tts.googleApiKey);
    const hasBaseline = config.allowBaselineFallback && Boolean(config.tts.coquiUrl);
    if (!hasPrimary && !hasBaseline) {
      problems.push(
        'Ses üretimi açık ama hiçbir TTS sağlayıcısı yapılandırılmamış (ELEVENLABS_API_KEY, GOOGLE_CLOUD_TTS_API_KEY veya COQUI_TUNNEL_URL)'
      );
    }
  }

  return problems;
}

/**
 * Yapılandırma özeti (API anahtarları gizlenir)
 */
export function describeConfig(config: GeneratorConfig): Record<string, unknown> {
  const configured = (value: string | undefined) => (value ? 'tanımlı' : 'yok');

  return {
    conversations: config.numConversations,
    turns: `${config.minTurns}-${config.maxTurns}`,
    temperatures: { agent: config.temperatureAgent, user: config.temperatureUser },
    transcriptLength: `${config.minTranscriptLength}-${config.maxTranscriptLength}`,
    maxAttempts: config.maxAttempts,
    turnDelayMs: config.turnDelayMs,
    concurrency: config.concurrency,
    scenarioWeights: config.scenarioWeights,
    audio: config.enableAudio,
    baselineFallback: config.allowBaselineFallback,
    outputDir: config.outputDir,
    llm: { provider: config.llm.provider, model: config.llm.model, apiKey: configured(config.llm.apiKey) },
    tts: {
      elevenlabs: configured(config.tts.elevenLabsApiKey),
      google_cloud: configured(config.tts.googleApiKey),
      coqui: configured(config.tts.coquiUrl)
    }
  };
}
