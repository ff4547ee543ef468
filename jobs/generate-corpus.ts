/**
 * Korpus Üretim Pipeline'ı
 * Senaryo dağılımı → konuşma havuzu (worker pool) → kalıcı kayıt → özet
 */

import fs from 'fs/promises';
import logger from '@/lib/logger';
import { errorMessage } from '@/lib/errors';
import type { Catalog } from '@/lib/catalog';
import type { GeneratorConfig } from '@/lib/config';
import { defaultRng, sleep, type Rng } from '@/lib/utils';
import type { AttemptFailure } from '@/types/conversation.types';

// Servisler
import { selectScenarios, countBy } from '@/services/scenario.service';
import { SpeakerBinding } from '@/services/speaker.service';
import { LLMTurnGenerator } from '@/services/turn-generator.service';
import { createModelClient, type ModelClient } from '@/services/llm-router.service';
import { createTTSClient, type TTSClient } from '@/services/tts-router.service';
import { ConversationOrchestrator, type TurnGenerator } from '@/services/conversation.service';
import { CorpusWriter } from '@/services/corpus.service';
import { RunStateStore } from '@/services/run-state.service';

export interface CorpusGenerationOptions {
  config: GeneratorConfig;
  catalog: Catalog;
  // Testlerde sahte istemciler verilebilir
  modelClient?: ModelClient;
  generator?: TurnGenerator;
  ttsClient?: TTSClient;
  rng?: Rng;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
  signal?: AbortSignal;
}

export interface RunSummary {
  requested: number;
  accepted: number;
  skipped: number;
  cancelled: number;
  startConversationId: number;
  lastConversationId: number;
  utterances: number;
  agentUtterances: number;
  userUtterances: number;
  uniqueAgentVoices: number;
  uniqueUserVoices: number;
  audioSeconds: number;
  scenarios: Record<string, number>;
  // Denemelerin hata türleri + korpusa yazılamayan konuşmalar
  failures: Record<AttemptFailure['kind'] | 'persistence', number>;
  durationMs: number;
}

export async function runCorpusGeneration(options: CorpusGenerationOptions): Promise<RunSummary> {
  const { config, catalog } = options;
  const rng = options.rng ?? defaultRng;
  const startedAt = Date.now();

  // Bir worker hata verirse diğerleri de dursun
  const controller = new AbortController();
  const onExternalAbort = () => controller.abort();
  options.signal?.addEventListener('abort', onExternalAbort, { once: true });
  if (options.signal?.aborted) controller.abort();
  const signal = controller.signal;

  const store = new RunStateStore(config.outputDir);
  await store.load();
  const startConversationId = store.nextConversationId();

  const scenarios = selectScenarios(config.numConversations, config.scenarioWeights, rng);

  logger.info('Korpus üretimi başlatıldı', {
    requested: config.numConversations,
    startConversationId,
    audio: config.enableAudio,
    concurrency: config.concurrency,
    distribution: countBy(scenarios)
  });

  const generator = options.generator
    ?? new LLMTurnGenerator(options.modelClient ?? createModelClient(config));

  const ttsClient = config.enableAudio
    ? options.ttsClient ?? createTTSClient(config, catalog.voices)
    : undefined;

  const orchestrator = new ConversationOrchestrator({
    generator,
    speakers: new SpeakerBinding(catalog.voices, catalog.personas, rng),
    scenarios: catalog.scenarios,
    personas: catalog.personas,
    ttsClient,
    rng,
    wait: options.wait ?? sleep,
    settings: {
      minTurns: config.minTurns,
      maxTurns: config.maxTurns,
      temperatureAgent: config.temperatureAgent,
      temperatureUser: config.temperatureUser,
      minTranscriptLength: config.minTranscriptLength,
      maxTranscriptLength: config.maxTranscriptLength,
      maxAttempts: config.maxAttempts,
      turnDelayMs: config.turnDelayMs,
      historyWindow: config.historyWindow,
      outputDir: config.outputDir
    }
  });

  const writer = new CorpusWriter(config.outputDir);

  const summary: RunSummary = {
    requested: config.numConversations,
    accepted: 0,
    skipped: 0,
    cancelled: 0,
    startConversationId,
    lastConversationId: startConversationId - 1,
    utterances: 0,
    agentUtterances: 0,
    userUtterances: 0,
    uniqueAgentVoices: 0,
    uniqueUserVoices: 0,
    audioSeconds: 0,
    scenarios: {},
    failures: { parse: 0, generation: 0, synthesis: 0, validation: 0, scenario: 0, persistence: 0 },
    durationMs: 0
  };
  const agentVoices = new Set<string>();
  const userVoices = new Set<string>();

  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (!signal.aborted) {
      const index = nextIndex++;
      if (index >= scenarios.length) return;

      const conversationId = startConversationId + index;
      const scenario = scenarios[index];
      const outcome = await orchestrator.run(conversationId, scenario, signal);

      if (outcome.status === 'cancelled') {
        continue;
      }

      if (outcome.status === 'skipped') {
        summary.skipped++;
        for (const failure of outcome.failures) {
          summary.failures[failure.kind]++;
        }
        continue;
      }

      try {
        await writer.appendConversation(outcome.turns, scenario);
      } catch (error) {
        // Yazıcı dosyaları geri aldı; konuşma atlanmış sayılır
        logger.error('Konuşma kaydedilemedi, atlandı', { conversationId, error: errorMessage(error) });
        summary.skipped++;
        summary.failures.persistence++;
        await Promise.all(
          outcome.turns
            .flatMap(turn => (turn.audioFilepath ? [turn.audioFilepath] : []))
            .map(filePath => fs.rm(filePath, { force: true }))
        );
        continue;
      }

      await store.recordAccepted({
        conversationId,
        scenario,
        turns: outcome.turns.length
      });

      summary.accepted++;
      summary.lastConversationId = Math.max(summary.lastConversationId, conversationId);
      summary.scenarios[scenario] = (summary.scenarios[scenario] ?? 0) + 1;

      for (const turn of outcome.turns) {
        summary.utterances++;
        summary.audioSeconds += turn.audioDuration ?? 0;
        if (turn.role === 'agent') {
          summary.agentUtterances++;
          agentVoices.add(turn.speakerId);
        } else {
          summary.userUtterances++;
          userVoices.add(turn.speakerId);
        }
      }

      logger.info('İlerleme', {
        accepted: summary.accepted,
        skipped: summary.skipped,
        requested: summary.requested
      });
    }
  };

  const workerCount = Math.min(config.concurrency, scenarios.length);

  try {
    await Promise.all(
      Array.from({ length: workerCount }, () => worker().catch((error: unknown) => {
        controller.abort();
        throw error;
      }))
    );
  } finally {
    options.signal?.removeEventListener('abort', onExternalAbort);
  }

  summary.cancelled = summary.requested - summary.accepted - summary.skipped;
  summary.uniqueAgentVoices = agentVoices.size;
  summary.uniqueUserVoices = userVoices.size;
  summary.durationMs = Date.now() - startedAt;

  logger.info('Korpus üretimi tamamlandı', {
    accepted: `${summary.accepted}/${summary.requested}`,
    skipped: summary.skipped,
    cancelled: summary.cancelled,
    utterances: summary.utterances,
    audioHours: (summary.audioSeconds / 3600).toFixed(3)
  });

  return summary;
}
