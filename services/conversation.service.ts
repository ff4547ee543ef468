/**
 * Konuşma Orkestratörü
 * Bir konuşmayı tur tur üretir, gerekirse seslendirir ve doğrular.
 *
 * Deneme akışı: Başlangıç (persona, çift tur sayısı) → Tur döngüsü
 * (rol, konuşmacı, yönerge, prompt, model) → Ses (TTS istemcisi varsa)
 * → turlar arası bekleme → Doğrulama. Doğrulama başarısızsa baştan yeniden
 * denenir; maxAttempts tükenirse konuşma atlanır (ölümcül değildir).
 */

import fs from 'fs/promises';
import logger from '@/lib/logger';
import { errorMessage } from '@/lib/errors';
import { defaultRng, pickRandom, randomInt, sleep, type Rng } from '@/lib/utils';
import type {
  AttemptFailure,
  ConversationOutcome,
  PersonaCatalog,
  Role,
  ScenarioCatalog,
  ScenarioDefinition,
  Turn
} from '@/types/conversation.types';
import { audioPathFor } from './corpus.service';
import { renderPrompt } from './prompt.service';
import type { SpeakerBinding } from './speaker.service';
import type { TurnGenerationResult } from './turn-generator.service';
import { instruct } from './turn-instruction.service';
import type { TTSClient } from './tts-router.service';
import { validateConversation } from './validation.service';

export interface TurnGenerator {
  generate(prompt: string, temperature: number, signal?: AbortSignal): Promise<TurnGenerationResult>;
}

export interface OrchestratorSettings {
  minTurns: number;
  maxTurns: number;
  temperatureAgent: number;
  temperatureUser: number;
  minTranscriptLength: number;
  maxTranscriptLength: number;
  maxAttempts: number;
  turnDelayMs: number;
  historyWindow: number;
  outputDir: string;
}

export interface ConversationOrchestratorOptions {
  generator: TurnGenerator;
  speakers: SpeakerBinding;
  scenarios: ScenarioCatalog;
  personas: PersonaCatalog;
  settings: OrchestratorSettings;
  ttsClient?: TTSClient;
  rng?: Rng;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

type AttemptResult =
  | { kind: 'complete'; turns: Turn[]; agentName: string }
  | { kind: 'failed'; failure: AttemptFailure }
  | { kind: 'cancelled' };

/**
 * [min, max] aralığında çift tur sayısı.
 * Tek sayı bir yukarı yuvarlanır; max'ı aşacaksa bir aşağı.
 */
export function drawTurnCount(min: number, max: number, rng: Rng = defaultRng): number {
  const count = randomInt(min, max, rng);
  if (count % 2 === 0) return count;
  return count + 1 <= max ? count + 1 : count - 1;
}

export function roleForTurn(turnNumber: number): Role {
  return turnNumber % 2 === 1 ? 'agent' : 'user';
}

export class ConversationOrchestrator {
  private readonly generator: TurnGenerator;
  private readonly speakers: SpeakerBinding;
  private readonly scenarios: ScenarioCatalog;
  private readonly personas: PersonaCatalog;
  private readonly settings: OrchestratorSettings;
  private readonly ttsClient?: TTSClient;
  private readonly rng: Rng;
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: ConversationOrchestratorOptions) {
    this.generator = options.generator;
    this.speakers = options.speakers;
    this.scenarios = options.scenarios;
    this.personas = options.personas;
    this.settings = options.settings;
    this.ttsClient = options.ttsClient;
    this.rng = options.rng ?? defaultRng;
    this.wait = options.wait ?? sleep;
  }

  get audioEnabled(): boolean {
    return this.ttsClient !== undefined;
  }

  /**
   * Konuşmayı üret; kabul, atlama veya iptal sonucunu döndür
   */
  async run(conversationId: number, scenario: string, signal?: AbortSignal): Promise<ConversationOutcome> {
    const failures: AttemptFailure[] = [];

    const scenarioInfo = this.scenarios.scenarios[scenario];
    if (!scenarioInfo) {
      logger.error('Bilinmeyen senaryo, konuşma atlandı', { conversationId, scenario });
      return {
        status: 'skipped',
        conversationId,
        scenario,
        attempts: 0,
        failures: [{ kind: 'scenario', detail: `Bilinmeyen senaryo: ${scenario}` }]
      };
    }

    for (let attempt = 1; attempt <= this.settings.maxAttempts; attempt++) {
      if (signal?.aborted) {
        return { status: 'cancelled', conversationId, scenario, attempts: attempt - 1 };
      }

      const result = await this.attempt(conversationId, scenario, scenarioInfo, signal);

      if (result.kind === 'cancelled') {
        logger.info('Konuşma iptal edildi', { conversationId, attempt });
        return { status: 'cancelled', conversationId, scenario, attempts: attempt };
      }

      if (result.kind === 'complete') {
        logger.info('Konuşma kabul edildi', {
          conversationId,
          scenario,
          turns: result.turns.length,
          attempt
        });
        return {
          status: 'accepted',
          conversationId,
          scenario,
          turns: result.turns,
          attempts: attempt,
          agentName: result.agentName
        };
      }

      failures.push(result.failure);
      logger.warn('Konuşma denemesi başarısız', {
        conversationId,
        attempt,
        maxAttempts: this.settings.maxAttempts,
        failure: result.failure
      });
    }

    logger.error('Konuşma atlandı, deneme hakkı tükendi', {
      conversationId,
      scenario,
      attempts: this.settings.maxAttempts
    });

    return {
      status: 'skipped',
      conversationId,
      scenario,
      attempts: this.settings.maxAttempts,
      failures
    };
  }

  private async attempt(
    conversationId: number,
    scenario: string,
    scenarioInfo: ScenarioDefinition,
    signal?: AbortSignal
  ): Promise<AttemptResult> {
    // Başlangıç
    const agentName = pickRandom(this.personas.agentNames, this.rng);
    const totalTurns = drawTurnCount(this.settings.minTurns, this.settings.maxTurns, this.rng);
    this.speakers.bind(conversationId, agentName);

    const history: Turn[] = [];
    const writtenAudio: string[] = [];

    logger.debug('Konuşma denemesi başlıyor', { conversationId, scenario, agentName, totalTurns });

    const abandon = async (result: AttemptResult): Promise<AttemptResult> => {
      await this.discardAudio(writtenAudio);
      return result;
    };

    for (let turnNumber = 1; turnNumber <= totalTurns; turnNumber++) {
      if (signal?.aborted) return abandon({ kind: 'cancelled' });

      const role = roleForTurn(turnNumber);
      const speakerId = this.speakers.speakerFor(conversationId, role);
      const instruction = instruct({
        role,
        scenario,
        history,
        totalTurns,
        turnNumber,
        persona: agentName
      });

      const prompt = renderPrompt({
        conversationId,
        persona: agentName,
        scenario,
        scenarioInfo,
        role,
        turnNumber,
        totalTurns,
        speakerId,
        history,
        directive: instruction.directive,
        minChars: this.settings.minTranscriptLength,
        maxChars: this.settings.maxTranscriptLength
      }, this.personas, { historyWindow: this.settings.historyWindow, rng: this.rng });

      const temperature = role === 'agent' ? this.settings.temperatureAgent : this.settings.temperatureUser;
      const generated = await this.generator.generate(prompt, temperature, signal);

      if (signal?.aborted) return abandon({ kind: 'cancelled' });

      if (generated.kind === 'generation_failed') {
        return abandon({ kind: 'failed', failure: { kind: 'generation', turnNumber, detail: generated.detail } });
      }
      if (generated.kind !== 'ok') {
        return abandon({
          kind: 'failed',
          failure: { kind: 'parse', turnNumber, detail: `${generated.kind}: ${generated.detail}` }
        });
      }

      const { transcript, intent, slot } = generated.value;

      if (instruction.requiredIntents.length > 0 && !instruction.requiredIntents.includes(intent)) {
        logger.warn('Model beklenen niyetten farklı niyet üretti', {
          conversationId,
          turnNumber,
          expected: instruction.requiredIntents,
          actual: intent
        });
      }

      // Kimlik alanları modelden değil, orkestratörden gelir
      const turn: Turn = {
        conversationId,
        turnNumber,
        role,
        speakerId,
        transcript,
        intent,
        slot
      };

      if (this.ttsClient) {
        const outputPath = audioPathFor(this.settings.outputDir, conversationId, turnNumber, role);

        try {
          const audio = await this.ttsClient.synthesize(transcript, speakerId, outputPath, signal);
          writtenAudio.push(audio.filePath);

          turn.audioFilepath = audio.filePath;
          turn.audioDuration = audio.durationSeconds;
          turn.sampleRate = audio.sampleRate;
          turn.channels = audio.channels;
          turn.fileSize = audio.fileSize;
        } catch (error) {
          if (signal?.aborted) return abandon({ kind: 'cancelled' });
          return abandon({
            kind: 'failed',
            failure: { kind: 'synthesis', turnNumber, detail: errorMessage(error) }
          });
        }
      }

      history.push(turn);

      // Rate limit için turlar arası bekleme
      if (turnNumber < totalTurns && this.settings.turnDelayMs > 0) {
        await this.wait(this.settings.turnDelayMs, signal);
      }
    }

    const validation = validateConversation(history, {
      minTurns: this.settings.minTurns,
      maxTurns: this.settings.maxTurns,
      minChars: this.settings.minTranscriptLength,
      maxChars: this.settings.maxTranscriptLength,
      requireAudio: this.audioEnabled
    });

    if (!validation.valid) {
      return abandon({
        kind: 'failed',
        failure: { kind: 'validation', check: validation.check, detail: validation.reason ?? 'geçersiz' }
      });
    }

    return { kind: 'complete', turns: history, agentName };
  }

  /**
   * Kabul edilmeyen denemenin ses dosyalarını sil
   */
  private async discardAudio(paths: string[]): Promise<void> {
    for (const filePath of paths) {
      try {
        await fs.rm(filePath, { force: true });
      } catch (error) {
        logger.warn('Ses dosyası silinemedi', { filePath, error: errorMessage(error) });
      }
    }
  }
}
