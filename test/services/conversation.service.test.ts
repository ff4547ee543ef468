import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  ConversationOrchestrator,
  drawTurnCount,
  roleForTurn,
  type OrchestratorSettings
} from '@/services/conversation.service';
import { audioPathFor } from '@/services/corpus.service';
import { SpeakerBinding } from '@/services/speaker.service';
import { LLMTurnGenerator } from '@/services/turn-generator.service';
import type { TTSClient } from '@/services/tts-router.service';
import type { ModelClient } from '@/services/llm-router.service';
import type { AudioResult } from '@/types/voice.types';
import {
  constantRng,
  fakeModelClient,
  noWait,
  readPromptFacts,
  seededRng,
  testPersonas,
  testRegistry,
  testScenarios,
  wellBehavedReply
} from '../helpers/fixtures';

type SynthesizeFn = TTSClient['synthesize'];

interface Harness {
  orchestrator: ConversationOrchestrator;
  speakers: SpeakerBinding;
}

function createHarness(options: {
  client: ModelClient;
  outputDir: string;
  ttsClient?: TTSClient;
  settings?: Partial<OrchestratorSettings>;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}): Harness {
  const rng = seededRng(42);
  const speakers = new SpeakerBinding(testRegistry, testPersonas, rng);

  const orchestrator = new ConversationOrchestrator({
    generator: new LLMTurnGenerator(options.client),
    speakers,
    scenarios: testScenarios,
    personas: testPersonas,
    ttsClient: options.ttsClient,
    rng,
    wait: options.wait ?? noWait,
    settings: {
      minTurns: 6,
      maxTurns: 6,
      temperatureAgent: 0.7,
      temperatureUser: 0.9,
      minTranscriptLength: 15,
      maxTranscriptLength: 300,
      maxAttempts: 3,
      turnDelayMs: 0,
      historyWindow: 3,
      outputDir: options.outputDir,
      ...options.settings
    }
  });

  return { orchestrator, speakers };
}

function audioResult(filePath: string): AudioResult {
  return {
    provider: 'elevenlabs',
    filePath,
    durationSeconds: 1.2,
    durationEstimated: false,
    sampleRate: 16000,
    channels: 1,
    fileSize: 38444,
    attempts: [{ provider: 'elevenlabs', voice: 'el-agent-male', success: true }]
  };
}

describe('drawTurnCount', () => {
  it('should return even counts inside the range', () => {
    expect(drawTurnCount(6, 6, constantRng(0.5))).toBe(6);
    expect(drawTurnCount(6, 9, constantRng(0))).toBe(6);
    expect(drawTurnCount(7, 10, constantRng(0))).toBe(8);
  });

  it('should round down when rounding up would exceed the maximum', () => {
    expect(drawTurnCount(6, 9, constantRng(0.99))).toBe(8);
  });

  it('should stay even for any draw', () => {
    const rng = seededRng(5);
    for (let i = 0; i < 50; i++) {
      const count = drawTurnCount(6, 16, rng);
      expect(count % 2).toBe(0);
      expect(count).toBeGreaterThanOrEqual(6);
      expect(count).toBeLessThanOrEqual(16);
    }
  });
});

describe('roleForTurn', () => {
  it('should give odd turns to the agent', () => {
    expect([1, 2, 3, 4].map(roleForTurn)).toEqual(['agent', 'user', 'agent', 'user']);
  });
});

describe('ConversationOrchestrator', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'orchestrator-test-'));
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('should accept a well-formed conversation', async () => {
    const client = fakeModelClient();
    const { orchestrator, speakers } = createHarness({ client, outputDir });

    const outcome = await orchestrator.run(7, 'billing_dispute');

    expect(outcome.status).toBe('accepted');
    if (outcome.status !== 'accepted') return;

    expect(outcome.attempts).toBe(1);
    expect(testPersonas.agentNames).toContain(outcome.agentName);
    expect(outcome.turns.map(turn => turn.turnNumber)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(outcome.turns.map(turn => turn.role)).toEqual(['agent', 'user', 'agent', 'user', 'agent', 'user']);
    expect(outcome.turns.map(turn => turn.intent)).toEqual([
      'greeting', 'info_provide', 'info_request', 'info_provide', 'closing', 'thanks'
    ]);

    // Kimlik alanları modelin yanıtından değil, orkestratörden gelir
    for (const turn of outcome.turns) {
      expect(turn.conversationId).toBe(7);
      expect(turn.speakerId).toBe(speakers.speakerFor(7, turn.role));
      expect(turn.audioFilepath).toBeUndefined();
    }
  });

  it('should use the role temperature for each turn', async () => {
    const client = fakeModelClient();
    const { orchestrator } = createHarness({ client, outputDir });

    await orchestrator.run(1, 'roaming_inquiry');

    expect(client.complete.mock.calls.map(call => call[1].temperature)).toEqual([0.7, 0.9, 0.7, 0.9, 0.7, 0.9]);
  });

  it('should feed earlier turns back into later prompts', async () => {
    const client = fakeModelClient();
    const { orchestrator } = createHarness({ client, outputDir });

    await orchestrator.run(1, 'roaming_inquiry');

    const prompts = client.complete.mock.calls.map(call => call[0]);
    expect(prompts[0]).toContain('(Henüz konuşma yok)');
    expect(prompts[1]).toContain('"transcript":"Tur 1 için örnek konuşma metni burada."');
  });

  it('should wait between turns but not after the last one', async () => {
    const wait = jest.fn(async (_ms: number, _signal?: AbortSignal) => {});
    const { orchestrator } = createHarness({
      client: fakeModelClient(),
      outputDir,
      wait,
      settings: { turnDelayMs: 500 }
    });

    await orchestrator.run(1, 'roaming_inquiry');

    expect(wait).toHaveBeenCalledTimes(5);
    expect(wait.mock.calls[0][0]).toBe(500);
  });

  it('should retry the whole conversation after a parse failure', async () => {
    let calls = 0;
    const client = fakeModelClient(prompt => {
      calls++;
      return calls === 1 ? 'Üzgünüm, JSON veremiyorum.' : wellBehavedReply(prompt);
    });
    const { orchestrator } = createHarness({ client, outputDir });

    const outcome = await orchestrator.run(1, 'billing_dispute');

    expect(outcome.status).toBe('accepted');
    expect(outcome.attempts).toBe(2);
    expect(client.complete).toHaveBeenCalledTimes(7);
  });

  it('should skip the conversation once every attempt fails validation', async () => {
    const client = fakeModelClient(prompt => {
      const { turnNumber, totalTurns } = readPromptFacts(prompt);
      const reply = JSON.parse(wellBehavedReply(prompt));
      return JSON.stringify(turnNumber === totalTurns ? { ...reply, intent: 'complaint' } : reply);
    });
    const { orchestrator } = createHarness({ client, outputDir });

    const outcome = await orchestrator.run(3, 'billing_dispute');

    expect(outcome.status).toBe('skipped');
    if (outcome.status !== 'skipped') return;

    expect(outcome.attempts).toBe(3);
    expect(outcome.failures).toHaveLength(3);
    expect(outcome.failures[0]).toEqual({
      kind: 'validation',
      check: 'final_turn',
      detail: 'Son tur kullanıcı teşekkürü değil (user/complaint)'
    });
  });

  it('should record model errors as generation failures', async () => {
    const client = fakeModelClient();
    client.complete.mockRejectedValue(new Error('Claude hatası (status: 401)'));
    const { orchestrator } = createHarness({ client, outputDir, settings: { maxAttempts: 2 } });

    const outcome = await orchestrator.run(1, 'billing_dispute');

    expect(outcome).toEqual({
      status: 'skipped',
      conversationId: 1,
      scenario: 'billing_dispute',
      attempts: 2,
      failures: [
        { kind: 'generation', turnNumber: 1, detail: 'Claude hatası (status: 401)' },
        { kind: 'generation', turnNumber: 1, detail: 'Claude hatası (status: 401)' }
      ]
    });
  });

  it('should keep the voices of a conversation across attempts', async () => {
    let calls = 0;
    const client = fakeModelClient(prompt => {
      calls++;
      return calls === 2 ? '{"transcript": "eksik"' : wellBehavedReply(prompt);
    });
    const { orchestrator, speakers } = createHarness({ client, outputDir });

    const outcome = await orchestrator.run(1, 'billing_dispute');

    expect(outcome.status).toBe('accepted');
    if (outcome.status !== 'accepted') return;

    const prompts = client.complete.mock.calls.map(call => call[0]);
    const agentVoice = speakers.speakerFor(1, 'agent');
    expect(prompts[0]).toContain(`"speaker_id": "${agentVoice}"`);
    expect(prompts[2]).toContain(`"speaker_id": "${agentVoice}"`);
    expect(outcome.turns[0].speakerId).toBe(agentVoice);
  });

  it('should attach audio metadata at the canonical path', async () => {
    const synthesize = jest.fn<SynthesizeFn>(async (_text, _speakerId, outputPath) => audioResult(outputPath));
    const { orchestrator, speakers } = createHarness({
      client: fakeModelClient(),
      outputDir,
      ttsClient: { synthesize }
    });

    const outcome = await orchestrator.run(2, 'billing_dispute');

    expect(outcome.status).toBe('accepted');
    if (outcome.status !== 'accepted') return;

    expect(synthesize).toHaveBeenCalledTimes(6);
    expect(synthesize.mock.calls[2]).toEqual([
      'Tur 3 için örnek konuşma metni burada.',
      speakers.speakerFor(2, 'agent'),
      audioPathFor(outputDir, 2, 3, 'agent'),
      undefined
    ]);
    expect(outcome.turns[3]).toMatchObject({
      audioFilepath: audioPathFor(outputDir, 2, 4, 'user'),
      audioDuration: 1.2,
      sampleRate: 16000,
      channels: 1,
      fileSize: 38444
    });
  });

  it('should delete audio written by a failed attempt', async () => {
    const synthesize = jest.fn<SynthesizeFn>(async (text, _speakerId, outputPath) => {
      if (text.startsWith('Tur 3 ')) {
        throw new Error('Tüm TTS sağlayıcıları başarısız (elevenlabs: kota doldu)');
      }
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(outputPath, Buffer.alloc(100));
      return audioResult(outputPath);
    });
    const { orchestrator } = createHarness({
      client: fakeModelClient(),
      outputDir,
      ttsClient: { synthesize },
      settings: { maxAttempts: 1 }
    });

    const outcome = await orchestrator.run(1, 'billing_dispute');

    expect(outcome).toEqual({
      status: 'skipped',
      conversationId: 1,
      scenario: 'billing_dispute',
      attempts: 1,
      failures: [{
        kind: 'synthesis',
        turnNumber: 3,
        detail: 'Tüm TTS sağlayıcıları başarısız (elevenlabs: kota doldu)'
      }]
    });
    await expect(fs.access(audioPathFor(outputDir, 1, 1, 'agent'))).rejects.toThrow();
    await expect(fs.access(audioPathFor(outputDir, 1, 2, 'user'))).rejects.toThrow();
  });

  it('should not start when already cancelled', async () => {
    const client = fakeModelClient();
    const { orchestrator } = createHarness({ client, outputDir });
    const controller = new AbortController();
    controller.abort();

    const outcome = await orchestrator.run(1, 'billing_dispute', controller.signal);

    expect(outcome).toEqual({ status: 'cancelled', conversationId: 1, scenario: 'billing_dispute', attempts: 0 });
    expect(client.complete).not.toHaveBeenCalled();
  });

  it('should stop mid-conversation when cancelled', async () => {
    const controller = new AbortController();
    let calls = 0;
    const client = fakeModelClient(prompt => {
      calls++;
      if (calls === 3) controller.abort();
      return wellBehavedReply(prompt);
    });
    const { orchestrator } = createHarness({ client, outputDir });

    const outcome = await orchestrator.run(1, 'billing_dispute', controller.signal);

    expect(outcome.status).toBe('cancelled');
    expect(outcome.attempts).toBe(1);
    expect(client.complete).toHaveBeenCalledTimes(3);
  });

  it('should skip an unknown scenario without calling the model', async () => {
    const client = fakeModelClient();
    const { orchestrator } = createHarness({ client, outputDir });

    const outcome = await orchestrator.run(1, 'weather_chat');

    expect(outcome).toEqual({
      status: 'skipped',
      conversationId: 1,
      scenario: 'weather_chat',
      attempts: 0,
      failures: [{ kind: 'scenario', detail: 'Bilinmeyen senaryo: weather_chat' }]
    });
    expect(client.complete).not.toHaveBeenCalled();
  });
});
