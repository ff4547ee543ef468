import { jest } from '@jest/globals';
import type { Rng } from '@/lib/utils';
import type { CompletionOptions, ModelClient } from '@/services/llm-router.service';
import type { PersonaCatalog, Role, ScenarioCatalog, Turn } from '@/types/conversation.types';
import type { VoiceRegistry } from '@/types/voice.types';

/**
 * Sabit değer döndüren rastgele kaynak
 */
export function constantRng(value: number): Rng {
  return () => value;
}

/**
 * Tekrarlanabilir sözde rastgele kaynak (mulberry32)
 */
export function seededRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export const testRegistry: VoiceRegistry = {
  defaults: { agent: 'agent_male_001', user: 'user_female_001' },
  baseline: {
    provider: 'coqui',
    voices: { male: 'tr_male_reference', female: 'tr_female_reference' }
  },
  voices: {
    agent_male_001: {
      role: 'agent',
      gender: 'male',
      provider: 'elevenlabs',
      voice: 'el-agent-male',
      fallbacks: [{ provider: 'google_cloud', voice: 'tr-TR-Wavenet-B' }],
      characteristics: 'sakin'
    },
    agent_female_001: {
      role: 'agent',
      gender: 'female',
      provider: 'elevenlabs',
      voice: 'el-agent-female',
      fallbacks: [{ provider: 'google_cloud', voice: 'tr-TR-Wavenet-A' }],
      characteristics: 'sıcak'
    },
    user_male_001: {
      role: 'user',
      gender: 'male',
      provider: 'elevenlabs',
      voice: 'el-user-male',
      fallbacks: [{ provider: 'google_cloud', voice: 'tr-TR-Wavenet-E' }],
      characteristics: 'aceleci'
    },
    user_female_001: {
      role: 'user',
      gender: 'female',
      provider: 'elevenlabs',
      voice: 'el-user-female',
      fallbacks: [{ provider: 'google_cloud', voice: 'tr-TR-Wavenet-C' }],
      characteristics: 'meraklı'
    }
  }
};

export const testPersonas: PersonaCatalog = {
  agentNames: ['Ahmet', 'Elif'],
  maleNames: ['Ahmet', 'Mustafa'],
  femaleNames: ['Elif'],
  fillers: ['şey', 'yani', 'hani', 'aslında'],
  telecom: {
    packages: ['Süper Paket'],
    internetSpeeds: ['100 Mbps'],
    services: ['fiber'],
    commonIssues: ['yavaş internet']
  }
};

export const testScenarios: ScenarioCatalog = {
  weights: { billing_dispute: 0.5, roaming_inquiry: 0.5 },
  scenarios: {
    billing_dispute: {
      description: 'Fatura itirazı',
      flow: 'Şikayet → Bilgi → Çözüm',
      commonIntents: ['complaint', 'info_request', 'solution'],
      typicalDuration: '8-12 turns'
    },
    roaming_inquiry: {
      description: 'Yurt dışı kullanım',
      flow: 'Soru → Bilgi → Seçenekler',
      commonIntents: ['info_request', 'options_presentation'],
      typicalDuration: '6-8 turns'
    }
  }
};

export function makeTurn(turnNumber: number, overrides: Partial<Turn> = {}): Turn {
  const role: Role = turnNumber % 2 === 1 ? 'agent' : 'user';
  return {
    conversationId: 1,
    turnNumber,
    role,
    speakerId: role === 'agent' ? 'agent_male_001' : 'user_female_001',
    transcript: `Tur ${turnNumber} için örnek konuşma metni burada.`,
    intent: role === 'agent' ? 'info_request' : 'info_provide',
    slot: {},
    ...overrides
  };
}

/**
 * Kurallara uyan tam bir konuşma: karşılama ... kapanış, teşekkür
 */
export function makeConversation(totalTurns: number, overrides: Partial<Turn> = {}): Turn[] {
  return Array.from({ length: totalTurns }, (_, index) => {
    const turnNumber = index + 1;
    const intent = turnNumber === 1
      ? 'greeting'
      : turnNumber === totalTurns - 1
        ? 'closing'
        : turnNumber === totalTurns
          ? 'thanks'
          : undefined;
    return makeTurn(turnNumber, { ...(intent ? { intent } : {}), ...overrides });
  });
}

const TURN_PATTERN = /\*\*Tur\*\*: (\d+)\/(\d+)/;
const CONVERSATION_PATTERN = /\*\*Görüşme ID\*\*: (\d+)/;

export interface PromptFacts {
  conversationId: number;
  turnNumber: number;
  totalTurns: number;
}

export function readPromptFacts(prompt: string): PromptFacts {
  const turn = TURN_PATTERN.exec(prompt);
  const conversation = CONVERSATION_PATTERN.exec(prompt);
  if (!turn || !conversation) {
    throw new Error('Prompt beklenen alanları içermiyor');
  }
  return {
    conversationId: Number(conversation[1]),
    turnNumber: Number(turn[1]),
    totalTurns: Number(turn[2])
  };
}

/**
 * Talimatlara uyan model yanıtı. Kimlik alanları bilerek yanlış verilir;
 * orkestratör bunları kendisi doldurmalı.
 */
export function wellBehavedReply(prompt: string): string {
  const { turnNumber, totalTurns } = readPromptFacts(prompt);
  const intent = turnNumber === 1
    ? 'greeting'
    : turnNumber === totalTurns - 1
      ? 'closing'
      : turnNumber === totalTurns
        ? 'thanks'
        : turnNumber % 2 === 1 ? 'info_request' : 'info_provide';

  return JSON.stringify({
    conversation_id: 999,
    transcript: `Tur ${turnNumber} için örnek konuşma metni burada.`,
    speaker_id: 'modelin_uydurdugu_ses',
    role: 'model',
    intent,
    slot: {}
  });
}

export type CompleteFn = (prompt: string, options: CompletionOptions) => Promise<string>;

export function fakeModelClient(reply: (prompt: string) => string = wellBehavedReply): ModelClient & {
  complete: jest.Mock<CompleteFn>;
} {
  return {
    provider: 'openai',
    model: 'test-model',
    complete: jest.fn<CompleteFn>(async (prompt: string) => reply(prompt))
  };
}

export const noWait = async (): Promise<void> => {};
