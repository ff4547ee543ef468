/**
 * Validasyon Servisi
 * Tamamlanan konuşmayı korpusa kabul etmeden önce doğrular.
 * Saf ve deterministik: kontroller sırayla çalışır, ilk hatada durur.
 */

import { CLOSING_INTENT, FINAL_INTENTS } from '@/lib/constants';
import type { ConversationValidationResult, Turn } from '@/types/conversation.types';

export interface ConversationRules {
  minTurns: number;
  maxTurns: number;
  minChars: number;
  maxChars: number;
  requireAudio: boolean;
}

function fail(check: ConversationValidationResult['check'], reason: string): ConversationValidationResult {
  return { valid: false, check, reason };
}

export function validateConversation(
  turns: readonly Turn[],
  rules: ConversationRules
): ConversationValidationResult {
  // Tur sayısı
  if (turns.length < rules.minTurns || turns.length > rules.maxTurns) {
    return fail(
      'turn_count',
      `Tur sayısı (${turns.length}) aralık dışında [${rules.minTurns}, ${rules.maxTurns}]`
    );
  }

  // Roller ajan ile başlayıp sırayla değişmeli
  for (let i = 0; i < turns.length; i++) {
    const expected = i % 2 === 0 ? 'agent' : 'user';
    if (turns[i].role !== expected) {
      return fail('role_alternation', `Tur ${i + 1} rolü '${turns[i].role}', beklenen '${expected}'`);
    }
  }

  for (let i = 0; i < turns.length; i++) {
    const length = turns[i].transcript.length;
    if (length < rules.minChars || length > rules.maxChars) {
      return fail(
        'transcript_length',
        `Tur ${i + 1} metin uzunluğu (${length}) geçersiz [${rules.minChars}, ${rules.maxChars}]`
      );
    }
  }

  if (rules.requireAudio) {
    for (let i = 0; i < turns.length; i++) {
      const turn = turns[i];
      if (!turn.audioFilepath) {
        return fail('audio_metadata', `Tur ${i + 1} ses dosyası yolu yok`);
      }
      if (turn.audioDuration === undefined || !(turn.audioDuration > 0)) {
        return fail('audio_metadata', `Tur ${i + 1} ses süresi eksik veya geçersiz`);
      }
    }
  }

  // Kapanış ve teşekkür için en az iki tur
  if (turns.length < 2) {
    return fail('turn_count', `Tur sayısı (${turns.length}) kapanış ve teşekkür için yetersiz`);
  }

  const closing = turns[turns.length - 2];
  if (closing.role !== 'agent' || closing.intent !== CLOSING_INTENT) {
    return fail('closing', `Sondan ikinci tur ajan kapanışı değil (${closing.role}/${closing.intent})`);
  }

  const last = turns[turns.length - 1];
  if (last.role !== 'user' || !FINAL_INTENTS.includes(last.intent)) {
    return fail('final_turn', `Son tur kullanıcı teşekkürü değil (${last.role}/${last.intent})`);
  }

  return { valid: true };
}
