/**
 * Tur Yönergesi Servisi
 * Rol, önceki niyet ve senaryoya göre LLM'e verilecek tur talimatını belirler.
 * Saf fonksiyon: durum yalnızca geçmişten türetilir.
 */

import type { Intent, Role, Turn, TurnInstruction } from '@/types/conversation.types';

export interface TurnInstructionInput {
  role: Role;
  scenario: string;
  history: ReadonlyArray<Pick<Turn, 'intent'>>;
  totalTurns: number;
  turnNumber: number;
  persona: string;
}

// Şikayetle başlayan senaryolar
const COMPLAINT_SCENARIOS = ['billing_dispute', 'technical_support'];

// Senaryoya özel ajan yönergeleri
const AGENT_SCENARIO_DIRECTIVES: Record<string, { infoRequest: string; solution: string }> = {
  billing_dispute: {
    infoRequest: 'Fatura detaylarını öğrenmek için bilgi iste.',
    solution: 'Soruna çözüm öner (iade, düzeltme vb.).'
  },
  technical_support: {
    infoRequest: 'Teknik detayları öğrenmek için soru sor.',
    solution: 'Teknik çözüm öner (reset, teknisyen vb.).'
  }
};

function instruction(text: string, ...requiredIntents: Intent[]): TurnInstruction {
  const suffix = requiredIntents.length > 0
    ? ` Intent: ${requiredIntents.map(intent => `"${intent}"`).join(' veya ')}`
    : '';
  return { directive: `${text}${suffix}`, requiredIntents };
}

export function instruct(input: TurnInstructionInput): TurnInstruction {
  const { role, scenario, history, totalTurns, turnNumber, persona } = input;

  if (turnNumber === 1) {
    return instruction(
      `Sen ${persona} adındaki ajansın. Sıcak bir selamlama yap ve nasıl yardımcı olabileceğini sor.`,
      'greeting'
    );
  }

  if (turnNumber === totalTurns - 1) {
    return instruction('Sen ajansın. Sorunu çözdün, nazikçe görüşmeyi sonlandır.', 'closing');
  }

  if (turnNumber === totalTurns) {
    return instruction('Sen kullanıcısın. Ajana teşekkür et veya çözümü onayla.', 'thanks', 'confirmation');
  }

  const previousIntent = history.length > 0 ? history[history.length - 1].intent : undefined;

  if (role === 'agent') {
    const scenarioDirectives = AGENT_SCENARIO_DIRECTIVES[scenario];
    if (scenarioDirectives) {
      if (previousIntent === 'complaint') {
        return instruction(scenarioDirectives.infoRequest, 'info_request');
      }
      if (previousIntent === 'info_provide' && turnNumber > 4) {
        return instruction(scenarioDirectives.solution, 'solution');
      }
    }

    if (previousIntent === 'complaint' || previousIntent === 'info_request') {
      return instruction('Daha fazla bilgi toplamak için soru sor.', 'info_request');
    }
    if (previousIntent === 'info_provide') {
      return instruction('Bilgiyi işle ve uygun yanıt ver.', 'info_provide', 'solution');
    }

    return instruction('Görüşmeyi ilerletmek için uygun yanıt ver.');
  }

  if (previousIntent === 'greeting') {
    return COMPLAINT_SCENARIOS.includes(scenario)
      ? instruction('Sorununuzu açıklayın.', 'complaint')
      : instruction('Neye ihtiyacınız olduğunu belirtin.', 'info_request');
  }
  if (previousIntent === 'info_request') {
    return instruction('İstenen bilgiyi sağlayın.', 'info_provide');
  }
  if (previousIntent === 'solution' || previousIntent === 'options_presentation') {
    return instruction('Önerilen çözümü kabul edin veya soru sorun.', 'confirmation', 'info_request');
  }

  return instruction('Doğal şekilde görüşmeye devam edin.');
}
