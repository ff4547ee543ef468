/**
 * Prompt Servisi
 * Tek tur üretimi için LLM promptunu hazırlar
 */

import { GENERATION_DEFAULTS } from '@/lib/constants';
import { defaultRng, pickRandom, sampleRandom, type Rng } from '@/lib/utils';
import type { PersonaCatalog, Role, ScenarioDefinition, Turn } from '@/types/conversation.types';

export interface PromptContext {
  conversationId: number;
  persona: string;
  scenario: string;
  scenarioInfo: ScenarioDefinition;
  role: Role;
  turnNumber: number;
  totalTurns: number;
  speakerId: string;
  history: readonly Turn[];
  directive: string;
  minChars: number;
  maxChars: number;
}

export interface PromptRenderOptions {
  historyWindow?: number;
  rng?: Rng;
}

const TURN_PROMPT_TEMPLATE = `Sen {{PERSONA}} adında Türk telekom şirketinde çalışan bir müşteri hizmetleri temsilcisisin. Gerçekçi bir telefon görüşmesi için tek bir konuşma turu oluşturuyorsun.

# ZORUNLU ÇIKTI FORMATI
Sadece aşağıdaki JSON formatında yanıt ver, başka hiçbir açıklama yapma:

{
    "conversation_id": {{CONVERSATION_ID}},
    "transcript": "konuşma_metni",
    "speaker_id": "{{SPEAKER_ID}}",
    "role": "{{ROLE}}",
    "intent": "niyet_etiketi",
    "slot": {"anahtar": "değer"}
}

# SENARYO BİLGİLERİ
- **Senaryo**: {{SCENARIO}} - {{SCENARIO_DESCRIPTION}}
- **Akış**: {{SCENARIO_FLOW}}
- **Görüşme ID**: {{CONVERSATION_ID}}
- **Tur**: {{TURN_NUMBER}}/{{TOTAL_TURNS}}

# TELEKOM BAĞLAMI
- Örnek paket: {{PACKAGE}}
- Örnek hız: {{SPEED}}
- Sık sorun: {{ISSUE}}

# KONUŞMA GEÇMİŞİ
{{HISTORY}}

# BU TUR İÇİN TALİMATLAR
- **Rolün**: {{ROLE}}
- **Görevin**: {{DIRECTIVE}}

# TÜRKÇE DİL KURALLARI
- Doğal, günlük Türkçe kullan
- Telekom terminolojisini doğru kullan
- Gerektiğinde dolgu kelimeler ekle: {{FILLERS}}
- Konuşma metni {{MIN_CHARS}}-{{MAX_CHARS}} karakter arası olmalı
- Ses dosyası için uygun, akıcı konuşma

# NİYET VE SLOT KURALLARI
- **info_request**: slot = {"requested": "istenen_bilgi"}
- **info_provide**: slot = {"sağlanan_bilgi": "değer"}
- **solution**: slot = {"solution_type": "çözüm_türü", "details": "detaylar"}
- **Diğer niyetler**: slot = {}

JSON YANITI:`;

/**
 * Prompt şablonunu değişkenlerle doldurur
 */
function fillPromptTemplate(
  template: string,
  variables: Record<string, string>
): string {
  let result = template;
  for (const [key, value] of Object.entries(variables)) {
    // Fonksiyon ile değiştir: değer içindeki $ karakterleri özel anlam taşımasın
    result = result.replace(new RegExp(`\\{\\{${key}\\}\\}`, 'g'), () => value);
  }
  return result;
}

/**
 * Son turları satır başına bir JSON kayıt olarak yaz
 */
export function formatHistory(history: readonly Turn[], window: number): string {
  if (history.length === 0 || window <= 0) {
    return '(Henüz konuşma yok)';
  }

  return history
    .slice(-window)
    .map(turn => JSON.stringify({
      turn_number: turn.turnNumber,
      role: turn.role,
      speaker_id: turn.speakerId,
      transcript: turn.transcript,
      intent: turn.intent,
      slot: turn.slot
    }))
    .join('\n');
}

export function renderPrompt(
  context: PromptContext,
  personas: PersonaCatalog,
  options: PromptRenderOptions = {}
): string {
  const rng = options.rng ?? defaultRng;
  const historyWindow = options.historyWindow ?? GENERATION_DEFAULTS.HISTORY_WINDOW;
  const { telecom } = personas;

  return fillPromptTemplate(TURN_PROMPT_TEMPLATE, {
    PERSONA: context.persona,
    CONVERSATION_ID: String(context.conversationId),
    SPEAKER_ID: context.speakerId,
    ROLE: context.role,
    SCENARIO: context.scenario,
    SCENARIO_DESCRIPTION: context.scenarioInfo.description,
    SCENARIO_FLOW: context.scenarioInfo.flow,
    TURN_NUMBER: String(context.turnNumber),
    TOTAL_TURNS: String(context.totalTurns),
    PACKAGE: telecom.packages.length > 0 ? pickRandom(telecom.packages, rng) : '-',
    SPEED: telecom.internetSpeeds.length > 0 ? pickRandom(telecom.internetSpeeds, rng) : '-',
    ISSUE: telecom.commonIssues.length > 0 ? pickRandom(telecom.commonIssues, rng) : '-',
    HISTORY: formatHistory(context.history, historyWindow),
    DIRECTIVE: context.directive,
    FILLERS: sampleRandom(personas.fillers, 3, rng).join(', '),
    MIN_CHARS: String(context.minChars),
    MAX_CHARS: String(context.maxChars)
  });
}
