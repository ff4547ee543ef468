/**
 * Konuşmacı-Ses Eşleştirme Servisi
 * Her konuşma için ajan ve müşteri sesini bir kez seçer, sonra sabit tutar.
 */

import logger from '@/lib/logger';
import { defaultRng, pickRandom, type Rng } from '@/lib/utils';
import type { PersonaCatalog, Role } from '@/types/conversation.types';
import type { Gender, VoiceBinding, VoiceRegistry } from '@/types/voice.types';

// Türkçe kadın isimlerinde sık görülen son harfler
const FEMALE_ENDINGS = ['e', 'a', 'ş', 'ü', 'ö'];

/**
 * İsimden cinsiyet tahmini: önce bilinen isim listeleri, sonra son harf sezgisi
 */
export function inferGender(name: string, personas: Pick<PersonaCatalog, 'maleNames' | 'femaleNames'>): Gender {
  const trimmed = name.trim();
  if (personas.maleNames.includes(trimmed)) return 'male';
  if (personas.femaleNames.includes(trimmed)) return 'female';

  const lower = trimmed.toLocaleLowerCase('tr-TR');
  return FEMALE_ENDINGS.some(ending => lower.endsWith(ending)) ? 'female' : 'male';
}

export class SpeakerBinding {
  private readonly bindings = new Map<number, VoiceBinding>();

  constructor(
    private readonly registry: VoiceRegistry,
    private readonly personas: Pick<PersonaCatalog, 'maleNames' | 'femaleNames'>,
    private readonly rng: Rng = defaultRng
  ) {}

  /**
   * Konuşmanın ses eşleşmesini döndür; ilk çağrıda oluşturur.
   * Sonraki çağrılarda persona argümanı yok sayılır.
   */
  bind(conversationId: number, agentPersonaName: string): VoiceBinding {
    const existing = this.bindings.get(conversationId);
    if (existing) return existing;

    const agentGender = inferGender(agentPersonaName, this.personas);
    const userGender = pickRandom<Gender>(['male', 'female'], this.rng);

    const binding: VoiceBinding = {
      agentVoiceId: this.pickVoice('agent', agentGender),
      userVoiceId: this.pickVoice('user', userGender)
    };

    this.bindings.set(conversationId, binding);

    logger.debug('Konuşma sesleri atandı', {
      conversationId,
      agentPersonaName,
      agentGender,
      userGender,
      ...binding
    });

    return binding;
  }

  /**
   * Eşleşmesi yapılmış konuşmada rolün ses kimliği
   */
  speakerFor(conversationId: number, role: Role): string {
    const binding = this.bindings.get(conversationId);
    if (!binding) {
      throw new Error(`Konuşma ${conversationId} için ses eşleşmesi yok`);
    }
    return role === 'agent' ? binding.agentVoiceId : binding.userVoiceId;
  }

  private pickVoice(role: Role, gender: Gender): string {
    const roleVoices = Object.entries(this.registry.voices).filter(([, voice]) => voice.role === role);
    const genderVoices = roleVoices.filter(([, voice]) => voice.gender === gender);

    // Cinsiyet ayrımı yoksa rolün tüm sesleri arasından seç
    const pool = genderVoices.length > 0 ? genderVoices : roleVoices;
    if (pool.length === 0) {
      logger.warn('Ses havuzu boş, varsayılan ses kullanılıyor', { role, gender });
      return this.registry.defaults[role];
    }

    return pickRandom(pool, this.rng)[0];
  }
}
