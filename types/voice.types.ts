import type { Role } from './conversation.types';

export type Gender = 'male' | 'female';

export type TTSProviderName = 'elevenlabs' | 'google_cloud' | 'coqui';

export type TTSQuality = 'very_high' | 'high' | 'basic';

export interface ProviderVoice {
  provider: TTSProviderName;
  voice: string;            // Sağlayıcıya özel ses kimliği
}

export interface VoiceConfig extends ProviderVoice {
  role: Role;
  gender: Gender;
  fallbacks: ProviderVoice[];
  characteristics: string;
}

export interface VoiceRegistry {
  defaults: Record<Role, string>;
  baseline: {
    provider: TTSProviderName;
    voices: Record<Gender, string>;
  };
  voices: Record<string, VoiceConfig>;
}

export interface VoiceBinding {
  agentVoiceId: string;
  userVoiceId: string;
}

export interface ProviderAttempt {
  provider: TTSProviderName;
  voice: string;
  success: boolean;
  skipped?: boolean;
  error?: string;
}

export interface AudioResult {
  provider: TTSProviderName;
  filePath: string;
  /**
   * durationEstimated true ise süre karakter başına sabit saniye
   * sezgisiyle tahmin edilmiştir; hassas hizalama için kullanılmamalı.
   */
  durationSeconds: number;
  durationEstimated: boolean;
  sampleRate: number;
  channels: number;
  fileSize: number;
  attempts: ProviderAttempt[];
}
