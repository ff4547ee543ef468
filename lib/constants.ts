/**
 * Uygulama Sabitleri
 */

export const DEFAULT_MODELS = {
  openai: 'gpt-4o-mini',
  claude: 'claude-sonnet-4-20250514'
} as const;

// Tüm LLM sağlayıcıları için ortak sistem talimatı
export const SYSTEM_PROMPT =
  'Sen Türkçe telekom çağrı merkezi diyalogları üreten bir asistansın. Yanıtını yalnızca istenen JSON nesnesi olarak ver.';

export const GENERATION_DEFAULTS = {
  NUM_CONVERSATIONS: 10,
  TURNS_MIN: 6,
  TURNS_MAX: 16,
  TEMPERATURE_AGENT: 0.7,   // Düşük = daha tutarlı ajan
  TEMPERATURE_USER: 0.9,    // Yüksek = daha çeşitli kullanıcı
  MIN_TRANSCRIPT_LENGTH: 20,
  MAX_TRANSCRIPT_LENGTH: 200,
  MAX_ATTEMPTS: 3,
  TURN_DELAY_MS: 2000,      // Ücretsiz katman rate limit'i için
  HISTORY_WINDOW: 3,
  CONCURRENCY: 1
};

// Metin modunda uzunluk sınırları daha esnek
export const TEXT_ONLY_TRANSCRIPT_LIMITS = {
  MIN: 15,
  MAX: 300
};

export const AUDIO_SETTINGS = {
  SAMPLE_RATE: 16000,  // ASR için standart
  CHANNELS: 1,         // Mono
  BIT_DEPTH: 16,
  // Yaklaşık: sağlayıcı kesin süre vermediğinde karakter başına saniye
  SECONDS_PER_CHAR_ESTIMATE: 0.08
};

export const OUTPUT_DEFAULTS = {
  DIR: 'data',
  MANIFEST_FILENAME: 'training_manifest.jsonl',
  ASR_FILENAME: 'asr_training_data.jsonl',
  TTS_FILENAME: 'tts_training_data.jsonl',
  RUN_STATE_FILENAME: 'run_state.json',
  AUDIO_DIRNAME: 'audio'
};

export const CLOSING_INTENT = 'closing';
export const FINAL_INTENTS = ['thanks', 'confirmation'];
