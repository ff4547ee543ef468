// Base App Error
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'APP_ERROR'
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Configuration Error - üretim başlamadan önce ölümcül
export class ConfigurationError extends AppError {
  constructor(message: string, public problems: string[] = []) {
    super(message, 'CONFIGURATION_ERROR');
  }
}

// Max Retries Exceeded Error
export class MaxRetriesExceededError extends AppError {
  constructor(message: string, public originalError?: Error) {
    super(message, 'MAX_RETRIES_EXCEEDED');
  }
}

// LLM (OpenAI / Claude) Error
export class ModelError extends AppError {
  constructor(message: string, public provider: string) {
    super(message, 'MODEL_ERROR');
  }
}

// ElevenLabs Error
export class ElevenLabsError extends AppError {
  constructor(message: string) {
    super(message, 'ELEVENLABS_ERROR');
  }
}

// Google Cloud TTS Error
export class GoogleTTSError extends AppError {
  constructor(message: string) {
    super(message, 'GOOGLE_TTS_ERROR');
  }
}

// Coqui TTS Error
export class CoquiError extends AppError {
  constructor(message: string) {
    super(message, 'COQUI_ERROR');
  }
}

// Synthesis Error - TTS zinciri tükendi
export class SynthesisError extends AppError {
  constructor(message: string, public speakerId: string) {
    super(message, 'SYNTHESIS_ERROR');
  }
}

/**
 * Bilinmeyen hata değerinden okunabilir mesaj çıkar
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Bilinmeyen hata';
}

/**
 * Dosya bulunamadı (ENOENT) hatası mı?
 */
export function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
