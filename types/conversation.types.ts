export type Role = 'agent' | 'user';

/**
 * Niyet etiketleri açık uçludur; aşağıdakiler senaryo akışında ve
 * doğrulamada özel anlam taşır.
 */
export type KnownIntent =
  | 'greeting'
  | 'complaint'
  | 'info_request'
  | 'info_provide'
  | 'options_presentation'
  | 'solution'
  | 'confirmation'
  | 'closing'
  | 'thanks';

export type Intent = KnownIntent | (string & {});

export type Slot = Record<string, unknown>;

export interface Turn {
  conversationId: number;
  turnNumber: number;       // 1'den başlar, boşluksuz
  role: Role;
  speakerId: string;        // Ses kaydı anahtarı (rol başına sabit)
  transcript: string;
  intent: Intent;
  slot: Slot;

  // Ses metadata (yalnızca ses üretimi açıkken)
  audioFilepath?: string;
  audioDuration?: number;   // Saniye
  sampleRate?: number;
  channels?: number;
  fileSize?: number;
}

export interface ScenarioDefinition {
  description: string;
  flow: string;
  commonIntents: string[];
  typicalDuration: string;
}

export interface ScenarioCatalog {
  weights: Record<string, number>;
  scenarios: Record<string, ScenarioDefinition>;
}

export interface PersonaCatalog {
  agentNames: string[];
  maleNames: string[];
  femaleNames: string[];
  fillers: string[];
  telecom: {
    packages: string[];
    internetSpeeds: string[];
    services: string[];
    commonIssues: string[];
  };
}

/**
 * Bir tur için yönerge: LLM'e verilecek talimat ve beklenen niyet(ler).
 * requiredIntents boşsa niyet serbesttir.
 */
export interface TurnInstruction {
  directive: string;
  requiredIntents: Intent[];
}

export type ConversationCheck =
  | 'turn_count'
  | 'role_alternation'
  | 'transcript_length'
  | 'audio_metadata'
  | 'closing'
  | 'final_turn';

export interface ConversationValidationResult {
  valid: boolean;
  check?: ConversationCheck;
  reason?: string;
}

export type AttemptFailure =
  | { kind: 'parse'; turnNumber: number; detail: string }
  | { kind: 'generation'; turnNumber: number; detail: string }
  | { kind: 'synthesis'; turnNumber: number; detail: string }
  | { kind: 'validation'; check: ConversationCheck | undefined; detail: string }
  | { kind: 'scenario'; detail: string };

export type ConversationOutcome =
  | { status: 'accepted'; conversationId: number; scenario: string; turns: Turn[]; attempts: number; agentName: string }
  | { status: 'skipped'; conversationId: number; scenario: string; attempts: number; failures: AttemptFailure[] }
  | { status: 'cancelled'; conversationId: number; scenario: string; attempts: number };
