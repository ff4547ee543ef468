/**
 * Model Yanıtı Ayrıştırıcı
 * LLM çıktısından tek bir tur JSON nesnesini çıkarır ve şeklini doğrular.
 * Model çıktısı üzerinde asla exception fırlatmaz.
 */

import { z } from 'zod';
import type { Slot } from '@/types/conversation.types';

export interface ParsedTurn {
  transcript: string;
  intent: string;
  slot: Slot;
}

export type TurnParseResult =
  | { kind: 'ok'; value: ParsedTurn }
  | { kind: 'no_match'; detail: string }
  | { kind: 'invalid_json'; detail: string }
  | { kind: 'invalid_shape'; detail: string };

const ModelTurnSchema = z.object({
  transcript: z.string().trim().min(1, 'transcript boş'),
  intent: z.string().trim().min(1, 'intent boş'),
  slot: z.record(z.unknown()).nullish().transform(slot => slot ?? {})
});

// ```json ... ``` veya ``` ... ```
const FENCE_PATTERN = /```(?:json)?[ \t]*\r?\n?([\s\S]*?)```/gi;

/**
 * start konumundaki '{' ile dengelenen kapanış '}' konumunu bul.
 * String ve kaçış karakterlerini dikkate alır. Kapanmıyorsa -1.
 */
function findBalancedEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

type JsonScan =
  | { kind: 'found'; value: unknown }
  | { kind: 'none' }
  | { kind: 'broken'; detail: string };

/**
 * Metindeki ilk ayrıştırılabilir dengeli {...} bloğunu bul
 */
function scanForObject(text: string): JsonScan {
  let start = text.indexOf('{');
  if (start === -1) return { kind: 'none' };

  let lastError = '';

  while (start !== -1) {
    const end = findBalancedEnd(text, start);
    if (end === -1) {
      return { kind: 'broken', detail: lastError || 'Kapanmayan JSON nesnesi' };
    }

    try {
      return { kind: 'found', value: JSON.parse(text.slice(start, end + 1)) };
    } catch (error) {
      lastError = error instanceof Error ? error.message : String(error);
    }

    // İç içe nesneleri atla, bloğun sonrasından devam et
    start = text.indexOf('{', end + 1);
  }

  return { kind: 'broken', detail: lastError };
}

function extractJson(text: string): JsonScan {
  // Önce kod bloklarına bak
  for (const match of text.matchAll(FENCE_PATTERN)) {
    const scan = scanForObject(match[1]);
    if (scan.kind !== 'none') return scan;
  }

  return scanForObject(text);
}

export function parseModelTurn(text: string): TurnParseResult {
  const scan = extractJson(text);

  if (scan.kind === 'none') {
    return { kind: 'no_match', detail: 'Yanıtta JSON nesnesi bulunamadı' };
  }
  if (scan.kind === 'broken') {
    return { kind: 'invalid_json', detail: scan.detail };
  }

  const parsed = ModelTurnSchema.safeParse(scan.value);
  if (!parsed.success) {
    return {
      kind: 'invalid_shape',
      detail: parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(kök)'}: ${issue.message}`)
        .join('; ')
    };
  }

  return { kind: 'ok', value: parsed.data };
}
