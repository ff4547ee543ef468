/**
 * Korpus Yazıcı
 * Kabul edilen konuşmaları JSONL dosyalarına ekler (UTF-8, yalnızca ekleme):
 * - tam manifest (tüm turlar + turn_number, scenario)
 * - ASR görünümü (tüm turlar)
 * - TTS görünümü (yalnızca ajan turları)
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import logger from '@/lib/logger';
import { errorMessage, isFileNotFound } from '@/lib/errors';
import { OUTPUT_DEFAULTS } from '@/lib/constants';
import { createSerialQueue, zeroPad } from '@/lib/utils';
import type { Role, Slot, Turn } from '@/types/conversation.types';

/**
 * Dosyalara yazılan kayıt şekli (anahtar sırası sabittir)
 */
export interface CorpusRecord {
  conversation_id: number;
  audio_filepath?: string;
  transcript: string;
  speaker_id: string;
  role: Role;
  intent: string;
  slot: Slot;
  audio_duration?: number;
  sample_rate?: number;
  channels?: number;
  file_size?: number;
}

export interface ManifestRecord extends CorpusRecord {
  turn_number: number;
  scenario: string;
}

export interface CorpusPaths {
  manifest: string;
  asr: string;
  tts: string;
}

export function corpusPaths(outputDir: string): CorpusPaths {
  return {
    manifest: path.join(outputDir, OUTPUT_DEFAULTS.MANIFEST_FILENAME),
    asr: path.join(outputDir, OUTPUT_DEFAULTS.ASR_FILENAME),
    tts: path.join(outputDir, OUTPUT_DEFAULTS.TTS_FILENAME)
  };
}

/**
 * (konuşma, tur) için kanonik ses dosyası yolu: audio/<rol>/<cid:4>_<tur:2>.wav
 */
export function audioPathFor(outputDir: string, conversationId: number, turnNumber: number, role: Role): string {
  return path.join(
    outputDir,
    OUTPUT_DEFAULTS.AUDIO_DIRNAME,
    role,
    `${zeroPad(conversationId, 4)}_${zeroPad(turnNumber, 2)}.wav`
  );
}

export function toCorpusRecord(turn: Turn): CorpusRecord {
  const record: CorpusRecord = {
    conversation_id: turn.conversationId,
    ...(turn.audioFilepath !== undefined ? { audio_filepath: turn.audioFilepath } : {}),
    transcript: turn.transcript,
    speaker_id: turn.speakerId,
    role: turn.role,
    intent: turn.intent,
    slot: turn.slot
  };

  if (turn.audioDuration !== undefined) record.audio_duration = turn.audioDuration;
  if (turn.sampleRate !== undefined) record.sample_rate = turn.sampleRate;
  if (turn.channels !== undefined) record.channels = turn.channels;
  if (turn.fileSize !== undefined) record.file_size = turn.fileSize;

  return record;
}

export function toManifestRecord(turn: Turn, scenario: string): ManifestRecord {
  return {
    ...toCorpusRecord(turn),
    turn_number: turn.turnNumber,
    scenario
  };
}

function toJsonl(records: readonly object[]): string {
  return records.map(record => JSON.stringify(record)).join('\n') + '\n';
}

export class CorpusWriter {
  readonly paths: CorpusPaths;
  private readonly enqueue = createSerialQueue();

  constructor(private readonly outputDir: string) {
    this.paths = corpusPaths(outputDir);
  }

  /**
   * Kabul edilmiş konuşmayı üç dosyaya ekle. Eşzamanlı çağrılar sıraya alınır.
   * Yazma hatasında dosyalar eski boyutlarına geri alınır; konuşma ya üç
   * dosyada da bulunur ya hiçbirinde.
   */
  appendConversation(turns: readonly Turn[], scenario: string): Promise<void> {
    return this.enqueue(async () => {
      if (turns.length === 0) return;

      await fs.mkdir(this.outputDir, { recursive: true });

      const records = turns.map(turn => toCorpusRecord(turn));
      const agentRecords = records.filter(record => record.role === 'agent');

      const writes: Array<{ filePath: string; content: string }> = [
        { filePath: this.paths.manifest, content: toJsonl(turns.map(turn => toManifestRecord(turn, scenario))) },
        { filePath: this.paths.asr, content: toJsonl(records) }
      ];
      if (agentRecords.length > 0) {
        writes.push({ filePath: this.paths.tts, content: toJsonl(agentRecords) });
      }

      const touched: AppendMark[] = [];

      try {
        for (const write of writes) {
          const mark = await markFile(write.filePath);
          touched.push(mark);
          await fs.appendFile(write.filePath, write.content, 'utf-8');
        }
      } catch (error) {
        await rollback(touched);
        logger.error('Konuşma korpusa yazılamadı, dosyalar geri alındı', {
          conversationId: turns[0].conversationId,
          error: errorMessage(error)
        });
        throw error;
      }

      logger.debug('Konuşma korpusa eklendi', {
        conversationId: turns[0].conversationId,
        turns: turns.length,
        agentTurns: agentRecords.length
      });
    });
  }
}

// Eklemeden önceki durum: dosya yoksa size null
interface AppendMark {
  filePath: string;
  size: number | null;
}

async function markFile(filePath: string): Promise<AppendMark> {
  try {
    const stat = await fs.stat(filePath);
    return { filePath, size: stat.size };
  } catch (error) {
    if (isFileNotFound(error)) return { filePath, size: null };
    throw error;
  }
}

async function rollback(marks: readonly AppendMark[]): Promise<void> {
  for (const mark of marks) {
    try {
      if (mark.size === null) {
        await fs.rm(mark.filePath, { force: true });
      } else {
        await fs.truncate(mark.filePath, mark.size);
      }
    } catch (error) {
      logger.error('Korpus dosyası geri alınamadı', {
        filePath: mark.filePath,
        size: mark.size,
        error: errorMessage(error)
      });
    }
  }
}

const ManifestLineSchema = z.object({
  conversation_id: z.number().int(),
  speaker_id: z.string(),
  role: z.enum(['agent', 'user']),
  audio_duration: z.number().optional()
});

export interface CorpusStats {
  conversations: number;
  utterances: number;
  agentUtterances: number;
  userUtterances: number;
  uniqueAgentVoices: number;
  uniqueUserVoices: number;
  audioHours: number;
  maxConversationId: number;
}

/**
 * Manifest dosyasının tamamından toplam istatistik
 */
export async function readCorpusStats(outputDir: string): Promise<CorpusStats> {
  const stats: CorpusStats = {
    conversations: 0,
    utterances: 0,
    agentUtterances: 0,
    userUtterances: 0,
    uniqueAgentVoices: 0,
    uniqueUserVoices: 0,
    audioHours: 0,
    maxConversationId: 0
  };

  let content: string;
  try {
    content = await fs.readFile(corpusPaths(outputDir).manifest, 'utf-8');
  } catch (error) {
    if (isFileNotFound(error)) return stats;
    throw error;
  }

  const conversations = new Set<number>();
  const agentVoices = new Set<string>();
  const userVoices = new Set<string>();
  let audioSeconds = 0;

  for (const line of content.split('\n')) {
    if (!line.trim()) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      logger.warn('Manifestte okunamayan satır atlandı', { line: line.substring(0, 100) });
      continue;
    }

    const parsed = ManifestLineSchema.safeParse(raw);
    if (!parsed.success) continue;

    const record = parsed.data;
    conversations.add(record.conversation_id);
    stats.utterances++;
    stats.maxConversationId = Math.max(stats.maxConversationId, record.conversation_id);
    audioSeconds += record.audio_duration ?? 0;

    if (record.role === 'agent') {
      stats.agentUtterances++;
      agentVoices.add(record.speaker_id);
    } else {
      stats.userUtterances++;
      userVoices.add(record.speaker_id);
    }
  }

  stats.conversations = conversations.size;
  stats.uniqueAgentVoices = agentVoices.size;
  stats.uniqueUserVoices = userVoices.size;
  stats.audioHours = audioSeconds / 3600;

  return stats;
}
