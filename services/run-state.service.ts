/**
 * Çalıştırma Durumu Servisi
 * Kalıcı tek JSON kaydı: son kabul edilen konuşma kimliği ve kabul defteri.
 * Yeni çalıştırmalar kimlikleri buradan devam ettirir (artımlı üretim).
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import logger from '@/lib/logger';
import { ConfigurationError, isFileNotFound } from '@/lib/errors';
import { OUTPUT_DEFAULTS } from '@/lib/constants';
import { createSerialQueue } from '@/lib/utils';
import { corpusPaths, readCorpusStats } from './corpus.service';

const LedgerEntrySchema = z.object({
  conversationId: z.number().int().positive(),
  scenario: z.string(),
  turns: z.number().int().positive(),
  acceptedAt: z.string()
});

const RunStateSchema = z.object({
  lastConversationId: z.number().int().min(0),
  conversations: z.array(LedgerEntrySchema),
  updatedAt: z.string().optional()
});

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;
export type RunState = z.infer<typeof RunStateSchema>;

export function runStatePath(outputDir: string): string {
  return path.join(outputDir, OUTPUT_DEFAULTS.RUN_STATE_FILENAME);
}

export class RunStateStore {
  private state: RunState = { lastConversationId: 0, conversations: [] };
  private readonly enqueue = createSerialQueue();
  readonly filePath: string;

  constructor(private readonly outputDir: string) {
    this.filePath = runStatePath(outputDir);
  }

  /**
   * Durumu diskten oku. Dosya yoksa mevcut manifestten son kimliği çıkar.
   */
  async load(): Promise<RunState> {
    let content: string | null = null;

    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!isFileNotFound(error)) throw error;
    }

    if (content === null) {
      const stats = await readCorpusStats(this.outputDir);
      this.state = { lastConversationId: stats.maxConversationId, conversations: [] };

      if (stats.maxConversationId > 0) {
        logger.info('Durum dosyası yok, son kimlik manifestten alındı', {
          lastConversationId: stats.maxConversationId
        });
      }
      return this.state;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Çalıştırma durumu okunamadı: ${this.filePath}`, [
        error instanceof Error ? error.message : String(error)
      ]);
    }

    const parsed = RunStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Çalıştırma durumu geçersiz: ${this.filePath}`,
        parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    this.state = parsed.data;
    return this.state;
  }

  get current(): RunState {
    return this.state;
  }

  /**
   * Sonraki çalıştırmanın ilk konuşma kimliği
   */
  nextConversationId(): number {
    return this.state.lastConversationId + 1;
  }

  /**
   * Kabul edilen konuşmayı deftere yaz ve dosyayı güncelle
   */
  recordAccepted(entry: Omit<LedgerEntry, 'acceptedAt'>): Promise<void> {
    return this.enqueue(async () => {
      this.state = {
        lastConversationId: Math.max(this.state.lastConversationId, entry.conversationId),
        conversations: [...this.state.conversations, { ...entry, acceptedAt: new Date().toISOString() }],
        updatedAt: new Date().toISOString()
      };

      await fs.mkdir(this.outputDir, { recursive: true });

      // Önce geçici dosyaya yaz, sonra yer değiştir
      const tmpPath = `${this.filePath}.tmp`;
      await fs.writeFile(tmpPath, JSON.stringify(this.state, null, 2), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    });
  }
}

/**
 * Tüm üretilmiş veriyi sil: korpus dosyaları, ses dizini ve çalıştırma durumu.
 * Sonraki çalıştırma 1 numaralı konuşmadan başlar.
 */
export async function resetCorpus(outputDir: string): Promise<string[]> {
  const paths = corpusPaths(outputDir);
  const targets = [
    paths.manifest,
    paths.asr,
    paths.tts,
    runStatePath(outputDir),
    path.join(outputDir, OUTPUT_DEFAULTS.AUDIO_DIRNAME)
  ];

  const removed: string[] = [];

  for (const target of targets) {
    const exists = await fs.stat(target).then(() => true, (error: unknown) => {
      if (isFileNotFound(error)) return false;
      throw error;
    });

    if (!exists) continue;

    await fs.rm(target, { recursive: true, force: true });
    removed.push(target);
    logger.info('Silindi', { path: target });
  }

  logger.info('Tüm eğitim verisi sıfırlandı, sonraki çalıştırma 1 numaralı konuşmadan başlayacak');

  return removed;
}
