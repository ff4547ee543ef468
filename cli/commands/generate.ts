import { Command } from 'commander';
import logger, { setLogLevel } from '@/lib/logger';
import { formatDuration } from '@/lib/utils';
import { runCorpusGeneration, type RunSummary } from '@/jobs/generate-corpus';
import { readCorpusStats } from '@/services/corpus.service';
import {
  exitCodeFor,
  loadConfigOrReport,
  parseInteger,
  parseWeights,
  toConfigOverrides,
  type GenerateCliOptions
} from '../options';

function printSummary(summary: RunSummary): void {
  console.log('\n📊 Çalıştırma özeti');
  console.log(`   Kabul edilen: ${summary.accepted}/${summary.requested}`);
  console.log(`   Atlanan: ${summary.skipped}, iptal: ${summary.cancelled}`);
  if (summary.accepted > 0) {
    console.log(`   Konuşma kimlikleri: ${summary.startConversationId}-${summary.lastConversationId}`);
  }
  console.log(`   Tur: ${summary.utterances} (ajan ${summary.agentUtterances}, müşteri ${summary.userUtterances})`);
  console.log(`   Ses kimlikleri: ajan ${summary.uniqueAgentVoices}, müşteri ${summary.uniqueUserVoices}`);
  console.log(`   Ses süresi: ${formatDuration(summary.audioSeconds)} (${(summary.audioSeconds / 3600).toFixed(3)} saat)`);
  console.log(`   Geçen süre: ${formatDuration(summary.durationMs / 1000)}`);
}

export const generateCommand = new Command('generate')
  .description('Sentetik telekom diyalog korpusu üret')
  .option('-n, --count <n>', 'Üretilecek konuşma sayısı', parseInteger)
  .option('--min-turns <n>', 'Minimum tur sayısı', parseInteger)
  .option('--max-turns <n>', 'Maksimum tur sayısı', parseInteger)
  .option('--min-chars <n>', 'Minimum metin uzunluğu', parseInteger)
  .option('--max-chars <n>', 'Maksimum metin uzunluğu', parseInteger)
  .option('-p, --provider <provider>', 'LLM sağlayıcısı (openai | claude)')
  .option('-m, --model <model>', 'LLM modeli')
  .option('--text-only', 'Ses üretmeden yalnızca metin')
  .option('--strict-audio', 'Temel (baseline) TTS sağlayıcısına düşme')
  .option('-c, --concurrency <n>', 'Eşzamanlı konuşma sayısı', parseInteger)
  .option('--max-attempts <n>', 'Konuşma başına deneme sayısı', parseInteger)
  .option('--delay <ms>', 'Turlar arası bekleme (ms)', parseInteger)
  .option('-w, --weights <list>', 'Senaryo ağırlıkları (senaryo=ağırlık,...)', parseWeights)
  .option('-o, --output <dir>', 'Çıktı dizini')
  .option('-v, --verbose', 'Ayrıntılı log')
  .action(async (options: GenerateCliOptions & { verbose?: boolean }) => {
    if (options.verbose) setLogLevel('debug');

    const loaded = loadConfigOrReport(toConfigOverrides(options));
    if (!loaded) return;
    const { config, catalog } = loaded;

    // Ctrl+C: mevcut deneme temizce bırakılır, yarım konuşma yazılmaz
    const controller = new AbortController();
    const onInterrupt = () => {
      if (controller.signal.aborted) {
        process.exit(130);
      }
      logger.warn('İptal isteği alındı, çalışan konuşmalar durduruluyor (tekrar Ctrl+C: hemen çık)');
      controller.abort();
    };
    process.on('SIGINT', onInterrupt);

    try {
      const summary = await runCorpusGeneration({ config, catalog, signal: controller.signal });
      printSummary(summary);

      const totals = await readCorpusStats(config.outputDir);
      console.log('\n📁 Korpus toplamı');
      console.log(`   Konuşma: ${totals.conversations}, tur: ${totals.utterances}`);
      console.log(`   Ses: ${totals.audioHours.toFixed(3)} saat`);

      process.exitCode = exitCodeFor(summary);
    } finally {
      process.off('SIGINT', onInterrupt);
    }
  });
