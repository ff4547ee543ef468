import { Command } from 'commander';
import { OUTPUT_DEFAULTS } from '@/lib/constants';
import { resetCorpus } from '@/services/run-state.service';

export const resetCommand = new Command('reset')
  .description('Tüm üretilmiş veriyi sil (korpus dosyaları, ses, çalıştırma durumu)')
  .option('-o, --output <dir>', 'Çıktı dizini', OUTPUT_DEFAULTS.DIR)
  .option('-y, --yes', 'Onay sormadan sil')
  .action(async (options: { output: string; yes?: boolean }) => {
    if (!options.yes) {
      console.error(`🚨 Bu işlem ${options.output} altındaki tüm eğitim verisini siler. Onaylamak için --yes ekleyin.`);
      process.exitCode = 1;
      return;
    }

    const removed = await resetCorpus(options.output);
    if (removed.length === 0) {
      console.log('Silinecek veri yok.');
      return;
    }

    for (const target of removed) {
      console.log(`🗑️  Silindi: ${target}`);
    }
    console.log('✅ Tüm eğitim verisi sıfırlandı. Sonraki çalıştırma 1 numaralı konuşmadan başlayacak.');
  });
