import { Command } from 'commander';
import { describeConfig } from '@/lib/config';
import { testCoquiConnection } from '@/services/coqui.service';
import { loadConfigOrReport, parseInteger, toConfigOverrides } from '../options';

export const configCommand = new Command('config')
  .description('Yapılandırmayı doğrula ve özetini göster')
  .option('-p, --provider <provider>', 'LLM sağlayıcısı (openai | claude)')
  .option('--text-only', 'Metin modu yapılandırmasını göster')
  .option('-n, --count <n>', 'Konuşma sayısı', parseInteger)
  .option('--check-coqui', 'Coqui sunucusuna bağlantı testi yap')
  .action(async (options: { provider?: string; textOnly?: boolean; count?: number; checkCoqui?: boolean }) => {
    const loaded = loadConfigOrReport(toConfigOverrides(options));
    if (!loaded) return;
    const { config, catalog } = loaded;

    console.log('✅ Yapılandırma geçerli\n');
    console.log(JSON.stringify(describeConfig(config), null, 2));
    console.log(`\nSenaryolar: ${Object.keys(catalog.scenarios.scenarios).join(', ')}`);
    console.log(`Ses kayıtları: ${Object.keys(catalog.voices.voices).length}`);

    if (options.checkCoqui) {
      if (!config.tts.coquiUrl) {
        console.log('Coqui: COQUI_TUNNEL_URL tanımlı değil');
      } else {
        const health = await testCoquiConnection(config.tts.coquiUrl);
        console.log(`Coqui: ${health.ok ? 'erişilebilir' : 'erişilemiyor'} (gpu: ${health.gpu}, model: ${health.modelLoaded})`);
      }
    }
  });
