import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { pcmToWav } from '@/lib/audio';
import { SynthesisError } from '@/lib/errors';
import { TTSFallbackChain, type TTSProvider } from '@/services/tts-router.service';
import type { TTSProviderName, TTSQuality } from '@/types/voice.types';
import { testRegistry } from '../helpers/fixtures';

type SynthesizeFn = (text: string, voice: string, signal?: AbortSignal) => Promise<Buffer>;

function fakeProvider(
  name: TTSProviderName,
  synthesize: SynthesizeFn,
  configured = true
): TTSProvider & { synthesize: jest.Mock<SynthesizeFn> } {
  const quality: TTSQuality = name === 'elevenlabs' ? 'very_high' : name === 'google_cloud' ? 'high' : 'basic';
  return {
    name,
    quality,
    isConfigured: () => configured,
    synthesize: jest.fn<SynthesizeFn>(synthesize)
  };
}

// 1 saniyelik 16 kHz mono 16-bit ses
const oneSecond = () => pcmToWav(Buffer.alloc(32000), 16000);
const failing = (message: string): SynthesizeFn => async () => {
  throw new Error(message);
};

describe('TTSFallbackChain', () => {
  let outputDir: string;
  let outputPath: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tts-chain-test-'));
    outputPath = path.join(outputDir, 'audio', 'agent', '0001_01.wav');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('should use the primary provider and measure the written file', async () => {
    const elevenlabs = fakeProvider('elevenlabs', async () => oneSecond());
    const chain = new TTSFallbackChain({ registry: testRegistry, providers: [elevenlabs] });

    const result = await chain.synthesize('Merhaba, size nasıl yardımcı olabilirim?', 'agent_male_001', outputPath);

    expect(elevenlabs.synthesize).toHaveBeenCalledWith(
      'Merhaba, size nasıl yardımcı olabilirim?',
      'el-agent-male',
      undefined
    );
    expect(result).toEqual({
      provider: 'elevenlabs',
      filePath: outputPath,
      durationSeconds: 1,
      durationEstimated: false,
      sampleRate: 16000,
      channels: 1,
      fileSize: 32044,
      attempts: [{ provider: 'elevenlabs', voice: 'el-agent-male', success: true }]
    });
    expect((await fs.stat(outputPath)).size).toBe(32044);
  });

  it('should fall back to the next provider when one fails', async () => {
    const elevenlabs = fakeProvider('elevenlabs', failing('ElevenLabs hatası (status: 500)'));
    const google = fakeProvider('google_cloud', async () => oneSecond());
    const chain = new TTSFallbackChain({ registry: testRegistry, providers: [elevenlabs, google] });

    const result = await chain.synthesize('Faturamda bir hata var.', 'user_female_001', outputPath);

    expect(result.provider).toBe('google_cloud');
    expect(google.synthesize).toHaveBeenCalledWith('Faturamda bir hata var.', 'tr-TR-Wavenet-C', undefined);
    expect(result.attempts).toEqual([
      { provider: 'elevenlabs', voice: 'el-user-female', success: false, error: 'ElevenLabs hatası (status: 500)' },
      { provider: 'google_cloud', voice: 'tr-TR-Wavenet-C', success: true }
    ]);
  });

  it('should skip providers that are not configured', async () => {
    const elevenlabs = fakeProvider('elevenlabs', async () => oneSecond(), false);
    const google = fakeProvider('google_cloud', async () => oneSecond());
    const chain = new TTSFallbackChain({ registry: testRegistry, providers: [elevenlabs, google] });

    const result = await chain.synthesize('Tabii, hemen bakıyorum.', 'agent_male_001', outputPath);

    expect(elevenlabs.synthesize).not.toHaveBeenCalled();
    expect(result.attempts[0]).toEqual({
      provider: 'elevenlabs',
      voice: 'el-agent-male',
      success: false,
      skipped: true
    });
    expect(result.provider).toBe('google_cloud');
  });

  it('should use the baseline voice matching the speaker gender', async () => {
    const coqui = fakeProvider('coqui', async () => oneSecond());
    const chain = new TTSFallbackChain({ registry: testRegistry, providers: [coqui] });

    const result = await chain.synthesize('İyi günler dilerim.', 'agent_female_001', outputPath);

    expect(result.provider).toBe('coqui');
    expect(coqui.synthesize).toHaveBeenCalledWith('İyi günler dilerim.', 'tr_female_reference', undefined);
  });

  it('should not use the baseline provider when it is disabled', async () => {
    const elevenlabs = fakeProvider('elevenlabs', failing('kota doldu'));
    const coqui = fakeProvider('coqui', async () => oneSecond());
    const chain = new TTSFallbackChain({
      registry: testRegistry,
      providers: [elevenlabs, coqui],
      allowBaselineFallback: false
    });

    const promise = chain.synthesize('Teşekkür ederim.', 'user_male_001', outputPath);

    await expect(promise).rejects.toBeInstanceOf(SynthesisError);
    await expect(promise).rejects.toThrow(
      'Tüm TTS sağlayıcıları başarısız (elevenlabs: kota doldu; google_cloud: yapılandırılmamış)'
    );
    expect(coqui.synthesize).not.toHaveBeenCalled();
    await expect(fs.access(outputPath)).rejects.toThrow();
  });

  it('should treat empty audio as a failure', async () => {
    const elevenlabs = fakeProvider('elevenlabs', async () => Buffer.alloc(0));
    const google = fakeProvider('google_cloud', async () => oneSecond());
    const chain = new TTSFallbackChain({ registry: testRegistry, providers: [elevenlabs, google] });

    const result = await chain.synthesize('Bir dakika lütfen.', 'agent_male_001', outputPath);

    expect(result.attempts[0]).toMatchObject({ provider: 'elevenlabs', success: false, error: 'Boş ses verisi' });
    expect(result.provider).toBe('google_cloud');
  });

  it('should estimate the duration when the audio has no WAV header', async () => {
    const coqui = fakeProvider('coqui', async () => Buffer.from('ham ses verisi'));
    const chain = new TTSFallbackChain({ registry: testRegistry, providers: [coqui] });
    const text = 'a'.repeat(25);

    const result = await chain.synthesize(text, 'agent_male_001', outputPath);

    expect(result.durationEstimated).toBe(true);
    expect(result.durationSeconds).toBe(2);
    expect(result.sampleRate).toBe(16000);
    expect(result.channels).toBe(1);
  });

  it('should use the role default for an unknown speaker', async () => {
    const elevenlabs = fakeProvider('elevenlabs', async () => oneSecond());
    const chain = new TTSFallbackChain({ registry: testRegistry, providers: [elevenlabs] });

    await chain.synthesize('Merhaba.', 'user_bilinmeyen_009', outputPath);
    await chain.synthesize('Merhaba.', 'ajan_x', outputPath);

    expect(elevenlabs.synthesize.mock.calls.map(call => call[1])).toEqual(['el-user-female', 'el-agent-male']);
  });

  it('should stop the chain when the request is cancelled', async () => {
    const controller = new AbortController();
    const abortError = new Error('İstek iptal edildi');
    const elevenlabs = fakeProvider('elevenlabs', async () => {
      controller.abort();
      throw abortError;
    });
    const google = fakeProvider('google_cloud', async () => oneSecond());
    const chain = new TTSFallbackChain({ registry: testRegistry, providers: [elevenlabs, google] });

    await expect(chain.synthesize('Merhaba.', 'agent_male_001', outputPath, controller.signal)).rejects.toBe(abortError);
    expect(google.synthesize).not.toHaveBeenCalled();
  });

  it('should remove a partly written file when saving the audio fails', async () => {
    const elevenlabs = fakeProvider('elevenlabs', async () => oneSecond());
    const chain = new TTSFallbackChain({ registry: testRegistry, providers: [elevenlabs] });

    const realWriteFile = fs.writeFile;
    jest.spyOn(fs, 'writeFile').mockImplementation(async file => {
      await realWriteFile(file, Buffer.alloc(100));
      throw new Error('disk dolu');
    });

    await expect(chain.synthesize('Merhaba.', 'agent_male_001', outputPath)).rejects.toThrow('disk dolu');
    await expect(fs.stat(outputPath)).rejects.toThrow();
  });
});
