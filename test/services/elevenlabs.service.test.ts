import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { ElevenLabsError as SdkError } from '@elevenlabs/elevenlabs-js';
import { parseWavHeader } from '@/lib/audio';
import { ElevenLabsError } from '@/lib/errors';
import { ElevenLabsTTSProvider } from '@/services/elevenlabs.service';

const mockConvert = jest.fn<(...args: unknown[]) => Promise<ReadableStream<Uint8Array>>>();

jest.mock('@elevenlabs/elevenlabs-js', () => ({
  ElevenLabsClient: class {
    textToSpeech = { convert: (...args: unknown[]) => mockConvert(...args) };
  },
  ElevenLabsError: class extends Error {
    statusCode?: number;
    constructor(options: { message?: string; statusCode?: number }) {
      super(options.message);
      this.statusCode = options.statusCode;
    }
  }
}));

function pcmStream(...chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(chunk);
      controller.close();
    }
  });
}

describe('ElevenLabsTTSProvider', () => {
  beforeEach(() => {
    mockConvert.mockReset();
  });

  it('should only be configured with an API key', () => {
    expect(new ElevenLabsTTSProvider({}).isConfigured()).toBe(false);
    expect(new ElevenLabsTTSProvider({ apiKey: 'test-secret' }).isConfigured()).toBe(true);
  });

  it('should wrap the PCM stream into a 16 kHz WAV file', async () => {
    mockConvert.mockImplementation(async () => pcmStream(new Uint8Array(16000), new Uint8Array(16000)));
    const provider = new ElevenLabsTTSProvider({ apiKey: 'test-secret', modelId: 'eleven_test' });

    const audio = await provider.synthesize('Merhaba.', 'el-agent-male');

    expect(audio.length).toBe(32044);
    expect(parseWavHeader(audio)).toMatchObject({ sampleRate: 16000, numChannels: 1, bitsPerSample: 16 });
    expect(mockConvert).toHaveBeenCalledWith(
      'el-agent-male',
      expect.objectContaining({ text: 'Merhaba.', modelId: 'eleven_test', outputFormat: 'pcm_16000' }),
      { abortSignal: undefined }
    );
  });

  it('should convert API errors and not retry client errors', async () => {
    mockConvert.mockImplementation(async () => {
      throw new SdkError({ message: 'kota aşıldı', statusCode: 401 });
    });
    const provider = new ElevenLabsTTSProvider({ apiKey: 'test-secret' });

    const promise = provider.synthesize('Merhaba.', 'el-agent-male');

    await expect(promise).rejects.toBeInstanceOf(ElevenLabsError);
    await expect(promise).rejects.toThrow('ElevenLabs API hatası (status: 401): kota aşıldı');
    expect(mockConvert).toHaveBeenCalledTimes(1);
  });

  it('should reject empty audio', async () => {
    mockConvert.mockImplementation(async () => pcmStream());
    const provider = new ElevenLabsTTSProvider({ apiKey: 'test-secret' });

    await expect(provider.synthesize('Merhaba.', 'el-agent-male')).rejects.toThrow('ElevenLabs boş ses döndürdü');
  });

  it('should fail without an API key', async () => {
    await expect(new ElevenLabsTTSProvider({}).synthesize('Merhaba.', 'el-agent-male')).rejects.toThrow(
      'ElevenLabs API Key tanımlanmamış (ELEVENLABS_API_KEY)'
    );
  });
});
