/**
 * WAV yardımcıları
 * Header okuma/yazma ve süre ölçümü
 */

export interface WavInfo {
  numChannels: number;
  sampleRate: number;
  bitsPerSample: number;
  byteRate: number;
  dataOffset: number;
  dataSize: number;
}

const WAV_HEADER_SIZE = 44;

/**
 * WAV header'dan sample rate, kanal ve data bilgisini oku.
 * RIFF/WAVE değilse null döner.
 */
export function parseWavHeader(buffer: Buffer): WavInfo | null {
  if (buffer.length < WAV_HEADER_SIZE) return null;
  if (buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') {
    return null;
  }

  let offset = 12;
  let format: Omit<WavInfo, 'dataOffset' | 'dataSize'> | null = null;

  // Chunk'ları sırayla tara (fmt ve data arasında LIST vb. olabilir)
  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === 'fmt ' && body + 16 <= buffer.length) {
      format = {
        numChannels: buffer.readUInt16LE(body + 2),
        sampleRate: buffer.readUInt32LE(body + 4),
        byteRate: buffer.readUInt32LE(body + 8),
        bitsPerSample: buffer.readUInt16LE(body + 14)
      };
    } else if (chunkId === 'data') {
      if (!format) return null;
      return {
        ...format,
        dataOffset: body,
        dataSize: Math.min(chunkSize, buffer.length - body)
      };
    }

    // Chunk'lar çift byte sınırına hizalı
    offset = body + chunkSize + (chunkSize % 2);
  }

  return null;
}

/**
 * Ham PCM verisine 44 byte WAV header ekle
 */
export function pcmToWav(
  pcm: Buffer,
  sampleRate: number,
  numChannels: number = 1,
  bitsPerSample: number = 16
): Buffer {
  const blockAlign = numChannels * (bitsPerSample / 8);
  const byteRate = sampleRate * blockAlign;
  const header = Buffer.alloc(WAV_HEADER_SIZE);

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcm.length, 4);      // ChunkSize
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);                  // Subchunk1Size (PCM)
  header.writeUInt16LE(1, 20);                   // AudioFormat = PCM
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcm.length, 40);          // Subchunk2Size

  return Buffer.concat([header, pcm]);
}

/**
 * WAV data boyutundan gerçek süreyi hesapla (saniye)
 */
export function measureWavDuration(info: WavInfo): number {
  if (info.byteRate <= 0) return 0;
  return Math.round((info.dataSize / info.byteRate) * 1000) / 1000;
}

/**
 * Metin uzunluğundan süre tahmini.
 * Yaklaşıktır; yalnızca sağlayıcı ölçülebilir ses döndürmediğinde kullanılır.
 */
export function estimateDurationFromText(text: string, secondsPerChar: number): number {
  return Math.round(text.length * secondsPerChar * 100) / 100;
}
