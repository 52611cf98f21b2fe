const HEADER_SIZE = 44;

/** 16-bit PCM mono WAV, for engines that only take files */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  const dataSize = samples.length * 2;
  const buf = Buffer.alloc(HEADER_SIZE + dataSize);

  buf.write('RIFF', 0, 'ascii');
  buf.writeUInt32LE(36 + dataSize, 4);
  buf.write('WAVE', 8, 'ascii');
  buf.write('fmt ', 12, 'ascii');
  buf.writeUInt32LE(16, 16);
  buf.writeUInt16LE(1, 20); // PCM
  buf.writeUInt16LE(1, 22); // mono
  buf.writeUInt32LE(sampleRate, 24);
  buf.writeUInt32LE(sampleRate * 2, 28);
  buf.writeUInt16LE(2, 32);
  buf.writeUInt16LE(16, 34);
  buf.write('data', 36, 'ascii');
  buf.writeUInt32LE(dataSize, 40);

  writePcm16(samples, buf, HEADER_SIZE);
  return buf;
}

/** Raw little-endian Int16 bytes */
export function toPcm16(samples: Float32Array): Buffer {
  const buf = Buffer.alloc(samples.length * 2);
  writePcm16(samples, buf, 0);
  return buf;
}

function writePcm16(samples: Float32Array, buf: Buffer, offset: number): void {
  for (let i = 0; i < samples.length; i++) {
    const value = Math.round(samples[i] * 32768);
    buf.writeInt16LE(Math.max(-32768, Math.min(32767, value)), offset + i * 2);
  }
}
