import { describe, it, expect } from 'vitest';
import { encodeWav, toPcm16 } from './wav';

describe('encodeWav', () => {
  const wav = encodeWav(Float32Array.from([0, 0.5, -1, 1]), 16000);

  it('should write a RIFF/WAVE header for 16-bit mono', () => {
    expect(wav.length).toBe(44 + 8);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.readUInt32LE(4)).toBe(36 + 8);
    expect(wav.toString('ascii', 8, 16)).toBe('WAVEfmt ');
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(28)).toBe(32000);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString('ascii', 36, 40)).toBe('data');
    expect(wav.readUInt32LE(40)).toBe(8);
  });

  it('should convert samples back to Int16 with clamping', () => {
    expect([0, 1, 2, 3].map((i) => wav.readInt16LE(44 + i * 2))).toEqual([0, 16384, -32768, 32767]);
  });
});

describe('toPcm16', () => {
  it('should return only the sample bytes', () => {
    const pcm = toPcm16(Float32Array.from([0.25]));
    expect(pcm.length).toBe(2);
    expect(pcm.readInt16LE(0)).toBe(8192);
  });
});
