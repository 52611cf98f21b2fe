import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { OfflineRecognizer, OfflineStream } from 'sherpa-onnx-node';
import { SherpaOnnxEngine, findWhisperModel, type RecognizerLoader } from './sherpa-onnx.engine.js';

const model = { encoder: '/models/tiny-encoder.onnx', decoder: '/models/tiny-decoder.onnx', tokens: '/models/tiny-tokens.txt' };

function fakeRecognizer(text: string | undefined) {
  const stream: OfflineStream = { acceptWaveform: vi.fn() };
  const recognizer: OfflineRecognizer = {
    createStream: () => stream,
    decode: vi.fn(),
    decodeAsync: vi.fn(async () => undefined),
    getResult: () => ({ text }),
  };
  return { recognizer, stream };
}

describe('SherpaOnnxEngine', () => {
  it('should decode the samples and return the trimmed text', async () => {
    const { recognizer, stream } = fakeRecognizer('  hello there ');
    const load = vi.fn<RecognizerLoader>(async () => recognizer);
    const engine = new SherpaOnnxEngine(model, load);
    const samples = Float32Array.from([0.1, -0.2]);

    expect(await engine.transcribe(samples, 16000, 'en')).toEqual(['hello there']);
    expect(stream.acceptWaveform).toHaveBeenCalledWith({ samples, sampleRate: 16000 });
    expect(recognizer.decodeAsync).toHaveBeenCalledWith(stream);
    expect(load).toHaveBeenCalledWith({
      featConfig: { sampleRate: 16000, featureDim: 80 },
      modelConfig: {
        whisper: { encoder: model.encoder, decoder: model.decoder, language: 'en', task: 'transcribe' },
        tokens: model.tokens,
        numThreads: 2,
        debug: 0,
        provider: 'cpu',
      },
    });
  });

  it('should return nothing for blank text', async () => {
    const engine = new SherpaOnnxEngine(model, async () => fakeRecognizer('   ').recognizer);

    expect(await engine.transcribe(Float32Array.from([0.1]), 16000, 'en')).toEqual([]);
  });

  it('should skip empty input without loading a recognizer', async () => {
    const load = vi.fn<RecognizerLoader>();
    const engine = new SherpaOnnxEngine(model, load);

    expect(await engine.transcribe(new Float32Array(0), 16000, 'en')).toEqual([]);
    expect(load).not.toHaveBeenCalled();
  });

  it('should keep one recognizer per language', async () => {
    const load = vi.fn<RecognizerLoader>(async () => fakeRecognizer('ok').recognizer);
    const engine = new SherpaOnnxEngine(model, load);
    const samples = Float32Array.from([0.1]);

    await engine.transcribe(samples, 16000, 'en');
    await engine.transcribe(samples, 16000, 'en');
    await engine.transcribe(samples, 16000, 'fr');

    expect(load).toHaveBeenCalledTimes(2);
    expect(load.mock.calls.map(([config]) => config.modelConfig.whisper.language)).toEqual(['en', 'fr']);
  });

  it('should retry a recognizer that failed to load', async () => {
    const load = vi
      .fn<RecognizerLoader>()
      .mockRejectedValueOnce(new Error('Cannot find module sherpa-onnx-node'))
      .mockResolvedValueOnce(fakeRecognizer('second try').recognizer);
    const engine = new SherpaOnnxEngine(model, load);
    const samples = Float32Array.from([0.1]);

    await expect(engine.transcribe(samples, 16000, 'en')).rejects.toThrow('Cannot find module sherpa-onnx-node');
    expect(await engine.transcribe(samples, 16000, 'en')).toEqual(['second try']);
    expect(load).toHaveBeenCalledTimes(2);
  });
});

describe('findWhisperModel', () => {
  let dir = '';

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
  });

  it('should prefer int8 exports', () => {
    dir = mkdtempSync(join(tmpdir(), 'scribeloop-model-'));
    for (const name of [
      'small-decoder.onnx',
      'small-decoder.int8.onnx',
      'small-encoder.onnx',
      'small-encoder.int8.onnx',
      'small-tokens.txt',
    ]) {
      writeFileSync(join(dir, name), '');
    }

    expect(findWhisperModel(dir)).toEqual({
      encoder: join(dir, 'small-encoder.int8.onnx'),
      decoder: join(dir, 'small-decoder.int8.onnx'),
      tokens: join(dir, 'small-tokens.txt'),
    });
  });

  it('should return null when a file is missing or the directory does not exist', () => {
    dir = mkdtempSync(join(tmpdir(), 'scribeloop-model-'));
    writeFileSync(join(dir, 'small-encoder.onnx'), '');

    expect(findWhisperModel(dir)).toBeNull();
    expect(findWhisperModel(join(dir, 'absent'))).toBeNull();
  });
});
