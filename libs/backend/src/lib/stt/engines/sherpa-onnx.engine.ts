import { existsSync, readdirSync } from 'fs';
import { join } from 'path';
import type { OfflineRecognizer, OfflineRecognizerConfig } from 'sherpa-onnx-node';
import type { TranscriptionEngine } from './transcription-engine.js';

export interface WhisperModelFiles {
  encoder: string;
  decoder: string;
  tokens: string;
}

/**
 * Locates a sherpa-onnx Whisper export inside `dir`
 * (e.g. `small-encoder.int8.onnx`, `small-decoder.int8.onnx`, `small-tokens.txt`).
 */
export function findWhisperModel(dir: string): WhisperModelFiles | null {
  if (!existsSync(dir)) return null;
  const files = readdirSync(dir).sort();
  // Prefer int8 exports when both precisions are present
  const pick = (part: string, ext: string): string | undefined =>
    files.find((f) => f.includes(part) && f.includes('int8') && f.endsWith(ext)) ??
    files.find((f) => f.includes(part) && f.endsWith(ext));

  const encoder = pick('encoder', '.onnx');
  const decoder = pick('decoder', '.onnx');
  const tokens = pick('tokens', '.txt');
  if (!encoder || !decoder || !tokens) return null;
  return { encoder: join(dir, encoder), decoder: join(dir, decoder), tokens: join(dir, tokens) };
}

/** Builds a recognizer; swapped out in tests */
export type RecognizerLoader = (config: OfflineRecognizerConfig) => Promise<OfflineRecognizer>;

const loadRecognizer: RecognizerLoader = async (config) => {
  const sherpaOnnx = await import('sherpa-onnx-node');
  return new sherpaOnnx.OfflineRecognizer(config);
};

/**
 * In-process Whisper through sherpa-onnx. The native module is loaded on first
 * use, and one recognizer is kept per language since Whisper's language is
 * fixed at construction.
 */
export class SherpaOnnxEngine implements TranscriptionEngine {
  readonly name = 'sherpa-onnx';
  private readonly recognizers = new Map<string, Promise<OfflineRecognizer>>();

  constructor(
    private readonly model: WhisperModelFiles,
    private readonly load: RecognizerLoader = loadRecognizer,
  ) {}

  async transcribe(samples: Float32Array, sampleRate: number, language: string): Promise<string[]> {
    if (samples.length === 0) return [];

    const recognizer = await this.recognizerFor(language);
    const stream = recognizer.createStream();
    stream.acceptWaveform({ samples, sampleRate });
    await recognizer.decodeAsync(stream);

    const text = recognizer.getResult(stream).text?.trim();
    return text ? [text] : [];
  }

  private recognizerFor(language: string): Promise<OfflineRecognizer> {
    let recognizer = this.recognizers.get(language);
    if (!recognizer) {
      recognizer = this.createRecognizer(language);
      // Do not cache a failed load
      recognizer.catch(() => this.recognizers.delete(language));
      this.recognizers.set(language, recognizer);
    }
    return recognizer;
  }

  private createRecognizer(language: string): Promise<OfflineRecognizer> {
    return this.load({
      featConfig: { sampleRate: 16000, featureDim: 80 },
      modelConfig: {
        whisper: {
          encoder: this.model.encoder,
          decoder: this.model.decoder,
          language,
          task: 'transcribe',
        },
        tokens: this.model.tokens,
        numThreads: 2,
        debug: 0,
        provider: 'cpu',
      },
    });
  }
}
