// sherpa-onnx-node ships no type declarations; only the API used here is declared.
declare module 'sherpa-onnx-node' {
  export interface OfflineRecognizerConfig {
    featConfig: { sampleRate: number; featureDim: number };
    modelConfig: {
      whisper: {
        encoder: string;
        decoder: string;
        language: string;
        task: 'transcribe' | 'translate';
      };
      tokens: string;
      numThreads: number;
      debug: number;
      provider: 'cpu' | 'cuda' | 'coreml';
    };
  }

  export class OfflineStream {
    acceptWaveform(obj: { samples: Float32Array; sampleRate: number }): void;
  }

  export class OfflineRecognizer {
    constructor(config: OfflineRecognizerConfig);
    createStream(): OfflineStream;
    decode(stream: OfflineStream): void;
    decodeAsync(stream: OfflineStream): Promise<unknown>;
    getResult(stream: OfflineStream): { text?: string; tokens?: string[]; timestamps?: number[] };
  }

  export const version: string;
}
