/**
 * Turns normalized mono samples into text fragments. An engine that heard
 * nothing intelligible resolves an empty list; only real failures reject.
 */
export interface TranscriptionEngine {
  readonly name: string;
  transcribe(samples: Float32Array, sampleRate: number, language: string): Promise<string[]>;
}
