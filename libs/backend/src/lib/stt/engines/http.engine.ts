import { request, type Dispatcher } from 'undici';
import type { TranscriptionEngine } from './transcription-engine.js';
import { toPcm16 } from './wav.js';

export interface HttpEngineOptions {
  endpoint: string;
  timeoutMs: number;
  /** Alternate undici dispatcher, e.g. a proxy agent */
  dispatcher?: Dispatcher;
}

/**
 * Posts base64 PCM to a transcription endpoint. The response carries either
 * `segments: [{ text }]` or a single `text`.
 */
export class HttpEngine implements TranscriptionEngine {
  readonly name = 'http';

  constructor(private readonly options: HttpEngineOptions) {}

  async transcribe(samples: Float32Array, sampleRate: number, language: string): Promise<string[]> {
    if (samples.length === 0) return [];

    const res = await request(this.options.endpoint, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({
        audioBase64: toPcm16(samples).toString('base64'),
        sampleRateHz: sampleRate,
        channels: 1,
        language,
      }),
      headersTimeout: this.options.timeoutMs,
      bodyTimeout: this.options.timeoutMs,
      dispatcher: this.options.dispatcher,
    });

    if (res.statusCode < 200 || res.statusCode >= 300) {
      await res.body.dump();
      throw new Error(`HTTP STT failed (${res.statusCode})`);
    }

    return fragmentsOf(await res.body.json());
  }
}

function fragmentsOf(payload: unknown): string[] {
  if (typeof payload !== 'object' || payload === null) {
    throw new Error('HTTP STT returned a malformed response');
  }
  if ('segments' in payload && Array.isArray(payload.segments)) {
    return payload.segments.flatMap((segment: unknown) =>
      typeof segment === 'object' && segment !== null && 'text' in segment && typeof segment.text === 'string'
        ? [segment.text]
        : [],
    );
  }
  if ('text' in payload && typeof payload.text === 'string') {
    return [payload.text];
  }
  return [];
}
