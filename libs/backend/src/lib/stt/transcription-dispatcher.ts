import { Logger } from '@nestjs/common';
import type { ClosedSegment } from '@scribeloop/shared-types';
import { TranscriptionEngineError } from '../errors.js';
import type { TranscriptionEngine } from './engines/transcription-engine.js';
import { isHallucination } from './hallucination-filter.js';

export interface DispatcherOptions {
  language: string;
  filterHallucinations: boolean;
}

/** Int16 PCM to Float32 in [-1, 1) */
export function normalizeSamples(samples: Int16Array): Float32Array {
  const out = new Float32Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    out[i] = samples[i] / 32768;
  }
  return out;
}

/**
 * Turns a closed segment into text. Returns `null` when the engine understood
 * nothing; engine failures surface as `TranscriptionEngineError`.
 */
export class TranscriptionDispatcher {
  private readonly logger = new Logger(TranscriptionDispatcher.name);

  constructor(
    private readonly engine: TranscriptionEngine,
    private readonly options: DispatcherOptions,
  ) {}

  get engineName(): string {
    return this.engine.name;
  }

  async dispatch(segment: ClosedSegment): Promise<string | null> {
    let fragments: string[];
    try {
      fragments = await this.engine.transcribe(
        normalizeSamples(segment.samples),
        segment.sampleRate,
        this.options.language,
      );
    } catch (err) {
      throw new TranscriptionEngineError(this.engine.name, err);
    }

    const text = fragments.join(' ').trim();
    if (!text) return null;

    if (this.options.filterHallucinations && isHallucination(text)) {
      this.logger.debug(`Discarded likely hallucination: "${text}"`);
      return null;
    }
    return text;
  }
}
