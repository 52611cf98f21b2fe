import { describe, expect, it, vi } from 'vitest';
import type { ClosedSegment } from '@scribeloop/shared-types';
import { TranscriptionEngineError } from '../errors.js';
import type { TranscriptionEngine } from './engines/transcription-engine.js';
import { TranscriptionDispatcher, normalizeSamples } from './transcription-dispatcher.js';

function segment(samples: number[]): ClosedSegment {
  return {
    samples: Int16Array.from(samples),
    sampleRate: 16000,
    closure: 'natural',
    startSample: 0,
    endSample: samples.length,
    durationSeconds: samples.length / 16000,
    frameCount: 1,
    speechFrameCount: 1,
  };
}

function engineReturning(result: string[] | Error) {
  const transcribe = vi.fn<TranscriptionEngine['transcribe']>(async () => {
    if (result instanceof Error) throw result;
    return result;
  });
  return { name: 'fake', transcribe } satisfies TranscriptionEngine;
}

const options = { language: 'en', filterHallucinations: false };

describe('normalizeSamples', () => {
  it('should divide by 32768', () => {
    expect(Array.from(normalizeSamples(Int16Array.from([0, 16384, -32768, 32767])))).toEqual([
      0,
      0.5,
      -1,
      Math.fround(32767 / 32768),
    ]);
  });
});

describe('TranscriptionDispatcher', () => {
  it('should pass normalized samples, rate and language to the engine', async () => {
    const engine = engineReturning(['hi']);
    const dispatcher = new TranscriptionDispatcher(engine, { ...options, language: 'fr' });

    await dispatcher.dispatch(segment([16384, -16384]));

    const [samples, rate, language] = engine.transcribe.mock.calls[0];
    expect(Array.from(samples)).toEqual([0.5, -0.5]);
    expect(rate).toBe(16000);
    expect(language).toBe('fr');
  });

  it('should join fragments with single spaces and trim', async () => {
    const dispatcher = new TranscriptionDispatcher(engineReturning([' hello', 'world ']), options);
    expect(await dispatcher.dispatch(segment([1, 2]))).toBe('hello world');
  });

  it('should return null for an empty fragment list', async () => {
    const dispatcher = new TranscriptionDispatcher(engineReturning([]), options);
    expect(await dispatcher.dispatch(segment([0, 0]))).toBeNull();
  });

  it('should return null for whitespace-only results', async () => {
    const dispatcher = new TranscriptionDispatcher(engineReturning(['  ', '\n']), options);
    expect(await dispatcher.dispatch(segment([0, 0]))).toBeNull();
  });

  it('should wrap engine failures with the engine name', async () => {
    const dispatcher = new TranscriptionDispatcher(engineReturning(new Error('model crashed')), options);

    const error = await dispatcher.dispatch(segment([1])).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TranscriptionEngineError);
    expect(error).toMatchObject({
      engine: 'fake',
      code: 'TRANSCRIPTION_ENGINE',
      message: 'Transcription failed (fake): model crashed',
    });
  });

  it('should drop hallucinations only when filtering is enabled', async () => {
    const unfiltered = new TranscriptionDispatcher(engineReturning(['[BLANK_AUDIO]']), options);
    const filtered = new TranscriptionDispatcher(engineReturning(['[BLANK_AUDIO]']), {
      ...options,
      filterHallucinations: true,
    });

    expect(await unfiltered.dispatch(segment([1]))).toBe('[BLANK_AUDIO]');
    expect(await filtered.dispatch(segment([1]))).toBeNull();
  });
});
