import type { ScribeloopConfig, SegmentationConfig } from '@scribeloop/shared-types';
import { InvalidConfigError } from '../errors.js';

const MAX_INT16 = 32767;

export function assertValidSegmentationConfig(config: SegmentationConfig): void {
  const { silenceThreshold, silenceFramesToClose, minSegmentSeconds, maxSegmentSeconds } = config;

  if (!(silenceThreshold >= 0 && silenceThreshold <= MAX_INT16)) {
    throw new InvalidConfigError(`silenceThreshold must be within [0, ${MAX_INT16}]`);
  }
  if (!Number.isInteger(silenceFramesToClose) || silenceFramesToClose < 1) {
    throw new InvalidConfigError('silenceFramesToClose must be a positive integer');
  }
  if (!(minSegmentSeconds >= 0)) {
    throw new InvalidConfigError('minSegmentSeconds must not be negative');
  }
  if (!(maxSegmentSeconds > 0)) {
    throw new InvalidConfigError('maxSegmentSeconds must be positive');
  }
  // A forced closure must never happen before a natural one is allowed
  if (maxSegmentSeconds < minSegmentSeconds) {
    throw new InvalidConfigError('maxSegmentSeconds must be greater than or equal to minSegmentSeconds');
  }
}

export function assertValidConfig(config: ScribeloopConfig): void {
  const { audio, segmentation, engine } = config;

  for (const [name, value] of [
    ['audio.sampleRate', audio.sampleRate],
    ['audio.frameSize', audio.frameSize],
    ['audio.maxQueuedFrames', audio.maxQueuedFrames],
  ] as const) {
    if (!Number.isInteger(value) || value < 1) {
      throw new InvalidConfigError(`${name} must be a positive integer`);
    }
  }
  if (audio.deviceIndex !== null && (!Number.isInteger(audio.deviceIndex) || audio.deviceIndex < 0)) {
    throw new InvalidConfigError('audio.deviceIndex must be a non-negative integer or null');
  }
  if (!(audio.openTimeoutMs > 0)) {
    throw new InvalidConfigError('audio.openTimeoutMs must be positive');
  }

  assertValidSegmentationConfig(segmentation);
  if (!(segmentation.calibrationSeconds >= 0)) {
    throw new InvalidConfigError('segmentation.calibrationSeconds must not be negative');
  }
  if (!(segmentation.calibrationMargin >= 1)) {
    throw new InvalidConfigError('segmentation.calibrationMargin must be at least 1');
  }

  if (!(engine.timeoutMs > 0)) {
    throw new InvalidConfigError('engine.timeoutMs must be positive');
  }
}
