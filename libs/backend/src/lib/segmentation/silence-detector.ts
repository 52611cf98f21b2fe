import type { Frame } from '@scribeloop/shared-types';

const MAX_INT16 = 32767;

/** Largest absolute sample value; -32768 is reported as 32768 */
export function peakAmplitude(samples: Int16Array): number {
  let peak = 0;
  for (let i = 0; i < samples.length; i++) {
    const magnitude = Math.abs(samples[i]);
    if (magnitude > peak) peak = magnitude;
  }
  return peak;
}

export function isSilent(frame: Frame, threshold: number): boolean {
  return peakAmplitude(frame.samples) < threshold;
}

/**
 * Threshold after listening to ambient noise: the ambient peak scaled by
 * `margin`, never below the configured floor nor above the Int16 range.
 */
export function calibrateThreshold(ambientPeak: number, floor: number, margin: number): number {
  return Math.min(MAX_INT16, Math.max(floor, Math.ceil(ambientPeak * margin)));
}
