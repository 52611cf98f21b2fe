import type { ClosureKind } from './segmentation.types.js';

export interface TranscriptLine {
  /** Ordinal in closure order, 0-based, never reused within a session */
  readonly index: number;
  readonly text: string;
  readonly startTimeMs: number;
  readonly endTimeMs: number;
  readonly closure: ClosureKind;
}
