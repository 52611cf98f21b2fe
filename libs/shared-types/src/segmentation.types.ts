export type ClosureKind = 'natural' | 'forced' | 'flush';

export interface SegmentationConfig {
  /** Peak amplitude below which a frame counts as silence */
  silenceThreshold: number;
  /** Consecutive silent frames required to close a segment early */
  silenceFramesToClose: number;
  /** Accumulated duration a segment must exceed before a silence closure is honored */
  minSegmentSeconds: number;
  /** Hard cap forcing closure regardless of silence */
  maxSegmentSeconds: number;
}

export interface ClosedSegment {
  readonly samples: Int16Array;
  readonly sampleRate: number;
  readonly closure: ClosureKind;
  /** Absolute position of the first sample since the accumulator was created */
  readonly startSample: number;
  /** Position just past the last sample, including audio skipped while the segment was open */
  readonly endSample: number;
  readonly durationSeconds: number;
  readonly frameCount: number;
  readonly speechFrameCount: number;
}
