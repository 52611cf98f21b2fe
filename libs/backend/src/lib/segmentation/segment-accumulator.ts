import type {
  ClosedSegment,
  ClosureKind,
  Frame,
  SegmentationConfig,
} from '@scribeloop/shared-types';
import { assertValidSegmentationConfig } from '../config/config-validation.js';
import { isSilent } from './silence-detector.js';

export interface AppendResult {
  silent: boolean;
  closed: ClosedSegment | null;
}

/**
 * Buffers frames until a segment closes, either on a long enough silence run
 * once the minimum duration has passed, or when the hard duration cap is
 * exceeded. Owned by a single capture loop; not safe to share.
 */
export class SegmentAccumulator {
  private readonly config: SegmentationConfig;
  private frames: Frame[] = [];
  private bufferedSamples = 0;
  private speechFrames = 0;
  private silentRun = 0;
  /** Absolute position of the next incoming sample */
  private position = 0;
  private bufferStart = 0;
  private sampleRate = 0;

  constructor(config: SegmentationConfig) {
    assertValidSegmentationConfig(config);
    this.config = { ...config };
  }

  get threshold(): number {
    return this.config.silenceThreshold;
  }

  /** Used after ambient calibration; affects frames appended from now on */
  setThreshold(threshold: number): void {
    assertValidSegmentationConfig({ ...this.config, silenceThreshold: threshold });
    this.config.silenceThreshold = threshold;
  }

  get consecutiveSilentFrames(): number {
    return this.silentRun;
  }

  get totalDurationSeconds(): number {
    return this.sampleRate > 0 ? this.bufferedSamples / this.sampleRate : 0;
  }

  get frameCount(): number {
    return this.frames.length;
  }

  append(frame: Frame): AppendResult {
    if (this.sampleRate !== 0 && frame.sampleRate !== this.sampleRate) {
      throw new Error(`Frame sample rate ${frame.sampleRate} does not match ${this.sampleRate}`);
    }
    this.sampleRate = frame.sampleRate;
    if (this.frames.length === 0) this.bufferStart = this.position;
    this.position += frame.samples.length;

    const silent = isSilent(frame, this.config.silenceThreshold);
    this.frames.push(frame);
    this.bufferedSamples += frame.samples.length;
    if (silent) {
      this.silentRun++;
    } else {
      this.silentRun = 0;
      this.speechFrames++;
    }

    return { silent, closed: this.evaluate() };
  }

  /** Emits whatever is buffered, regardless of thresholds */
  flush(): ClosedSegment | null {
    return this.close('flush');
  }

  /** Drops the buffer without emitting it */
  reset(): void {
    this.clearBuffer();
  }

  /** Accounts for audio that was read but never appended (calibration, overflow) */
  skip(sampleCount: number): void {
    this.position += sampleCount;
  }

  private evaluate(): ClosedSegment | null {
    const { silenceFramesToClose, minSegmentSeconds, maxSegmentSeconds } = this.config;
    const duration = this.totalDurationSeconds;

    if (this.silentRun >= silenceFramesToClose && duration > minSegmentSeconds) {
      return this.close('natural');
    }
    if (duration > maxSegmentSeconds) {
      return this.close('forced');
    }
    return null;
  }

  private close(closure: ClosureKind): ClosedSegment | null {
    if (this.frames.length === 0) return null;

    const samples = new Int16Array(this.bufferedSamples);
    let offset = 0;
    for (const frame of this.frames) {
      samples.set(frame.samples, offset);
      offset += frame.samples.length;
    }

    const segment: ClosedSegment = {
      samples,
      sampleRate: this.sampleRate,
      closure,
      startSample: this.bufferStart,
      endSample: this.position,
      durationSeconds: this.totalDurationSeconds,
      frameCount: this.frames.length,
      speechFrameCount: this.speechFrames,
    };

    this.clearBuffer();
    return segment;
  }

  private clearBuffer(): void {
    this.frames = [];
    this.bufferedSamples = 0;
    this.speechFrames = 0;
    this.silentRun = 0;
  }
}
