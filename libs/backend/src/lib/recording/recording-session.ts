import { Logger } from '@nestjs/common';
import {
  BehaviorSubject,
  Subject,
  distinctUntilChanged,
  firstValueFrom,
  map,
  merge,
  of,
  timeout,
  type Observable,
} from 'rxjs';
import type {
  ClosedSegment,
  SessionPhase,
  SessionSegmentationConfig,
  SessionStatus,
  TranscriptLine,
} from '@scribeloop/shared-types';
import type { AudioSource, AudioStream } from '../audio/audio-source.js';
import { assertValidSegmentationConfig } from '../config/config-validation.js';
import { AlreadyRecordingError, describeError } from '../errors.js';
import { SegmentAccumulator } from '../segmentation/segment-accumulator.js';
import { calibrateThreshold, peakAmplitude } from '../segmentation/silence-detector.js';
import type { TranscriptionDispatcher } from '../stt/transcription-dispatcher.js';

export interface RecordingSessionOptions {
  sampleRate: number;
  frameSize: number;
  segmentation: SessionSegmentationConfig;
}

const noop = (): void => undefined;

/**
 * One microphone, one capture loop at a time. Control calls may interleave
 * with the loop at any await; `start` claims the session synchronously so a
 * second caller is rejected before anything is opened.
 */
export class RecordingSession {
  private readonly logger = new Logger(RecordingSession.name);

  private phase: SessionPhase = 'idle';
  private selectedDeviceIndex: number | null = null;
  private startedAt: number | null = null;
  private transcript: TranscriptLine[] = [];
  private nextLineIndex = 0;
  private droppedSegments = 0;
  private overflowCount = 0;
  private lastError: string | null = null;

  private stopRequested = false;
  private stream: AudioStream | null = null;
  /** Settles once the current `start` has either failed or launched the loop */
  private opening: Promise<void> = Promise.resolve();
  private loop: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  private readonly linesSubject = new Subject<TranscriptLine>();
  private readonly statusSubject: BehaviorSubject<SessionStatus>;
  private readonly speakingSubject = new Subject<boolean>();
  private readonly runEnded = new Subject<void>();

  /** Every appended line, once, in closure order */
  readonly lines$: Observable<TranscriptLine> = this.linesSubject.asObservable();
  readonly status$: Observable<SessionStatus>;
  /** Speech/silence transitions of the frames being segmented */
  readonly speaking$: Observable<boolean> = this.speakingSubject.pipe(distinctUntilChanged());

  constructor(
    private readonly source: AudioSource,
    private readonly dispatcher: TranscriptionDispatcher,
    private readonly options: RecordingSessionOptions,
  ) {
    assertValidSegmentationConfig(options.segmentation);
    this.statusSubject = new BehaviorSubject(this.status());
    this.status$ = this.statusSubject.asObservable();
  }

  status(): SessionStatus {
    return {
      isRunning: this.phase !== 'idle',
      selectedDeviceIndex: this.selectedDeviceIndex,
      phase: this.phase,
      startedAt: this.startedAt,
      lineCount: this.transcript.length,
      droppedSegments: this.droppedSegments,
      overflowCount: this.overflowCount,
      lastError: this.lastError,
    };
  }

  readTranscript(): TranscriptLine[] {
    return [...this.transcript];
  }

  /** Empties the transcript; segments still being buffered are unaffected */
  clear(): void {
    this.transcript = [];
    this.emitStatus();
  }

  /**
   * Opens the device and launches the capture loop without waiting for it.
   * Rejects with `AlreadyRecordingError` unless idle, and with
   * `DeviceUnavailableError` when the device cannot be opened.
   */
  async start(deviceIndex: number | null = null): Promise<void> {
    if (this.phase !== 'idle') {
      throw new AlreadyRecordingError();
    }
    this.phase = 'starting';
    this.stopRequested = false;

    const opened = this.open(deviceIndex);
    this.opening = opened.then(noop, noop);
    await opened;
  }

  /** Idempotent; resolves once the loop has exited and the device is released */
  stop(): Promise<void> {
    if (this.phase === 'idle') return Promise.resolve();
    if (!this.stopping) {
      this.stopping = this.shutdown().finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  /** Stops, then completes every observable so piped sinks can drain */
  async dispose(): Promise<void> {
    await this.stop();
    this.linesSubject.complete();
    this.speakingSubject.complete();
    this.statusSubject.complete();
    this.runEnded.complete();
  }

  /** Records until the first line, or `null` after `timeoutMs`, then stops */
  async captureOnce(deviceIndex: number | null, timeoutMs: number): Promise<TranscriptLine | null> {
    if (this.phase !== 'idle') {
      throw new AlreadyRecordingError();
    }

    const firstLine = firstValueFrom(
      merge(this.lines$, this.runEnded.pipe(map(() => null))).pipe(
        timeout({ first: timeoutMs, with: () => of(null) }),
      ),
      { defaultValue: null },
    );

    await this.start(deviceIndex);
    try {
      return await firstLine;
    } finally {
      await this.stop();
    }
  }

  private async open(deviceIndex: number | null): Promise<void> {
    const previousDevice = this.selectedDeviceIndex;
    this.selectedDeviceIndex = deviceIndex;
    this.lastError = null;
    this.emitStatus();

    let stream: AudioStream;
    try {
      stream = await this.source.open(deviceIndex, this.options.sampleRate, this.options.frameSize);
    } catch (err) {
      this.selectedDeviceIndex = previousDevice;
      this.lastError = describeError(err);
      this.phase = 'idle';
      this.emitStatus();
      this.runEnded.next();
      throw err;
    }

    if (this.stopRequested) {
      await stream.close();
      this.phase = 'idle';
      this.emitStatus();
      this.runEnded.next();
      return;
    }

    this.stream = stream;
    this.phase = 'recording';
    this.startedAt = Date.now();
    this.droppedSegments = 0;
    this.overflowCount = 0;
    this.emitStatus();
    this.logger.log(`Recording from device ${deviceIndex ?? 'default'}`);

    this.loop = this.runCaptureLoop(stream);
  }

  private async shutdown(): Promise<void> {
    this.stopRequested = true;
    await this.opening;

    const loop = this.loop;
    if (!loop) return;

    this.phase = 'stopping';
    this.emitStatus();
    await this.stream?.close();
    await loop;
  }

  /** Never rejects: a fatal device error ends the run and is kept in `lastError` */
  private async runCaptureLoop(stream: AudioStream): Promise<void> {
    const accumulator = new SegmentAccumulator(this.options.segmentation);
    try {
      await this.calibrate(stream, accumulator);

      while (!this.stopRequested) {
        const read = await stream.readFrame();
        if (read.kind === 'end') break;
        if (read.kind === 'overflow') {
          this.recordOverflow(read.droppedFrames, stream, accumulator);
          continue;
        }

        const { silent, closed } = accumulator.append(read.frame);
        this.speakingSubject.next(!silent);
        if (closed) await this.handleSegment(closed);
      }

      if (this.options.segmentation.flushOnStop) {
        const rest = accumulator.flush();
        if (rest) await this.handleSegment(rest);
      }
    } catch (err) {
      this.lastError = describeError(err);
      this.logger.error(`Capture stopped: ${this.lastError}`);
    } finally {
      await stream.close().catch((err: unknown) => {
        this.logger.warn(`Failed to close audio stream: ${describeError(err)}`);
      });
      this.stream = null;
      this.loop = null;
      this.phase = 'idle';
      this.speakingSubject.next(false);
      this.emitStatus();
      this.logger.log(`Recording stopped (${this.transcript.length} lines)`);
      this.runEnded.next();
    }
  }

  /** Reads ambient audio and raises the silence threshold above its peak */
  private async calibrate(stream: AudioStream, accumulator: SegmentAccumulator): Promise<void> {
    const { calibrationSeconds, calibrationMargin, silenceThreshold } = this.options.segmentation;
    if (calibrationSeconds <= 0) return;

    const frameCount = Math.ceil((calibrationSeconds * stream.sampleRate) / stream.frameSize);
    let ambientPeak = 0;
    let heard = 0;
    while (heard < frameCount && !this.stopRequested) {
      const read = await stream.readFrame();
      if (read.kind === 'end') return;
      if (read.kind === 'overflow') {
        this.recordOverflow(read.droppedFrames, stream, accumulator);
        continue;
      }
      ambientPeak = Math.max(ambientPeak, peakAmplitude(read.frame.samples));
      accumulator.skip(read.frame.samples.length);
      heard++;
    }

    const threshold = calibrateThreshold(ambientPeak, silenceThreshold, calibrationMargin);
    accumulator.setThreshold(threshold);
    this.logger.log(`Calibrated silence threshold to ${threshold} (ambient peak ${ambientPeak})`);
  }

  private recordOverflow(droppedFrames: number, stream: AudioStream, accumulator: SegmentAccumulator): void {
    this.overflowCount++;
    accumulator.skip(droppedFrames * stream.frameSize);
    this.logger.warn(`Audio overflow: ${droppedFrames} frame(s) dropped`);
    this.emitStatus();
  }

  private async handleSegment(segment: ClosedSegment): Promise<void> {
    if (this.options.segmentation.skipSilentSegments && segment.speechFrameCount === 0) {
      this.logger.debug(`Skipped silent segment (${segment.durationSeconds.toFixed(2)}s)`);
      return;
    }

    let text: string | null;
    try {
      text = await this.dispatcher.dispatch(segment);
    } catch (err) {
      this.droppedSegments++;
      this.logger.warn(`Dropped ${segment.durationSeconds.toFixed(2)}s segment: ${describeError(err)}`);
      this.emitStatus();
      return;
    }

    if (text !== null) this.appendLine(text, segment);
  }

  private appendLine(text: string, segment: ClosedSegment): void {
    const toMs = (sample: number): number => Math.round((sample / segment.sampleRate) * 1000);
    const line: TranscriptLine = {
      index: this.nextLineIndex++,
      text,
      startTimeMs: toMs(segment.startSample),
      endTimeMs: toMs(segment.endSample),
      closure: segment.closure,
    };
    this.transcript.push(line);
    this.linesSubject.next(line);
    this.emitStatus();
  }

  private emitStatus(): void {
    this.statusSubject.next(this.status());
  }
}
