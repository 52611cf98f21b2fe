import type { Readable } from 'stream';
import type { Frame, FrameRead } from '@scribeloop/shared-types';

export interface FrameReaderOptions {
  sampleRate: number;
  frameSize: number;
  /** Frames kept while the consumer is busy; older ones are dropped beyond this */
  maxQueuedFrames: number;
}

interface PendingRead {
  resolve: (read: FrameRead) => void;
  reject: (err: Error) => void;
}

/**
 * Reassembles a raw S16LE byte stream into fixed-size frames. Chunk
 * boundaries may fall anywhere, including between the two bytes of a sample.
 * The owner decides when the stream is over (`end`) or broken (`fail`).
 */
export class PcmFrameReader {
  private readonly queue: Frame[] = [];
  private partial: Int16Array;
  private partialLength = 0;
  private oddByte: number | null = null;
  private nextIndex = 0;
  private dropped = 0;
  private pending: PendingRead | null = null;
  private ended = false;
  private failure: Error | null = null;
  private readonly onData = (chunk: Buffer): void => this.push(chunk);

  overflowCount = 0;

  constructor(
    private readonly input: Readable,
    private readonly options: FrameReaderOptions,
  ) {
    this.partial = new Int16Array(options.frameSize);
    input.on('data', this.onData);
  }

  readFrame(): Promise<FrameRead> {
    if (this.pending) {
      return Promise.reject(new Error('A frame read is already pending'));
    }
    if (this.dropped > 0) {
      const droppedFrames = this.dropped;
      this.dropped = 0;
      return Promise.resolve({ kind: 'overflow', droppedFrames });
    }
    const frame = this.queue.shift();
    if (frame) return Promise.resolve({ kind: 'frame', frame });
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve({ kind: 'end' });

    return new Promise<FrameRead>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  /** Stops reading; queued frames are discarded and a pending read resolves `end` */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.queue.length = 0;
    this.dropped = 0;
    this.input.off('data', this.onData);
    this.settle((p) => p.resolve({ kind: 'end' }));
  }

  /** Queued frames are still delivered before the failure surfaces */
  fail(err: Error): void {
    if (this.ended || this.failure) return;
    this.failure = err;
    this.input.off('data', this.onData);
    if (this.queue.length === 0) {
      this.settle((p) => p.reject(err));
    }
  }

  private push(chunk: Buffer): void {
    let offset = 0;
    if (this.oddByte !== null && chunk.length > 0) {
      const sample = Buffer.from([this.oddByte, chunk[0]]).readInt16LE(0);
      this.oddByte = null;
      this.appendSample(sample);
      offset = 1;
    }
    for (; offset + 1 < chunk.length; offset += 2) {
      this.appendSample(chunk.readInt16LE(offset));
    }
    if (offset < chunk.length) {
      this.oddByte = chunk[offset];
    }
  }

  private appendSample(sample: number): void {
    this.partial[this.partialLength++] = sample;
    if (this.partialLength < this.options.frameSize) return;

    const frame: Frame = {
      samples: this.partial,
      sampleRate: this.options.sampleRate,
      channels: 1,
      index: this.nextIndex++,
    };
    this.partial = new Int16Array(this.options.frameSize);
    this.partialLength = 0;
    this.enqueue(frame);
  }

  private enqueue(frame: Frame): void {
    if (this.pending) {
      this.settle((p) => p.resolve({ kind: 'frame', frame }));
      return;
    }
    this.queue.push(frame);
    if (this.queue.length > this.options.maxQueuedFrames) {
      this.queue.shift();
      this.dropped++;
      this.overflowCount++;
    }
  }

  private settle(action: (pending: PendingRead) => void): void {
    const pending = this.pending;
    this.pending = null;
    if (pending) action(pending);
  }
}
