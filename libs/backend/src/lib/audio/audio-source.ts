import type { AudioDevice, FrameRead } from '@scribeloop/shared-types';

export interface AudioStream {
  readonly sampleRate: number;
  readonly frameSize: number;
  /**
   * Waits for the next full frame. Resolves `end` once the stream is closed,
   * `overflow` after frames were dropped, and rejects when the device fails.
   */
  readFrame(): Promise<FrameRead>;
  /** Idempotent; wakes a pending `readFrame` with `end` */
  close(): Promise<void>;
}

export interface AudioSource {
  open(deviceIndex: number | null, sampleRate: number, frameSize: number): Promise<AudioStream>;
  listInputDevices(): Promise<AudioDevice[]>;
}
