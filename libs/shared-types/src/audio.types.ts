export interface AudioDevice {
  index: number;
  name: string;
}

/** One fixed-size block of Int16 PCM samples, mono */
export interface Frame {
  readonly samples: Int16Array;
  readonly sampleRate: number;
  readonly channels: 1;
  /** Sequence number within the stream that produced it */
  readonly index: number;
}

export type FrameRead =
  | { kind: 'frame'; frame: Frame }
  /** The consumer fell behind and the oldest queued frames were discarded */
  | { kind: 'overflow'; droppedFrames: number }
  | { kind: 'end' };

export type RecorderBackend = 'arecord' | 'sox' | 'ffmpeg';
