import type { RecorderBackend } from './audio.types.js';
import type { SegmentationConfig } from './segmentation.types.js';

export type EngineKind = 'sherpa-onnx' | 'whisper-cpp' | 'http';

export interface SessionSegmentationConfig extends SegmentationConfig {
  /** Seconds of ambient audio read to raise the threshold before segmenting; 0 disables */
  calibrationSeconds: number;
  calibrationMargin: number;
  skipSilentSegments: boolean;
  flushOnStop: boolean;
}

export interface ScribeloopConfig {
  language: string;
  audio: {
    deviceIndex: number | null;
    sampleRate: number;
    frameSize: number;
    recorder: RecorderBackend | null;
    maxQueuedFrames: number;
    openTimeoutMs: number;
  };
  segmentation: SessionSegmentationConfig;
  engine: {
    kind: EngineKind;
    modelPath: string | null;
    binaryPath: string | null;
    endpoint: string;
    timeoutMs: number;
    filterHallucinations: boolean;
  };
  transcript: {
    filePath: string | null;
  };
}

export const DEFAULT_CONFIG: ScribeloopConfig = {
  language: 'en',
  audio: {
    deviceIndex: null,
    sampleRate: 16000,
    frameSize: 4000,
    recorder: null,
    maxQueuedFrames: 40,
    openTimeoutMs: 3000,
  },
  segmentation: {
    silenceThreshold: 300,
    silenceFramesToClose: 8,
    minSegmentSeconds: 0.5,
    maxSegmentSeconds: 30,
    calibrationSeconds: 0,
    calibrationMargin: 1.5,
    skipSilentSegments: false,
    flushOnStop: false,
  },
  engine: {
    kind: 'whisper-cpp',
    modelPath: null,
    binaryPath: null,
    endpoint: 'http://127.0.0.1:8765/transcribe',
    timeoutMs: 30000,
    filterHallucinations: false,
  },
  transcript: {
    filePath: null,
  },
};
