import { Injectable, Logger } from '@nestjs/common';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import {
  DEFAULT_CONFIG,
  isValidConfigKey,
  validateConfigValue,
  type EngineKind,
  type RecorderBackend,
  type ScribeloopConfig,
} from '@scribeloop/shared-types';
import { InvalidConfigError, describeError } from '../errors.js';
import { assertValidConfig } from './config-validation.js';

export const CONFIG_FILE_NAME = 'scribeloop-config.json';

/** `SCRIBELOOP_HOME`, or `~/.scribeloop` */
export function defaultDataDir(): string {
  return process.env.SCRIBELOOP_HOME || join(homedir(), '.scribeloop');
}

/**
 * Configuration is held as a flat map of whitelisted dotted keys and rebuilt
 * into a typed object on read, so a hand-edited file can never smuggle in
 * keys or value types the rest of the backend does not expect.
 */
@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private configPath = '';
  private values = flattenConfig(DEFAULT_CONFIG);

  open(dataDir: string): void {
    mkdirSync(dataDir, { recursive: true });
    this.configPath = join(dataDir, CONFIG_FILE_NAME);
    this.load();
  }

  get path(): string {
    return this.configPath;
  }

  private load(): void {
    this.values = flattenConfig(DEFAULT_CONFIG);
    if (!existsSync(this.configPath)) {
      this.save();
      return;
    }

    try {
      const stored: unknown = JSON.parse(readFileSync(this.configPath, 'utf-8'));
      if (typeof stored !== 'object' || stored === null) {
        throw new Error('expected a JSON object');
      }
      const candidate = new Map(this.values);
      for (const [key, value] of flattenConfig(stored)) {
        if (validateConfigValue(key, value)) candidate.set(key, value);
      }
      assertValidConfig(buildConfig(candidate));
      this.values = candidate;
    } catch (err) {
      this.logger.warn(`Ignoring unreadable config ${this.configPath}: ${describeError(err)}`);
      this.values = flattenConfig(DEFAULT_CONFIG);
    }
  }

  private save(): void {
    if (!this.configPath) return;
    writeFileSync(this.configPath, JSON.stringify(this.getAll(), null, 2), 'utf-8');
  }

  getAll(): ScribeloopConfig {
    return buildConfig(this.values);
  }

  get<K extends keyof ScribeloopConfig>(key: K): ScribeloopConfig[K] {
    return this.getAll()[key];
  }

  /** Raw value of a dotted key, `undefined` when the key is not whitelisted */
  getValue(key: string): unknown {
    return isValidConfigKey(key) ? this.values.get(key) : undefined;
  }

  /** Validates and persists a single dotted key */
  set(key: string, value: unknown): void {
    this.values = this.withValue(key, value);
    this.save();
  }

  /** Same validation as `set`, but lives only for this process */
  override(key: string, value: unknown): void {
    this.values = this.withValue(key, value);
  }

  reset(): void {
    this.values = flattenConfig(DEFAULT_CONFIG);
    this.save();
  }

  private withValue(key: string, value: unknown): Map<string, unknown> {
    if (!isValidConfigKey(key)) {
      throw new InvalidConfigError(`Unknown config key: ${key}`);
    }
    if (!validateConfigValue(key, value)) {
      throw new InvalidConfigError(`Invalid value for ${key}: ${JSON.stringify(value)}`);
    }
    const candidate = new Map(this.values).set(key, value);
    assertValidConfig(buildConfig(candidate));
    return candidate;
  }
}

function flattenConfig(source: object, prefix = ''): Map<string, unknown> {
  const flat = new Map<string, unknown>();
  for (const [name, value] of Object.entries(source)) {
    const key = prefix ? `${prefix}.${name}` : name;
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      for (const entry of flattenConfig(value, key)) flat.set(...entry);
    } else {
      flat.set(key, value);
    }
  }
  return flat;
}

function buildConfig(values: Map<string, unknown>): ScribeloopConfig {
  const d = DEFAULT_CONFIG;
  const str = (key: string, fallback: string): string => {
    const v = values.get(key);
    return typeof v === 'string' ? v : fallback;
  };
  const num = (key: string, fallback: number): number => {
    const v = values.get(key);
    return typeof v === 'number' ? v : fallback;
  };
  const bool = (key: string, fallback: boolean): boolean => {
    const v = values.get(key);
    return typeof v === 'boolean' ? v : fallback;
  };
  const nullableNum = (key: string): number | null => {
    const v = values.get(key);
    return typeof v === 'number' ? v : null;
  };
  const nullableStr = (key: string): string | null => {
    const v = values.get(key);
    return typeof v === 'string' ? v : null;
  };

  return {
    language: str('language', d.language),
    audio: {
      deviceIndex: nullableNum('audio.deviceIndex'),
      sampleRate: num('audio.sampleRate', d.audio.sampleRate),
      frameSize: num('audio.frameSize', d.audio.frameSize),
      recorder: toRecorder(values.get('audio.recorder')),
      maxQueuedFrames: num('audio.maxQueuedFrames', d.audio.maxQueuedFrames),
      openTimeoutMs: num('audio.openTimeoutMs', d.audio.openTimeoutMs),
    },
    segmentation: {
      silenceThreshold: num('segmentation.silenceThreshold', d.segmentation.silenceThreshold),
      silenceFramesToClose: num('segmentation.silenceFramesToClose', d.segmentation.silenceFramesToClose),
      minSegmentSeconds: num('segmentation.minSegmentSeconds', d.segmentation.minSegmentSeconds),
      maxSegmentSeconds: num('segmentation.maxSegmentSeconds', d.segmentation.maxSegmentSeconds),
      calibrationSeconds: num('segmentation.calibrationSeconds', d.segmentation.calibrationSeconds),
      calibrationMargin: num('segmentation.calibrationMargin', d.segmentation.calibrationMargin),
      skipSilentSegments: bool('segmentation.skipSilentSegments', d.segmentation.skipSilentSegments),
      flushOnStop: bool('segmentation.flushOnStop', d.segmentation.flushOnStop),
    },
    engine: {
      kind: toEngineKind(values.get('engine.kind')),
      modelPath: nullableStr('engine.modelPath'),
      binaryPath: nullableStr('engine.binaryPath'),
      endpoint: str('engine.endpoint', d.engine.endpoint),
      timeoutMs: num('engine.timeoutMs', d.engine.timeoutMs),
      filterHallucinations: bool('engine.filterHallucinations', d.engine.filterHallucinations),
    },
    transcript: {
      filePath: nullableStr('transcript.filePath'),
    },
  };
}

function toRecorder(value: unknown): RecorderBackend | null {
  return value === 'arecord' || value === 'sox' || value === 'ffmpeg' ? value : null;
}

function toEngineKind(value: unknown): EngineKind {
  return value === 'sherpa-onnx' || value === 'http' ? value : 'whisper-cpp';
}
