import { Inject, Injectable } from '@nestjs/common';
import type { ScribeloopConfig, SessionSegmentationConfig } from '@scribeloop/shared-types';
import { AudioSourceService } from '../audio/audio-source.service.js';
import { assertValidConfig } from '../config/config-validation.js';
import { ConfigService } from '../config/config.service.js';
import { TranscriptionEngineFactory } from '../stt/transcription-engine.factory.js';
import { RecordingSession } from './recording-session.js';

export interface RecordingSessionOverrides {
  language?: string;
  audio?: Partial<Pick<ScribeloopConfig['audio'], 'sampleRate' | 'frameSize'>>;
  segmentation?: Partial<SessionSegmentationConfig>;
  engine?: Partial<ScribeloopConfig['engine']>;
}

/** Sessions are independent objects; the engine is chosen when each one is built */
@Injectable()
export class RecordingSessionFactory {
  constructor(
    @Inject(ConfigService) private readonly config: ConfigService,
    @Inject(AudioSourceService) private readonly audioSource: AudioSourceService,
    @Inject(TranscriptionEngineFactory) private readonly engines: TranscriptionEngineFactory,
  ) {}

  create(overrides: RecordingSessionOverrides = {}): RecordingSession {
    const base = this.config.getAll();
    const config: ScribeloopConfig = {
      ...base,
      language: overrides.language ?? base.language,
      audio: { ...base.audio, ...overrides.audio },
      segmentation: { ...base.segmentation, ...overrides.segmentation },
      engine: { ...base.engine, ...overrides.engine },
    };
    assertValidConfig(config);

    return new RecordingSession(this.audioSource, this.engines.createDispatcher(config), {
      sampleRate: config.audio.sampleRate,
      frameSize: config.audio.frameSize,
      segmentation: config.segmentation,
    });
  }
}
