import { Inject, Injectable } from '@nestjs/common';
import type { ScribeloopConfig } from '@scribeloop/shared-types';
import { ConfigService } from '../config/config.service.js';
import { InvalidConfigError } from '../errors.js';
import { HttpEngine } from './engines/http.engine.js';
import { SherpaOnnxEngine, findWhisperModel } from './engines/sherpa-onnx.engine.js';
import type { TranscriptionEngine } from './engines/transcription-engine.js';
import { WhisperCppEngine } from './engines/whisper-cpp.engine.js';
import { TranscriptionDispatcher } from './transcription-dispatcher.js';

type EngineConfig = ScribeloopConfig['engine'];

/** Picks the engine adapter once, when a session is built */
@Injectable()
export class TranscriptionEngineFactory {
  constructor(@Inject(ConfigService) private readonly config: ConfigService) {}

  createEngine(engine: EngineConfig = this.config.get('engine')): TranscriptionEngine {
    switch (engine.kind) {
      case 'http':
        return new HttpEngine({ endpoint: engine.endpoint, timeoutMs: engine.timeoutMs });

      case 'whisper-cpp':
        if (!engine.modelPath) {
          throw new InvalidConfigError('engine.modelPath must point to a ggml model for whisper-cpp');
        }
        return new WhisperCppEngine({
          binaryPath: engine.binaryPath ?? 'whisper-cli',
          modelPath: engine.modelPath,
          timeoutMs: engine.timeoutMs,
        });

      case 'sherpa-onnx': {
        if (!engine.modelPath) {
          throw new InvalidConfigError('engine.modelPath must point to a sherpa-onnx Whisper model directory');
        }
        const model = findWhisperModel(engine.modelPath);
        if (!model) {
          throw new InvalidConfigError(`No Whisper encoder/decoder/tokens found in ${engine.modelPath}`);
        }
        return new SherpaOnnxEngine(model);
      }
    }
  }

  createDispatcher(config: ScribeloopConfig = this.config.getAll()): TranscriptionDispatcher {
    return new TranscriptionDispatcher(this.createEngine(config.engine), {
      language: config.language,
      filterHallucinations: config.engine.filterHallucinations,
    });
  }
}
