import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module.js';
import { TranscriptionEngineFactory } from './transcription-engine.factory.js';

@Module({
  imports: [ConfigModule],
  providers: [TranscriptionEngineFactory],
  exports: [TranscriptionEngineFactory],
})
export class SttModule {}
