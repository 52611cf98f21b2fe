import { Module } from '@nestjs/common';
import { AudioModule } from '../audio/audio.module.js';
import { ConfigModule } from '../config/config.module.js';
import { SttModule } from '../stt/stt.module.js';
import { RecordingSessionFactory } from './recording-session.factory.js';

@Module({
  imports: [ConfigModule, AudioModule, SttModule],
  providers: [RecordingSessionFactory],
  exports: [RecordingSessionFactory],
})
export class RecordingModule {}
