import { Module } from '@nestjs/common';
import { SttModule } from './stt/stt.module.js';
import { AudioModule } from './audio/audio.module.js';
import { DatabaseModule } from './database/database.module.js';
import { ExportModule } from './export/export.module.js';
import { ConfigModule } from './config/config.module.js';
import { RecordingModule } from './recording/recording.module.js';

@Module({
  imports: [ConfigModule, AudioModule, SttModule, RecordingModule, DatabaseModule, ExportModule],
  exports: [ConfigModule, AudioModule, SttModule, RecordingModule, DatabaseModule, ExportModule],
})
export class BackendModule {}
