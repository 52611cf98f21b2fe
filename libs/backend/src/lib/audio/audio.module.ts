import { Module } from '@nestjs/common';
import { AudioSourceService } from './audio-source.service.js';
import { ConfigModule } from '../config/config.module.js';

@Module({
  imports: [ConfigModule],
  providers: [AudioSourceService],
  exports: [AudioSourceService],
})
export class AudioModule {}
