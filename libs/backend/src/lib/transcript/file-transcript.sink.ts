import { appendFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { TranscriptLine } from '@scribeloop/shared-types';
import type { TranscriptSink } from './transcript-sink.js';

/** Appends each line's text to a plain text file, creating it on first write */
export class FileTranscriptSink implements TranscriptSink {
  readonly name = 'file';
  private ready: Promise<unknown> | null = null;

  constructor(readonly filePath: string) {}

  async write(line: TranscriptLine): Promise<void> {
    this.ready ??= mkdir(dirname(this.filePath), { recursive: true });
    await this.ready;
    await appendFile(this.filePath, `${line.text}\n`, 'utf-8');
  }
}
