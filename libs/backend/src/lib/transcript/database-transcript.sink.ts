import type { TranscriptLine } from '@scribeloop/shared-types';
import type { DatabaseService } from '../database/database.service.js';
import type { TranscriptSink } from './transcript-sink.js';

export class DatabaseTranscriptSink implements TranscriptSink {
  readonly name = 'database';

  constructor(
    private readonly db: DatabaseService,
    readonly sessionId: string,
  ) {}

  async write(line: TranscriptLine): Promise<void> {
    this.db.appendLine(this.sessionId, line);
  }
}
