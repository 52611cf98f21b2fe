import { Injectable, Inject } from '@nestjs/common';
import type { StoredSession } from '@scribeloop/shared-types';
import { DatabaseService } from '../database/database.service.js';

export type ExportFormat = 'md' | 'json' | 'txt';

@Injectable()
export class ExportService {
  constructor(@Inject(DatabaseService) private db: DatabaseService) {}

  export(sessionId: string, format: ExportFormat): string {
    switch (format) {
      case 'md':
        return this.exportMarkdown(sessionId);
      case 'json':
        return this.exportJson(sessionId);
      case 'txt':
        return this.exportText(sessionId);
    }
  }

  exportMarkdown(sessionId: string): string {
    const session = this.load(sessionId);
    const lines: string[] = [];

    lines.push(`# ${session.title}`);
    lines.push('');
    lines.push(`*Date: ${new Date(session.createdAt).toISOString().slice(0, 10)}*`);
    const durationMs = sessionDuration(session);
    if (durationMs > 0) {
      lines.push(`*Duration: ${Math.floor(durationMs / 60000)} min*`);
    }
    lines.push('');

    if (session.lines.length > 0) {
      lines.push('## Transcript');
      lines.push('');
      for (const line of session.lines) {
        lines.push(`**[${formatTimestamp(line.startTimeMs)}]** ${line.text}`);
        lines.push('');
      }
    }

    return lines.join('\n');
  }

  exportJson(sessionId: string): string {
    return JSON.stringify(this.load(sessionId), null, 2);
  }

  /** One line of text per transcript line, as the file sink writes them */
  exportText(sessionId: string): string {
    return this.load(sessionId)
      .lines.map((line) => `${line.text}\n`)
      .join('');
  }

  private load(sessionId: string): StoredSession {
    const session = this.db.getSession(sessionId);
    if (!session) throw new Error(`Session not found: ${sessionId}`);
    return session;
  }
}

function sessionDuration(session: StoredSession): number {
  if (session.endedAt !== null) return session.endedAt - session.createdAt;
  return session.lines.at(-1)?.endTimeMs ?? 0;
}

export function formatTimestamp(ms: number): string {
  const totalSec = Math.floor(ms / 1000);
  const min = Math.floor(totalSec / 60);
  const sec = totalSec % 60;
  return `${min.toString().padStart(2, '0')}:${sec.toString().padStart(2, '0')}`;
}
