import { formatTimestamp } from '@scribeloop/backend';
import type { AudioDevice, SearchResult, SessionSummary, TranscriptLine } from '@scribeloop/shared-types';

export function formatLine(line: TranscriptLine): string {
  return `[${formatTimestamp(line.startTimeMs)}] ${line.text}`;
}

export function formatDevice(device: AudioDevice): string {
  return `${String(device.index).padStart(3)}  ${device.name}`;
}

export function formatDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 16).replace('T', ' ');
}

export function formatSession(session: SessionSummary): string {
  const lines = `${session.lineCount} line${session.lineCount === 1 ? '' : 's'}`;
  return `${session.id}  ${formatDate(session.createdAt)}  ${formatTimestamp(session.durationMs)}  ${lines}  ${session.title}`;
}

export function formatSearchResult(result: SearchResult): string {
  return `${result.sessionId}  ${result.title}\n    ${result.excerpt}`;
}
