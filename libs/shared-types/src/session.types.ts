import type { TranscriptLine } from './transcript.types.js';

export type SessionPhase = 'idle' | 'starting' | 'recording' | 'stopping';

export interface SessionStatus {
  isRunning: boolean;
  selectedDeviceIndex: number | null;
  phase: SessionPhase;
  startedAt: number | null;
  lineCount: number;
  droppedSegments: number;
  overflowCount: number;
  /** Message of the failure that ended the last capture loop, if any */
  lastError: string | null;
}

export interface StoredSession {
  id: string;
  title: string;
  deviceIndex: number | null;
  engine: string;
  language: string;
  createdAt: number;
  endedAt: number | null;
  lines: TranscriptLine[];
}

export interface SessionSummary {
  id: string;
  title: string;
  createdAt: number;
  endedAt: number | null;
  durationMs: number;
  lineCount: number;
}

export interface SearchResult {
  sessionId: string;
  title: string;
  excerpt: string;
  createdAt: number;
}
