import type { RecordingSession } from '@scribeloop/backend';
import type { TranscriptLine } from '@scribeloop/shared-types';

/** Records a single line, releasing the session whether or not capture succeeds */
export async function captureOnceAndDispose(
  session: Pick<RecordingSession, 'captureOnce' | 'dispose'>,
  deviceIndex: number | null,
  timeoutMs: number,
): Promise<TranscriptLine | null> {
  try {
    return await session.captureOnce(deviceIndex, timeoutMs);
  } finally {
    await session.dispose();
  }
}
