import { describe, expect, it, vi } from 'vitest';
import type { RecordingSession } from '@scribeloop/backend';
import { captureOnceAndDispose } from './capture-once.js';

describe('captureOnceAndDispose', () => {
  it('should return the captured line and release the session', async () => {
    const line = { index: 0, text: 'hello', startTimeMs: 0, endTimeMs: 750, closure: 'natural' as const };
    const captureOnce = vi.fn<RecordingSession['captureOnce']>(async () => line);
    const dispose = vi.fn<RecordingSession['dispose']>(async () => undefined);

    expect(await captureOnceAndDispose({ captureOnce, dispose }, 3, 5000)).toEqual(line);
    expect(captureOnce).toHaveBeenCalledWith(3, 5000);
    expect(dispose).toHaveBeenCalledTimes(1);
  });

  it('should release the session when capture fails', async () => {
    const captureOnce = vi.fn<RecordingSession['captureOnce']>(async () => {
      throw new Error('Microphone unavailable');
    });
    const dispose = vi.fn<RecordingSession['dispose']>(async () => undefined);

    await expect(captureOnceAndDispose({ captureOnce, dispose }, null, 5000)).rejects.toThrow('Microphone unavailable');
    expect(dispose).toHaveBeenCalledTimes(1);
  });
});
