import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { PcmFrameReader } from './frame-reader';

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

function pcm(samples: number[]): Buffer {
  const buf = Buffer.alloc(samples.length * 2);
  samples.forEach((s, i) => buf.writeInt16LE(s, i * 2));
  return buf;
}

function setup(frameSize: number, maxQueuedFrames = 10) {
  const input = new PassThrough();
  const reader = new PcmFrameReader(input, { sampleRate: 16000, frameSize, maxQueuedFrames });
  return { input, reader };
}

describe('PcmFrameReader', () => {
  it('should assemble frames across chunk boundaries', async () => {
    const { input, reader } = setup(3);
    input.write(pcm([1, 2, 3, 4]));
    input.write(pcm([5, 6]));
    await tick();

    const first = await reader.readFrame();
    const second = await reader.readFrame();
    expect(first).toEqual({
      kind: 'frame',
      frame: { samples: Int16Array.from([1, 2, 3]), sampleRate: 16000, channels: 1, index: 0 },
    });
    expect(second).toEqual({
      kind: 'frame',
      frame: { samples: Int16Array.from([4, 5, 6]), sampleRate: 16000, channels: 1, index: 1 },
    });
  });

  it('should rejoin a sample split between chunks', async () => {
    const { input, reader } = setup(2);
    input.write(Buffer.from([0x01]));
    input.write(Buffer.from([0x00, 0xff, 0xff]));
    await tick();

    const read = await reader.readFrame();
    expect(read.kind === 'frame' && Array.from(read.frame.samples)).toEqual([1, -1]);
  });

  it('should resolve a waiting read as soon as a frame completes', async () => {
    const { input, reader } = setup(2);
    const pending = reader.readFrame();
    input.write(pcm([7, 8]));

    const read = await pending;
    expect(read.kind === 'frame' && Array.from(read.frame.samples)).toEqual([7, 8]);
  });

  it('should drop the oldest frames and report the overflow once', async () => {
    const { input, reader } = setup(1, 2);
    input.write(pcm([10, 20, 30, 40, 50]));
    await tick();

    expect(await reader.readFrame()).toEqual({ kind: 'overflow', droppedFrames: 3 });
    const next = await reader.readFrame();
    const last = await reader.readFrame();
    expect(next.kind === 'frame' && [next.frame.index, next.frame.samples[0]]).toEqual([3, 40]);
    expect(last.kind === 'frame' && [last.frame.index, last.frame.samples[0]]).toEqual([4, 50]);
    expect(reader.overflowCount).toBe(3);
  });

  it('should wake a pending read with end and keep reporting end', async () => {
    const { reader } = setup(4);
    const pending = reader.readFrame();
    reader.end();

    expect(await pending).toEqual({ kind: 'end' });
    expect(await reader.readFrame()).toEqual({ kind: 'end' });
  });

  it('should ignore data written after end', async () => {
    const { input, reader } = setup(1);
    reader.end();
    input.write(pcm([1, 2, 3]));
    await tick();

    expect(await reader.readFrame()).toEqual({ kind: 'end' });
  });

  it('should deliver queued frames before surfacing a failure', async () => {
    const { input, reader } = setup(1);
    input.write(pcm([9]));
    await tick();
    reader.fail(new Error('device gone'));

    expect((await reader.readFrame()).kind).toBe('frame');
    await expect(reader.readFrame()).rejects.toThrow('device gone');
  });

  it('should reject a pending read on failure', async () => {
    const { reader } = setup(1);
    const pending = reader.readFrame();
    reader.fail(new Error('device gone'));

    await expect(pending).rejects.toThrow('device gone');
  });

  it('should refuse a second concurrent read', async () => {
    const { reader } = setup(1);
    const pending = reader.readFrame();

    await expect(reader.readFrame()).rejects.toThrow('A frame read is already pending');
    reader.end();
    await pending;
  });
});
