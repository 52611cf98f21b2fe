import { existsSync } from 'fs';
import { writeFile } from 'fs/promises';
import { describe, expect, it, vi } from 'vitest';
import { WhisperCppEngine, type CommandRunner } from './whisper-cpp.engine.js';

const options = { binaryPath: '/opt/whisper/whisper-cli', modelPath: '/models/ggml-base.bin', timeoutMs: 5000 };

function outputBase(args: string[]): string {
  return args[args.indexOf('-of') + 1];
}

describe('WhisperCppEngine', () => {
  it('should run whisper-cli on a WAV file and read one fragment per line', async () => {
    let wavPath = '';
    let wavExisted = false;
    const run = vi.fn<CommandRunner>(async (_command, args) => {
      wavPath = args[args.length - 1];
      wavExisted = existsSync(wavPath);
      await writeFile(`${outputBase(args)}.txt`, ' hello world\n\nsecond line \n');
    });
    const engine = new WhisperCppEngine(options, run);

    const result = await engine.transcribe(Float32Array.from([0.1, 0.2]), 16000, 'en');

    expect(result).toEqual(['hello world', 'second line']);
    expect(run).toHaveBeenCalledTimes(1);
    const [command, args, timeout] = run.mock.calls[0];
    expect(command).toBe('/opt/whisper/whisper-cli');
    expect(timeout).toBe(5000);
    expect(args.slice(0, 4)).toEqual(['-m', '/models/ggml-base.bin', '-l', 'en']);
    expect(args).toContain('--no-timestamps');
    expect(wavPath.endsWith('.wav')).toBe(true);
    expect(wavExisted).toBe(true);
  });

  it('should remove its temporary files', async () => {
    let base = '';
    const run = vi.fn<CommandRunner>(async (_command, args) => {
      base = outputBase(args);
      await writeFile(`${base}.txt`, 'done\n');
    });

    await new WhisperCppEngine(options, run).transcribe(Float32Array.from([0.1]), 16000, 'en');

    expect(existsSync(`${base}.wav`)).toBe(false);
    expect(existsSync(`${base}.txt`)).toBe(false);
  });

  it('should return no fragments when no transcript file was written', async () => {
    const run = vi.fn<CommandRunner>(async () => undefined);

    expect(await new WhisperCppEngine(options, run).transcribe(Float32Array.from([0.1]), 16000, 'en')).toEqual([]);
  });

  it('should propagate a failed run and still clean up', async () => {
    let base = '';
    const run = vi.fn<CommandRunner>(async (_command, args) => {
      base = outputBase(args);
      throw new Error('whisper-cli failed: model not found');
    });

    await expect(
      new WhisperCppEngine(options, run).transcribe(Float32Array.from([0.1]), 16000, 'en'),
    ).rejects.toThrow('whisper-cli failed: model not found');
    expect(existsSync(`${base}.wav`)).toBe(false);
  });
});
