import { execFile } from 'child_process';
import { randomBytes } from 'crypto';
import { readFile, unlink, writeFile } from 'fs/promises';
import { cpus, tmpdir } from 'os';
import { join } from 'path';
import type { TranscriptionEngine } from './transcription-engine.js';
import { encodeWav } from './wav.js';

export interface WhisperCppOptions {
  binaryPath: string;
  modelPath: string;
  timeoutMs: number;
}

export type CommandRunner = (command: string, args: string[], timeoutMs: number) => Promise<void>;

const runCommand: CommandRunner = (command, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { timeout: timeoutMs }, (error, _stdout, stderr) => {
      if (error) {
        reject(new Error(`whisper-cli failed: ${stderr.slice(0, 300) || error.message}`));
        return;
      }
      resolve();
    });
  });

/** Runs the whisper.cpp CLI on a temporary WAV file, one fragment per output line */
export class WhisperCppEngine implements TranscriptionEngine {
  readonly name = 'whisper-cpp';

  constructor(
    private readonly options: WhisperCppOptions,
    private readonly run: CommandRunner = runCommand,
  ) {}

  async transcribe(samples: Float32Array, sampleRate: number, language: string): Promise<string[]> {
    if (samples.length === 0) return [];

    const base = join(tmpdir(), `scribeloop-${randomBytes(8).toString('hex')}`);
    const wavPath = `${base}.wav`;
    const txtPath = `${base}.txt`;

    await writeFile(wavPath, encodeWav(samples, sampleRate));
    try {
      await this.run(this.options.binaryPath, this.buildArgs(wavPath, base, language), this.options.timeoutMs);

      let text = '';
      try {
        text = await readFile(txtPath, 'utf-8');
      } catch {
        // no txt file when nothing was recognized
      }
      return text.split('\n').map((line) => line.trim()).filter(Boolean);
    } finally {
      await Promise.allSettled([unlink(wavPath), unlink(txtPath)]);
    }
  }

  buildArgs(wavPath: string, outputBase: string, language: string): string[] {
    return [
      '-m', this.options.modelPath,
      '-l', language,
      '--output-txt',
      '--no-timestamps',
      '--no-prints',
      '-of', outputBase,
      '-t', String(Math.min(cpus().length, 4)),
      wavPath,
    ];
  }
}
