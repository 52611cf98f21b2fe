import type { FrameRead } from '@scribeloop/shared-types';
import { DeviceUnavailableError } from '../errors.js';
import type { AudioStream } from './audio-source.js';
import { PcmFrameReader, type FrameReaderOptions } from './frame-reader.js';
import type { RecorderProcess } from './recorder.js';

const STDERR_LIMIT = 2000;
const KILL_GRACE_MS = 2000;

/**
 * A running recorder process exposed as a frame stream. An exit that was not
 * requested through `close` fails the stream with `DeviceUnavailableError`.
 */
export class RecorderStream implements AudioStream {
  readonly sampleRate: number;
  readonly frameSize: number;

  private readonly reader: PcmFrameReader;
  private readonly exited: Promise<void>;
  private closing: Promise<void> | null = null;
  private hasExited = false;
  private stderrText = '';
  private opened = false;
  private openWaiter: { resolve: () => void; reject: (err: Error) => void } | null = null;
  private openFailure: Error | null = null;

  constructor(
    private readonly proc: RecorderProcess,
    private readonly label: string,
    options: FrameReaderOptions,
  ) {
    if (!proc.stdout) {
      throw new DeviceUnavailableError(`${label}: recorder has no stdout`);
    }
    this.sampleRate = options.sampleRate;
    this.frameSize = options.frameSize;
    this.reader = new PcmFrameReader(proc.stdout, options);

    proc.stdout.once('data', () => {
      this.opened = true;
      this.settleOpen(null);
    });
    proc.stderr?.on('data', (chunk: Buffer) => {
      if (this.stderrText.length < STDERR_LIMIT) this.stderrText += chunk.toString();
    });

    this.exited = new Promise<void>((resolve) => {
      proc.on('error', (err: Error) => {
        this.hasExited = true;
        this.fail(new DeviceUnavailableError(`${label}: recorder failed to start: ${err.message}`, { cause: err }));
        resolve();
      });
      proc.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        this.hasExited = true;
        if (this.closing) {
          this.reader.end();
        } else {
          const reason = signal ? `signal ${signal}` : `code ${code}`;
          const detail = this.stderrText.trim().slice(0, 300);
          this.fail(new DeviceUnavailableError(`${label}: recorder exited with ${reason}${detail ? `: ${detail}` : ''}`));
        }
        resolve();
      });
    });
  }

  /** Resolves once the recorder has produced audio; closes the stream on failure */
  async waitUntilOpen(timeoutMs: number): Promise<void> {
    if (!this.opened) {
      const opening = new Promise<void>((resolve, reject) => {
        if (this.openFailure) {
          reject(this.openFailure);
          return;
        }
        this.openWaiter = { resolve, reject };
      });
      let timer: ReturnType<typeof setTimeout> | undefined;
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new DeviceUnavailableError(`${this.label}: no audio received within ${timeoutMs} ms`)),
          timeoutMs,
        );
      });
      try {
        await Promise.race([opening, timeout]);
      } catch (err) {
        this.openWaiter = null;
        await this.close();
        throw err;
      } finally {
        clearTimeout(timer);
      }
    }
  }

  readFrame(): Promise<FrameRead> {
    return this.reader.readFrame();
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.reader.end();
    if (this.hasExited) return;

    this.proc.kill('SIGTERM');
    let timer: ReturnType<typeof setTimeout> | undefined;
    const forceKill = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        this.proc.kill('SIGKILL');
        resolve();
      }, KILL_GRACE_MS);
    });
    await Promise.race([this.exited, forceKill]);
    clearTimeout(timer);
  }

  private fail(err: Error): void {
    this.reader.fail(err);
    if (!this.opened) this.settleOpen(err);
  }

  private settleOpen(err: Error | null): void {
    const waiter = this.openWaiter;
    this.openWaiter = null;
    if (err) this.openFailure = err;
    if (!waiter) return;
    if (err) waiter.reject(err);
    else waiter.resolve();
  }
}
