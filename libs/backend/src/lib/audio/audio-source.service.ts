import { Inject, Injectable, Logger } from '@nestjs/common';
import type { AudioDevice, RecorderBackend } from '@scribeloop/shared-types';
import { ConfigService } from '../config/config.service.js';
import { DeviceUnavailableError, describeError } from '../errors.js';
import type { AudioSource } from './audio-source.js';
import {
  buildRecorderArgs,
  detectRecorder,
  installInstructions,
  listRecorderDevices,
  nodeRecorderHost,
  type RecorderDevice,
  type RecorderHost,
} from './recorder.js';
import { RecorderStream } from './recorder-stream.js';

/** Microphone capture through an external recorder binary writing PCM to stdout */
@Injectable()
export class AudioSourceService implements AudioSource {
  private readonly logger = new Logger(AudioSourceService.name);
  private host: RecorderHost = nodeRecorderHost;
  private detected: RecorderBackend | null = null;

  constructor(@Inject(ConfigService) private readonly config: ConfigService) {}

  setHost(host: RecorderHost): void {
    this.host = host;
    this.detected = null;
  }

  async listInputDevices(): Promise<AudioDevice[]> {
    const devices = await this.listDevices(await this.resolveRecorder());
    return devices.map(({ index, name }) => ({ index, name }));
  }

  async open(deviceIndex: number | null, sampleRate: number, frameSize: number): Promise<RecorderStream> {
    const { maxQueuedFrames, openTimeoutMs } = this.config.get('audio');
    const recorder = await this.resolveRecorder();

    let deviceId: string | null = null;
    let label = `${recorder}:default`;
    if (deviceIndex !== null) {
      const device = (await this.listDevices(recorder)).find((d) => d.index === deviceIndex);
      if (!device) {
        throw new DeviceUnavailableError(`No input device with index ${deviceIndex}`);
      }
      deviceId = device.id;
      label = `${recorder}:${device.name}`;
    }

    const args = buildRecorderArgs(recorder, deviceId, sampleRate, this.host.platform);
    this.logger.log(`Opening ${label} (${sampleRate} Hz, ${frameSize} samples/frame)`);

    let stream: RecorderStream;
    try {
      stream = new RecorderStream(this.host.spawn(recorder, args), label, {
        sampleRate,
        frameSize,
        maxQueuedFrames,
      });
    } catch (err) {
      if (err instanceof DeviceUnavailableError) throw err;
      throw new DeviceUnavailableError(`${label}: ${describeError(err)}`, { cause: err });
    }

    await stream.waitUntilOpen(openTimeoutMs);
    return stream;
  }

  private async resolveRecorder(): Promise<RecorderBackend> {
    const pinned = this.config.get('audio').recorder;
    if (pinned) return pinned;

    if (!this.detected) {
      const found = await detectRecorder(this.host);
      if (!found) {
        throw new DeviceUnavailableError(installInstructions(this.host.platform));
      }
      this.logger.log(`Using recorder: ${found}`);
      this.detected = found;
    }
    return this.detected;
  }

  private async listDevices(recorder: RecorderBackend): Promise<RecorderDevice[]> {
    try {
      return await listRecorderDevices(recorder, this.host);
    } catch (err) {
      throw new DeviceUnavailableError(`Could not list input devices: ${describeError(err)}`, { cause: err });
    }
  }
}
