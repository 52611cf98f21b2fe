import { describe, it, expect, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { AudioSourceService } from './audio-source.service';
import { ConfigService } from '../config/config.service';
import { DeviceUnavailableError } from '../errors';
import type { RecorderHost, RecorderProcess } from './recorder';

class FakeRecorder extends EventEmitter implements RecorderProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: (NodeJS.Signals | number | undefined)[] = [];

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    setImmediate(() => this.emit('close', null, signal));
    return true;
  }
}

interface FakeHost extends RecorderHost {
  spawned: { command: string; args: string[] }[];
}

/** `script` runs once the service has wired up the spawned process */
function fakeHost(proc: FakeRecorder, script: (p: FakeRecorder) => void = () => {}, binaries = ['arecord']): FakeHost {
  const host: FakeHost = {
    platform: 'linux',
    spawned: [],
    spawn: (command, args) => {
      host.spawned.push({ command, args });
      setImmediate(() => script(proc));
      return proc;
    },
    run: async () =>
      'card 0: PCH [HDA Intel PCH], device 0: ALC257 Analog [ALC257 Analog]\n' +
      'card 1: Device [USB Audio Device], device 0: USB Audio [USB Audio]\n',
    exists: async (binary) => binaries.includes(binary),
  };
  return host;
}

function pcm(samples: number[]): Buffer {
  const buf = Buffer.alloc(samples.length * 2);
  samples.forEach((s, i) => buf.writeInt16LE(s, i * 2));
  return buf;
}

describe('AudioSourceService', () => {
  let config: ConfigService;
  let service: AudioSourceService;
  let proc: FakeRecorder;

  beforeEach(() => {
    config = new ConfigService();
    config.override('audio.recorder', 'arecord');
    service = new AudioSourceService(config);
    proc = new FakeRecorder();
  });

  it('should open the default device and read frames', async () => {
    const host = fakeHost(proc, (p) => p.stdout.write(pcm([1, 2, 3, 4, 5])));
    service.setHost(host);

    const stream = await service.open(null, 16000, 4);

    expect(host.spawned).toEqual([
      { command: 'arecord', args: ['-q', '-t', 'raw', '-f', 'S16_LE', '-r', '16000', '-c', '1'] },
    ]);
    expect(stream.frameSize).toBe(4);
    expect(await stream.readFrame()).toEqual({
      kind: 'frame',
      frame: { samples: Int16Array.from([1, 2, 3, 4]), sampleRate: 16000, channels: 1, index: 0 },
    });
    await stream.close();
  });

  it('should resolve a device index to its ALSA identifier', async () => {
    const host = fakeHost(proc, (p) => p.stdout.write(pcm([0, 0])));
    service.setHost(host);

    const stream = await service.open(1, 16000, 2);

    expect(host.spawned[0].args.slice(-2)).toEqual(['-D', 'plughw:1,0']);
    await stream.close();
  });

  it('should reject an unknown device index', async () => {
    service.setHost(fakeHost(proc));

    await expect(service.open(5, 16000, 4)).rejects.toThrow(
      new DeviceUnavailableError('No input device with index 5'),
    );
  });

  it('should reject when the recorder cannot be spawned', async () => {
    service.setHost(fakeHost(proc, (p) => p.emit('error', new Error('spawn arecord ENOENT'))));

    await expect(service.open(null, 16000, 4)).rejects.toThrow(
      'arecord:default: recorder failed to start: spawn arecord ENOENT',
    );
  });

  it('should survive repeated process errors after opening', async () => {
    service.setHost(fakeHost(proc, (p) => p.stdout.write(pcm([1, 2, 3, 4]))));
    const stream = await service.open(null, 16000, 4);
    await stream.readFrame();

    expect(() => {
      proc.emit('error', new Error('read EIO'));
      proc.emit('error', new Error('kill EPERM'));
    }).not.toThrow();

    await expect(stream.readFrame()).rejects.toThrow(
      new DeviceUnavailableError('arecord:default: recorder failed to start: read EIO'),
    );
    await stream.close();
  });

  it('should reject when the recorder exits before producing audio', async () => {
    service.setHost(
      fakeHost(proc, (p) => {
        p.stderr.write('audio open error: Device or resource busy\n');
        setImmediate(() => p.emit('close', 1, null));
      }),
    );

    const opening = service.open(null, 16000, 4);
    await expect(opening).rejects.toBeInstanceOf(DeviceUnavailableError);
    await expect(opening).rejects.toThrow(
      'arecord:default: recorder exited with code 1: audio open error: Device or resource busy',
    );
  });

  it('should give up and stop the recorder when no audio arrives in time', async () => {
    config.override('audio.openTimeoutMs', 20);
    service.setHost(fakeHost(proc));

    await expect(service.open(null, 16000, 4)).rejects.toThrow(
      'arecord:default: no audio received within 20 ms',
    );
    expect(proc.signals).toEqual(['SIGTERM']);
  });

  it('should fail reads when the recorder dies mid-stream', async () => {
    service.setHost(fakeHost(proc, (p) => p.stdout.write(pcm([1, 2]))));
    const stream = await service.open(null, 16000, 2);
    await stream.readFrame();

    proc.emit('close', 1, null);

    await expect(stream.readFrame()).rejects.toThrow('arecord:default: recorder exited with code 1');
  });

  it('should wake a pending read with end on close', async () => {
    service.setHost(fakeHost(proc, (p) => p.stdout.write(pcm([1]))));
    const stream = await service.open(null, 16000, 2);

    const pending = stream.readFrame();
    await stream.close();

    expect(await pending).toEqual({ kind: 'end' });
    expect(proc.signals).toEqual(['SIGTERM']);
  });

  it('should explain how to install a recorder when none is found', async () => {
    config.override('audio.recorder', null);
    service.setHost(fakeHost(proc, () => {}, []));

    await expect(service.open(null, 16000, 4)).rejects.toThrow(
      'No audio recorder found. Install arecord (alsa-utils) or SoX: sudo apt install alsa-utils',
    );
  });

  it('should list devices through the detected recorder', async () => {
    config.override('audio.recorder', null);
    service.setHost(fakeHost(proc, () => {}, ['sox', 'ffmpeg']));

    expect(await service.listInputDevices()).toEqual([{ index: 0, name: 'default' }]);
  });
});
