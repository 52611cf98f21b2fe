import { execFile, spawn } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable } from 'stream';
import type { AudioDevice, RecorderBackend } from '@scribeloop/shared-types';

export interface RecorderProcess extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

/** Process-level capabilities the capture layer needs; swapped out in tests */
export interface RecorderHost {
  readonly platform: NodeJS.Platform;
  spawn(command: string, args: string[]): RecorderProcess;
  /** Runs a command to completion and returns its stdout */
  run(command: string, args: string[]): Promise<string>;
  exists(binary: string): Promise<boolean>;
}

export interface RecorderDevice extends AudioDevice {
  /** Backend-specific device identifier, `null` for the system default */
  id: string | null;
}

export const nodeRecorderHost: RecorderHost = {
  platform: process.platform,
  spawn: (command, args) => spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] }),
  run: (command, args) =>
    new Promise((resolve, reject) => {
      execFile(command, args, { timeout: 5000 }, (err, stdout) => {
        if (err) reject(err);
        else resolve(stdout);
      });
    }),
  exists: (binary) => {
    const cmd = process.platform === 'win32' ? 'where' : 'which';
    return new Promise((resolve) => {
      execFile(cmd, [binary], (err) => resolve(!err));
    });
  },
};

export function recorderCandidates(platform: NodeJS.Platform): RecorderBackend[] {
  switch (platform) {
    case 'linux':
      return ['arecord', 'sox', 'ffmpeg'];
    case 'win32':
      return ['ffmpeg', 'sox'];
    default:
      return ['sox', 'ffmpeg'];
  }
}

export async function detectRecorder(host: RecorderHost): Promise<RecorderBackend | undefined> {
  for (const backend of recorderCandidates(host.platform)) {
    if (await host.exists(backend)) return backend;
  }
  return undefined;
}

export function installInstructions(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'darwin':
      return 'No audio recorder found. Install SoX: brew install sox';
    case 'linux':
      return 'No audio recorder found. Install arecord (alsa-utils) or SoX: sudo apt install alsa-utils';
    case 'win32':
      return 'No audio recorder found. Install FFmpeg: winget install ffmpeg';
    default:
      return 'No audio recorder found. Install SoX or FFmpeg.';
  }
}

/** Arguments that make the recorder write raw S16LE mono PCM to stdout */
export function buildRecorderArgs(
  backend: RecorderBackend,
  device: string | null,
  sampleRate: number,
  platform: NodeJS.Platform,
): string[] {
  const rate = String(sampleRate);
  switch (backend) {
    case 'arecord':
      return [
        '-q', '-t', 'raw', '-f', 'S16_LE', '-r', rate, '-c', '1',
        ...(device ? ['-D', device] : []),
      ];
    case 'sox':
      return [
        '-q',
        ...(device ? ['-t', soxDriver(platform), device] : ['-d']),
        '-t', 'raw', '-r', rate, '-e', 'signed-integer', '-b', '16', '-c', '1', '-L', '-',
      ];
    case 'ffmpeg':
      return [
        '-hide_banner', '-loglevel', 'error',
        '-f', ffmpegInputFormat(platform), '-i', device ?? ffmpegDefaultDevice(platform),
        '-ac', '1', '-ar', rate, '-acodec', 'pcm_s16le', '-f', 's16le', 'pipe:1',
      ];
  }
}

function soxDriver(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'darwin': return 'coreaudio';
    case 'win32': return 'waveaudio';
    default: return 'alsa';
  }
}

function ffmpegInputFormat(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'win32': return 'dshow';
    case 'darwin': return 'avfoundation';
    default: return 'pulse';
  }
}

function ffmpegDefaultDevice(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'win32': return 'audio=default';
    case 'darwin': return ':default';
    default: return 'default';
  }
}

const ARECORD_DEVICE_LINE = /^card (\d+): \S+ \[(.*?)\], device (\d+): .*? \[(.*?)\]/;

/** Parses `arecord -l`; one entry per card/device pair, in listing order */
export function parseArecordDevices(output: string): RecorderDevice[] {
  const devices: RecorderDevice[] = [];
  for (const line of output.split('\n')) {
    const match = ARECORD_DEVICE_LINE.exec(line.trim());
    if (!match) continue;
    const [, card, cardName, device, deviceName] = match;
    devices.push({
      index: devices.length,
      name: `${cardName}: ${deviceName}`,
      id: `plughw:${card},${device}`,
    });
  }
  return devices;
}

export async function listRecorderDevices(
  backend: RecorderBackend,
  host: RecorderHost,
): Promise<RecorderDevice[]> {
  if (backend === 'arecord') {
    return parseArecordDevices(await host.run('arecord', ['-l']));
  }
  return [{ index: 0, name: 'default', id: null }];
}
