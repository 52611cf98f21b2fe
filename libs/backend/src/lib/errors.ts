export type ScribeloopErrorCode =
  | 'DEVICE_UNAVAILABLE'
  | 'ALREADY_RECORDING'
  | 'TRANSCRIPTION_ENGINE'
  | 'INVALID_CONFIG';

export class ScribeloopError extends Error {
  constructor(
    message: string,
    readonly code: ScribeloopErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No such device index, no recorder binary, or the capture stream could not be opened / died */
export class DeviceUnavailableError extends ScribeloopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DEVICE_UNAVAILABLE', options);
  }
}

export class AlreadyRecordingError extends ScribeloopError {
  constructor() {
    super('A recording is already in progress.', 'ALREADY_RECORDING');
  }
}

export class TranscriptionEngineError extends ScribeloopError {
  constructor(
    readonly engine: string,
    cause: unknown,
  ) {
    super(`Transcription failed (${engine}): ${describeError(cause)}`, 'TRANSCRIPTION_ENGINE', {
      cause,
    });
  }
}

export class InvalidConfigError extends ScribeloopError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIG');
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
