/**
 * Validation helpers for dotted configuration keys, shared by the config
 * service and the CLI `config set` command.
 */

export type ConfigValueType =
  | 'string'
  | 'number'
  | 'boolean'
  | 'string|null'
  | 'number|null'
  | readonly string[];

const RECORDERS = ['arecord', 'sox', 'ffmpeg'] as const;
const ENGINES = ['sherpa-onnx', 'whisper-cpp', 'http'] as const;

/**
 * Whitelist of configuration keys that may be changed at runtime.
 * Array entries list the accepted values; `null` is also accepted for the recorder.
 */
export const CONFIG_WHITELIST: Record<string, ConfigValueType> = {
  'language': 'string',
  'audio.deviceIndex': 'number|null',
  'audio.sampleRate': 'number',
  'audio.frameSize': 'number',
  'audio.recorder': RECORDERS,
  'audio.maxQueuedFrames': 'number',
  'audio.openTimeoutMs': 'number',
  'segmentation.silenceThreshold': 'number',
  'segmentation.silenceFramesToClose': 'number',
  'segmentation.minSegmentSeconds': 'number',
  'segmentation.maxSegmentSeconds': 'number',
  'segmentation.calibrationSeconds': 'number',
  'segmentation.calibrationMargin': 'number',
  'segmentation.skipSilentSegments': 'boolean',
  'segmentation.flushOnStop': 'boolean',
  'engine.kind': ENGINES,
  'engine.modelPath': 'string|null',
  'engine.binaryPath': 'string|null',
  'engine.endpoint': 'string',
  'engine.timeoutMs': 'number',
  'engine.filterHallucinations': 'boolean',
  'transcript.filePath': 'string|null',
};

/**
 * Checks if a configuration key is in the whitelist.
 */
export function isValidConfigKey(key: string): boolean {
  return Object.prototype.hasOwnProperty.call(CONFIG_WHITELIST, key);
}

/**
 * Validates a configuration value against the whitelist.
 * @returns true if the value is valid for the given key
 */
export function validateConfigValue(key: string, value: unknown): boolean {
  if (!isValidConfigKey(key)) return false;
  const expectedType = CONFIG_WHITELIST[key];

  if (typeof expectedType !== 'string') {
    if (value === null) return key === 'audio.recorder';
    return typeof value === 'string' && expectedType.includes(value);
  }
  if (expectedType === 'string|null') {
    return value === null || typeof value === 'string';
  }
  if (expectedType === 'number|null') {
    return value === null || (typeof value === 'number' && Number.isFinite(value));
  }
  if (expectedType === 'number') {
    return typeof value === 'number' && Number.isFinite(value);
  }
  return typeof value === expectedType;
}

/**
 * Converts a raw command-line string into the value type a key expects.
 * Returns `undefined` when the text cannot represent a valid value.
 */
export function parseConfigValue(key: string, raw: string): unknown {
  if (!isValidConfigKey(key)) return undefined;
  const expectedType = CONFIG_WHITELIST[key];
  const trimmed = raw.trim();

  let value: unknown = trimmed;
  if (trimmed === 'null' && expectedType !== 'string') {
    value = null;
  } else if (expectedType === 'number' || expectedType === 'number|null') {
    value = trimmed === '' ? NaN : Number(trimmed);
  } else if (expectedType === 'boolean') {
    if (trimmed === 'true') value = true;
    else if (trimmed === 'false') value = false;
  }

  return validateConfigValue(key, value) ? value : undefined;
}
