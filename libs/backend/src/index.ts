import 'reflect-metadata';

export * from './lib/backend.module.js';
export * from './lib/errors.js';

export * from './lib/config/config.module.js';
export * from './lib/config/config.service.js';
export * from './lib/config/config-validation.js';

export * from './lib/audio/audio.module.js';
export * from './lib/audio/audio-source.js';
export * from './lib/audio/audio-source.service.js';
export * from './lib/audio/frame-reader.js';
export * from './lib/audio/recorder.js';
export * from './lib/audio/recorder-stream.js';

export * from './lib/segmentation/silence-detector.js';
export * from './lib/segmentation/segment-accumulator.js';

export * from './lib/stt/stt.module.js';
export * from './lib/stt/engines/transcription-engine.js';
export * from './lib/stt/engines/http.engine.js';
export * from './lib/stt/engines/whisper-cpp.engine.js';
export * from './lib/stt/engines/sherpa-onnx.engine.js';
export * from './lib/stt/hallucination-filter.js';
export * from './lib/stt/transcription-dispatcher.js';
export * from './lib/stt/transcription-engine.factory.js';

export * from './lib/recording/recording.module.js';
export * from './lib/recording/recording-session.js';
export * from './lib/recording/recording-session.factory.js';

export * from './lib/database/database.module.js';
export * from './lib/database/database.service.js';
export * from './lib/export/export.module.js';
export * from './lib/export/export.service.js';

export * from './lib/transcript/transcript-sink.js';
export * from './lib/transcript/file-transcript.sink.js';
export * from './lib/transcript/database-transcript.sink.js';
