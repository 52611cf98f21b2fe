#!/usr/bin/env tsx
import { NestFactory } from '@nestjs/core';
import type { INestApplicationContext, LogLevel } from '@nestjs/common';
import { filter, firstValueFrom } from 'rxjs';
import {
  AudioSourceService,
  BackendModule,
  ConfigService,
  DatabaseService,
  DatabaseTranscriptSink,
  ExportService,
  FileTranscriptSink,
  RecordingSessionFactory,
  defaultDataDir,
  describeError,
  pipeToSink,
  type TranscriptSink,
} from '@scribeloop/backend';
import { parseConfigValue, type TranscriptLine } from '@scribeloop/shared-types';
import { captureOnceAndDispose } from './capture-once.js';
import { USAGE, UsageError, parseCli, type CliCommand, type CliOptions } from './cli-args.js';
import { formatDevice, formatLine, formatSearchResult, formatSession } from './format.js';

// ── NestJS Bootstrap ───────────────────────────────────────────────────────

function logLevels(options: CliOptions): LogLevel[] {
  if (options.quiet) return ['error', 'warn'];
  if (options.verbose) return ['error', 'warn', 'log', 'debug'];
  return ['error', 'warn', 'log'];
}

async function bootstrapNest(options: CliOptions): Promise<INestApplicationContext> {
  const appContext = await NestFactory.createApplicationContext(BackendModule, {
    logger: logLevels(options),
  });
  const dataDir = options.dataDir ?? defaultDataDir();
  appContext.get(ConfigService).open(dataDir);
  appContext.get(DatabaseService).open(dataDir);
  return appContext;
}

// ── Commands ───────────────────────────────────────────────────────────────

const consoleSink: TranscriptSink = {
  name: 'console',
  async write(line: TranscriptLine) {
    console.log(formatLine(line));
  },
};

async function listen(app: INestApplicationContext, command: Extract<CliCommand, { name: 'listen' }>): Promise<void> {
  const config = app.get(ConfigService);
  const db = app.get(DatabaseService);
  const session = app
    .get(RecordingSessionFactory)
    .create(command.engine ? { engine: { kind: command.engine } } : {});
  const deviceIndex = command.device === undefined ? config.get('audio').deviceIndex : command.device;
  const engine = command.engine ?? config.get('engine').kind;

  const stored = db.createSession({
    title: command.title,
    deviceIndex,
    engine,
    language: config.get('language'),
  });

  const sinks: TranscriptSink[] = [consoleSink, new DatabaseTranscriptSink(db, stored.id)];
  const filePath = command.out ?? config.get('transcript').filePath;
  if (filePath) sinks.push(new FileTranscriptSink(filePath));
  const drained = Promise.all(sinks.map((sink) => pipeToSink(session.lines$, sink)));

  try {
    await session.start(deviceIndex);
  } catch (err) {
    await session.dispose();
    db.deleteSession(stored.id);
    throw err;
  }
  console.error(`Listening (${engine}), press Ctrl+C to stop.`);

  const interrupted = new Promise<void>((resolve) => process.once('SIGINT', () => resolve()));
  const ended = firstValueFrom(session.status$.pipe(filter((status) => status.phase === 'idle')));
  await Promise.race([interrupted, ended]);

  await session.dispose();
  await drained;
  db.endSession(stored.id);

  const status = session.status();
  console.error(`Saved ${status.lineCount} line(s) as ${stored.id}`);
  if (status.lastError) {
    throw new Error(status.lastError);
  }
}

async function once(app: INestApplicationContext, command: Extract<CliCommand, { name: 'once' }>): Promise<void> {
  const session = app
    .get(RecordingSessionFactory)
    .create(command.engine ? { engine: { kind: command.engine } } : {});
  const deviceIndex = command.device === undefined ? app.get(ConfigService).get('audio').deviceIndex : command.device;

  console.error('Say something...');
  const line = await captureOnceAndDispose(session, deviceIndex, command.timeoutMs);
  console.log(line ? line.text : '(nothing heard)');
}

function showConfig(app: INestApplicationContext, key: string | undefined): void {
  const config = app.get(ConfigService);
  if (!key) {
    console.log(JSON.stringify(config.getAll(), null, 2));
    return;
  }
  const value = config.getValue(key);
  if (value === undefined) throw new UsageError(`Unknown config key: ${key}`);
  console.log(JSON.stringify(value));
}

function setConfig(app: INestApplicationContext, key: string, raw: string): void {
  const value = parseConfigValue(key, raw);
  if (value === undefined) throw new UsageError(`Invalid value for ${key}: ${raw}`);
  app.get(ConfigService).set(key, value);
  console.log(`${key} = ${JSON.stringify(value)}`);
}

async function run(app: INestApplicationContext, command: CliCommand): Promise<void> {
  switch (command.name) {
    case 'help':
      console.log(USAGE);
      return;
    case 'devices': {
      const devices = await app.get(AudioSourceService).listInputDevices();
      for (const device of devices) console.log(formatDevice(device));
      return;
    }
    case 'listen':
      return listen(app, command);
    case 'once':
      return once(app, command);
    case 'sessions': {
      const sessions = app.get(DatabaseService).listSessions();
      if (sessions.length === 0) console.log('No sessions yet.');
      for (const session of sessions) console.log(formatSession(session));
      return;
    }
    case 'export':
      process.stdout.write(app.get(ExportService).export(command.sessionId, command.format));
      return;
    case 'search': {
      const results = app.get(DatabaseService).search(command.query);
      if (results.length === 0) console.log('No matches.');
      for (const result of results) console.log(formatSearchResult(result));
      return;
    }
    case 'config-get':
      return showConfig(app, command.key);
    case 'config-set':
      return setConfig(app, command.key, command.value);
  }
}

// ── Entry ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCli(process.argv.slice(2));
  } catch (err) {
    console.error(`${describeError(err)}\n\n${USAGE}`);
    process.exitCode = 2;
    return;
  }

  if (options.command.name === 'help') {
    console.log(USAGE);
    return;
  }

  const app = await bootstrapNest(options);
  try {
    await run(app, options.command);
  } catch (err) {
    console.error(describeError(err));
    process.exitCode = err instanceof UsageError ? 2 : 1;
  } finally {
    await app.close();
  }
}

main().catch((err: unknown) => {
  console.error(describeError(err));
  process.exitCode = 1;
});
