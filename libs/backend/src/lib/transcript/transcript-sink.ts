import { Logger } from '@nestjs/common';
import { EMPTY, catchError, concatMap, defer, lastValueFrom, type Observable } from 'rxjs';
import type { TranscriptLine } from '@scribeloop/shared-types';
import { describeError } from '../errors.js';

export interface TranscriptSink {
  readonly name: string;
  write(line: TranscriptLine): Promise<void>;
}

const logger = new Logger('TranscriptSink');

/**
 * Feeds lines to `sink` one write at a time, in order. A failed write is
 * logged and the next line still goes through. Resolves once `lines$`
 * completes and every write has settled.
 */
export function pipeToSink(lines$: Observable<TranscriptLine>, sink: TranscriptSink): Promise<void> {
  return lastValueFrom(
    lines$.pipe(
      concatMap((line) =>
        defer(() => sink.write(line)).pipe(
          catchError((err: unknown) => {
            logger.warn(`${sink.name}: failed to write line ${line.index}: ${describeError(err)}`);
            return EMPTY;
          }),
        ),
      ),
    ),
    { defaultValue: undefined },
  );
}
