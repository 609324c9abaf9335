import { promisify } from 'util';
import { KinesisWriter } from './kinesis-writer';
const sleep = promisify(setTimeout);

export type DrainableWriter = Pick<KinesisWriter, 'flush' | 'lastBatchSize' | 'lastBatchSuccessCount'>;

export interface DrainOptions {
  /**
   * Delay, in milliseconds, after the first batch that had rejections
   * @defaultValue 100
   */
  baseDelayMS?: number;

  /**
   * @defaultValue 10000
   */
  maxDelayMS?: number;

  /**
   * Give up after this many `flush` calls
   * @defaultValue unbounded
   */
  maxFlushes?: number;

  /**
   * Replaces the timer-based wait between flushes
   */
  sleep?: (ms: number) => Promise<void>;
}

export interface DrainResult {
  readonly flushes: number;
  readonly drained: boolean;
}

// Source: https://dev.solita.fi/2020/05/28/kinesis-streams-part-1.html
export function backoffDelay(baseDelayMS: number, attempt: number, maxDelayMS = Infinity): number {
  const exponentialDelay = baseDelayMS * 2 ** attempt;
  return Math.min(
    Math.floor(Math.random() * (exponentialDelay - baseDelayMS)) + baseDelayMS,
    maxDelayMS,
  );
}

/**
 * Call `flush` until the writer's queue is empty.
 *
 * No pause follows a batch that was accepted in full. After a batch with
 * rejections the pause grows exponentially (with jitter) while nothing gets
 * through, and resets once any record is accepted.
 *
 * Transport exceptions from `flush` are not caught.
 */
export async function drainWriter(
  writer: DrainableWriter,
  options: DrainOptions = {},
): Promise<DrainResult> {
  const { baseDelayMS = 100, maxDelayMS = 10000, maxFlushes = Infinity, sleep: wait = sleep } = options;

  let flushes = 0;
  let attempt = 0;
  while (flushes < maxFlushes) {
    const more = await writer.flush();
    flushes++;
    if (!more) {
      return { flushes, drained: true };
    }
    if (flushes >= maxFlushes) {
      break;
    }

    if (writer.lastBatchSuccessCount === writer.lastBatchSize) {
      attempt = 0;
      continue;
    }
    attempt = writer.lastBatchSuccessCount > 0 ? 0 : attempt + 1;
    await wait(backoffDelay(baseDelayMS, attempt, maxDelayMS));
  }

  return { flushes, drained: false };
}
