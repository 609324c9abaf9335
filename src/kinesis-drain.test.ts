/// <reference types="jest" />
import { backoffDelay, drainWriter } from './kinesis-drain';
import { KinesisWriter } from './kinesis-writer';
import { BatchEntry, RecordOutcome } from './types';

const accepted: RecordOutcome = { status: 'accepted' };
const throttled: RecordOutcome = {
  status: 'rejected',
  errorCode: 'ProvisionedThroughputExceededException',
  errorMessage: 'Rate exceeded',
};

function writerWith(decide: (index: number, call: number) => RecordOutcome) {
  let call = 0;
  const submitBatch = jest.fn(async (_streamId: string, entries: readonly BatchEntry[]) => {
    const thisCall = call++;
    return entries.map((_entry, index) => decide(index, thisCall));
  });
  const writer = new KinesisWriter({
    streamId: 'some-stream',
    transport: { submitBatch },
    maxRecordsPerBatch: 2,
  });
  return { writer, submitBatch };
}

describe('drainWriter', () => {
  let sleep: jest.Mock<Promise<void>, [number]>;

  beforeEach(() => {
    jest.restoreAllMocks();
    sleep = jest.fn<Promise<void>, [number]>(async () => undefined);
    jest.spyOn(Math, 'random').mockReturnValue(0.5);
  });

  it('flushes back to back while every batch is accepted', async () => {
    const { writer, submitBatch } = writerWith(() => accepted);
    for (let i = 0; i < 5; i++) {
      writer.enqueue(`message ${i}`, `k${i}`);
    }

    const result = await drainWriter(writer, { sleep });

    expect(result).toEqual({ flushes: 3, drained: true });
    expect(submitBatch).toHaveBeenCalledTimes(3);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('backs off exponentially while nothing gets through', async () => {
    const { writer } = writerWith((_index, call) => (call < 2 ? throttled : accepted));
    writer.enqueue('a', 'k1');

    const result = await drainWriter(writer, { sleep, baseDelayMS: 100 });

    expect(result).toEqual({ flushes: 3, drained: true });
    // floor(0.5 * (100 * 2^n - 100)) + 100
    expect(sleep.mock.calls.map((args) => args[0])).toEqual([150, 250]);
  });

  it('resets the backoff once any record is accepted', async () => {
    const { writer } = writerWith((index, call) => (call === 0 || (call === 1 && index === 1) ? throttled : accepted));
    writer.enqueue('a', 'k1');
    writer.enqueue('b', 'k2');

    const result = await drainWriter(writer, { sleep, baseDelayMS: 100 });

    expect(result).toEqual({ flushes: 3, drained: true });
    expect(sleep.mock.calls.map((args) => args[0])).toEqual([150, 100]);
  });

  it('stops after maxFlushes without draining', async () => {
    const { writer, submitBatch } = writerWith(() => throttled);
    writer.enqueue('a', 'k1');

    const result = await drainWriter(writer, { sleep, maxFlushes: 3 });

    expect(result).toEqual({ flushes: 3, drained: false });
    expect(submitBatch).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(writer.queueLength).toBe(1);
  });

  it('does not call flush on an empty writer more than once', async () => {
    const { writer, submitBatch } = writerWith(() => accepted);

    expect(await drainWriter(writer, { sleep })).toEqual({ flushes: 1, drained: true });
    expect(submitBatch).not.toHaveBeenCalled();
  });

  it('rethrows transport failures', async () => {
    const writer = new KinesisWriter({
      streamId: 'some-stream',
      transport: { submitBatch: jest.fn().mockRejectedValue(new Error('some AWS client error')) },
    });
    writer.enqueue('a', 'k1');

    await expect(drainWriter(writer, { sleep })).rejects.toThrow('some AWS client error');
  });
});

describe('backoffDelay', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('stays between the base delay and base * 2^attempt', () => {
    jest.spyOn(Math, 'random').mockReturnValue(0.999);
    expect(backoffDelay(100, 0)).toBe(100);
    expect(backoffDelay(100, 3)).toBe(799);
  });

  it('is capped by the maximum delay', () => {
    jest.spyOn(Math, 'random').mockReturnValue(0.5);
    expect(backoffDelay(100, 10, 1000)).toBe(1000);
  });
});
