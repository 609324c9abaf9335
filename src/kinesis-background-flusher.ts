import { IterableQueueMapperSimple } from '@shutterstock/p-map-iterable';
import { drainWriter, DrainOptions } from './kinesis-drain';
import { KinesisWriter, PartitionKey } from './kinesis-writer';
import { Message } from './message-encoding';

/**
 * Accepts messages and flushes full batches in the background, one flush at a time
 */
export class KinesisBackgroundFlusher {
  private readonly _flusher: IterableQueueMapperSimple<number>;
  private readonly _writer: KinesisWriter;
  private readonly _drainOptions: DrainOptions;
  private readonly _errors: Error[] = [];
  private _flushRequests = 0;
  private _closed = false;
  private _idle = false;

  /**
   * Creates a new KinesisBackgroundFlusher
   *
   * Only one flush runs at a time. While it runs, a `send` that completes
   * another full batch will not return until the running flush finishes.
   *
   * @param options KinesisBackgroundFlusher options
   */
  constructor(options: {
    /**
     * Required - the writer to enqueue into and flush
     */
    writer: KinesisWriter;

    /**
     * Pacing for the final drain in `onIdle`
     */
    drainOptions?: DrainOptions;
  }) {
    const { writer, drainOptions = {} } = options;

    this.worker = this.worker.bind(this);
    this._writer = writer;
    this._drainOptions = drainOptions;
    this._flusher = new IterableQueueMapperSimple<number>(this.worker, {
      concurrency: 1,
    });
  }

  private async worker(): Promise<void> {
    try {
      await this._writer.flush();
    } catch (error: unknown) {
      // Kept here rather than on IterableQueueMapperSimple's own error list, which we do not expose
      this._errors.push(error instanceof Error ? error : new Error(String(error)));
    }
  }

  /*
   * Accumulated errors from background flushes and the final drain
   */
  public get errors(): readonly Error[] {
    return this._errors;
  }

  public get writer(): KinesisWriter {
    return this._writer;
  }

  /**
   * Enqueue a message on the writer. If the queue now holds a full batch,
   * schedule a flush, waiting for the running flush to finish if there is one.
   *
   * Oversize records throw here, as they do from `KinesisWriter.enqueue`.
   *
   * MUST await `onIdle` to send whatever is still queued
   */
  public async send(message: Message, partitionKey?: PartitionKey): Promise<void> {
    if (this._closed) {
      throw new Error('send called after onIdle');
    }
    this._writer.enqueue(message, partitionKey);
    if (this._writer.hasFullBatch) {
      await this._flusher.enqueue(this._flushRequests++);
    }
  }

  /**
   * Wait for scheduled flushes, then flush until the writer's queue is empty.
   * MUST be called before exit to ensure no lost writes.
   */
  public async onIdle(): Promise<void> {
    this._closed = true;
    await this._flusher.onIdle();
    try {
      await drainWriter(this._writer, this._drainOptions);
    } catch (error: unknown) {
      this._errors.push(error instanceof Error ? error : new Error(String(error)));
    }
    this._idle = true;
  }

  /**
   * @returns true if .onIdle() has been called and finished all background writes
   */
  public get isIdle(): boolean {
    return this._idle;
  }
}
