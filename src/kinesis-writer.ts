import { Logger } from '@aws-lambda-powertools/logger';
import {
  FlushInProgressError,
  PartitionKeyTooLargeError,
  RecordTooLargeError,
  TransportResponseError,
} from './errors';
import { streamDisplayName } from './kinesis-transport';
import { encodeMessage, Message, utf8Length } from './message-encoding';
import { BatchTransport, PendingRecord, RecordOutcome } from './types';

// PutRecords limits
export const KINESIS_MAX_RECORDS_PER_BATCH = 500;
export const KINESIS_MAX_BYTES_PER_BATCH = 5 * 1024 * 1024;
export const KINESIS_MAX_RECORD_BYTES = 1024 * 1024;
export const KINESIS_MAX_PARTITION_KEY_BYTES = 256;

export type BatchLogger = Pick<Logger, 'debug'>;

export type PartitionKey = string | number | null;

export interface KinesisWriterOptions {
  /**
   * Stream name or ARN
   */
  streamId: string;

  /**
   * Submits assembled batches, usually a KinesisTransport
   */
  transport: BatchTransport;

  /**
   * May be lowered, but not raised above the PutRecords limit
   * @defaultValue 500
   */
  maxRecordsPerBatch?: number;

  /**
   * Ceiling on the summed encoded size of one batch
   * @defaultValue 5 MiB
   */
  maxBytesPerBatch?: number;

  /**
   * Ceiling on the encoded size of one record (data + partition key + overhead)
   * @defaultValue 1 MiB
   */
  maxRecordBytes?: number;

  /**
   * @defaultValue 256
   */
  maxPartitionKeyBytes?: number;

  /**
   * Bytes added to every record's size on top of data and partition key.
   * Kinesis counts only data and partition key, so this is 0 unless the transport says otherwise.
   * @defaultValue 0
   */
  recordOverheadBytes?: number;

  /**
   * Log one line before and one line after each batch submit, at debug level
   * @defaultValue false
   */
  logBatches?: boolean;

  /**
   * Logger for batch lines; a DEBUG-level powertools Logger is created when omitted
   */
  logger?: BatchLogger;

  /**
   * Millisecond clock used to synthesize partition keys
   * @defaultValue Date.now
   */
  now?: () => number;
}

// Limits may be lowered below what PutRecords accepts, never raised above it
function requireLimit(name: string, value: number, max: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
  if (value > max) {
    throw new Error(`${name} must not exceed ${max}, got ${value}`);
  }
  return value;
}

/**
 * Queues records and writes them to a Kinesis stream in bounded batches.
 *
 * Records rejected within a batch go back to the front of the queue and are
 * retried by the next `flush`. Nothing is sent until `flush` is called; call it
 * repeatedly (with a pause between calls) until it returns false.
 *
 * Not safe for overlapping use: at most one `flush` may be awaiting the transport.
 * If the transport call itself throws, the records of that batch are no longer
 * queued and the caller must decide whether to resend them. A response that does
 * not carry one outcome per record (`TransportResponseError`) puts the whole
 * batch back at the head of the queue before the error is rethrown.
 */
export class KinesisWriter {
  private readonly _streamId: string;
  private readonly _streamName: string;
  private readonly _transport: BatchTransport;
  private readonly _maxRecordsPerBatch: number;
  private readonly _maxBytesPerBatch: number;
  private readonly _maxRecordBytes: number;
  private readonly _maxPartitionKeyBytes: number;
  private readonly _recordOverheadBytes: number;
  private readonly _logger: BatchLogger | undefined;
  private readonly _now: () => number;

  private _queue: PendingRecord[] = [];
  private _queuedBytes = 0;
  private _flushing = false;
  private _acceptedCount = 0;
  private _lastBatchSize = 0;
  private _lastBatchSuccessCount = 0;
  private _lastBatchFailureMessages: ReadonlySet<string> = new Set();

  constructor(options: KinesisWriterOptions) {
    const {
      streamId,
      transport,
      maxRecordsPerBatch = KINESIS_MAX_RECORDS_PER_BATCH,
      maxBytesPerBatch = KINESIS_MAX_BYTES_PER_BATCH,
      maxRecordBytes = KINESIS_MAX_RECORD_BYTES,
      maxPartitionKeyBytes = KINESIS_MAX_PARTITION_KEY_BYTES,
      recordOverheadBytes = 0,
      logBatches = false,
      logger,
      now = Date.now,
    } = options;

    if (streamId === '') {
      throw new Error('streamId must not be empty');
    }
    if (!Number.isInteger(recordOverheadBytes) || recordOverheadBytes < 0) {
      throw new Error(`recordOverheadBytes must be a non-negative integer, got ${recordOverheadBytes}`);
    }
    if (maxRecordBytes > maxBytesPerBatch) {
      throw new Error(
        `maxRecordBytes (${maxRecordBytes}) must not exceed maxBytesPerBatch (${maxBytesPerBatch})`,
      );
    }

    this._streamId = streamId;
    this._streamName = streamDisplayName(streamId);
    this._transport = transport;
    this._maxRecordsPerBatch = requireLimit(
      'maxRecordsPerBatch',
      maxRecordsPerBatch,
      KINESIS_MAX_RECORDS_PER_BATCH,
    );
    this._maxBytesPerBatch = requireLimit('maxBytesPerBatch', maxBytesPerBatch, KINESIS_MAX_BYTES_PER_BATCH);
    this._maxRecordBytes = requireLimit('maxRecordBytes', maxRecordBytes, KINESIS_MAX_RECORD_BYTES);
    this._maxPartitionKeyBytes = requireLimit(
      'maxPartitionKeyBytes',
      maxPartitionKeyBytes,
      KINESIS_MAX_PARTITION_KEY_BYTES,
    );
    this._recordOverheadBytes = recordOverheadBytes;
    this._now = now;

    if (logBatches) {
      this._logger = logger ?? new Logger({ serviceName: 'kinesis-writer', logLevel: 'DEBUG' });
    }
  }

  /**
   * Add a message to the tail of the queue. Never sends anything.
   *
   * @param message - bytes are sent as-is, strings as UTF-8, anything else as JSON
   * @param partitionKey - numbers are stringified, so `0` becomes `"0"`; when
   *   undefined, null or the empty string the current epoch time in seconds is used
   * @throws PartitionKeyTooLargeError
   * @throws RecordTooLargeError
   */
  public enqueue(message: Message, partitionKey?: PartitionKey): void {
    const key =
      partitionKey === undefined || partitionKey === null || partitionKey === ''
        ? String(this._now() / 1000)
        : String(partitionKey);
    const data = encodeMessage(message);

    const partitionKeyBytes = utf8Length(key);
    if (partitionKeyBytes > this._maxPartitionKeyBytes) {
      throw new PartitionKeyTooLargeError({
        partitionKeyBytes,
        maxPartitionKeyBytes: this._maxPartitionKeyBytes,
      });
    }

    const encodedSize = data.byteLength + partitionKeyBytes + this._recordOverheadBytes;
    if (encodedSize > this._maxRecordBytes) {
      throw new RecordTooLargeError({
        recordSize: encodedSize,
        maxRecordBytes: this._maxRecordBytes,
        messageBytes: data.byteLength,
        partitionKeyBytes,
      });
    }

    this._queue.push({ data, partitionKey: key, encodedSize });
    this._queuedBytes += encodedSize;
  }

  /**
   * Send one batch from the head of the queue.
   *
   * Rejected records are put back at the head of the queue, in their relative order.
   *
   * @returns true if records remain queued and `flush` should be called again
   * @throws FlushInProgressError if another `flush` has not finished
   */
  public async flush(): Promise<boolean> {
    if (this._flushing) {
      throw new FlushInProgressError(this._streamId);
    }
    if (this._queue.length === 0) {
      return false;
    }

    this._flushing = true;
    try {
      const batch = this.takeBatch();

      this._logger?.debug(`sending ${batch.length} records to stream ${this._streamName}`, {
        stream: this._streamName,
        recordCount: batch.length,
      });

      let outcomes: RecordOutcome[];
      try {
        outcomes = await this._transport.submitBatch(
          this._streamId,
          batch.map((record) => ({ data: record.data, partitionKey: record.partitionKey })),
        );
      } catch (error: unknown) {
        // The call answered but with no usable result: nothing was confirmed
        if (error instanceof TransportResponseError) {
          this.requeue(batch);
        }
        throw error;
      }
      if (outcomes.length !== batch.length) {
        this.requeue(batch);
        throw new TransportResponseError({
          streamId: this._streamId,
          submittedCount: batch.length,
          returnedCount: outcomes.length,
        });
      }

      const failed: PendingRecord[] = [];
      const failureMessages = new Set<string>();
      for (let recordIndex = 0; recordIndex < batch.length; recordIndex++) {
        const outcome = outcomes[recordIndex];
        if (outcome.status === 'rejected') {
          failed.push(batch[recordIndex]);
          failureMessages.add(outcome.errorMessage);
        }
      }

      // Failures go ahead of anything enqueued while the submit was in flight
      this.requeue(failed);

      const successCount = batch.length - failed.length;
      this._acceptedCount += successCount;
      this._lastBatchSize = batch.length;
      this._lastBatchSuccessCount = successCount;
      this._lastBatchFailureMessages = failureMessages;

      this._logger?.debug(
        `sent ${batch.length} records to stream ${this._streamName}; ${successCount} successful; ${failed.length} failed`,
        {
          stream: this._streamName,
          recordCount: batch.length,
          successCount,
          failureCount: failed.length,
          errorMessages: [...failureMessages].sort(),
        },
      );

      return this._queue.length > 0;
    } finally {
      this._flushing = false;
    }
  }

  /**
   * Put records back at the head of the queue, keeping their order
   */
  private requeue(records: PendingRecord[]): void {
    this._queue = records.concat(this._queue);
    for (const record of records) {
      this._queuedBytes += record.encodedSize;
    }
  }

  /**
   * Remove the longest prefix of the queue that fits both batch limits
   */
  private takeBatch(): PendingRecord[] {
    let count = 0;
    let bytes = 0;
    while (count < this._queue.length && count < this._maxRecordsPerBatch) {
      const size = this._queue[count].encodedSize;
      if (bytes + size > this._maxBytesPerBatch) {
        break;
      }
      bytes += size;
      count++;
    }

    this._queuedBytes -= bytes;
    return this._queue.splice(0, count);
  }

  public get streamId(): string {
    return this._streamId;
  }

  public get maxRecordsPerBatch(): number {
    return this._maxRecordsPerBatch;
  }

  public get maxBytesPerBatch(): number {
    return this._maxBytesPerBatch;
  }

  /**
   * Number of records waiting to be sent
   */
  public get queueLength(): number {
    return this._queue.length;
  }

  /**
   * Sum of the encoded sizes of the queued records
   */
  public get queuedBytes(): number {
    return this._queuedBytes;
  }

  /**
   * @returns true if the queue holds at least one batch's worth of records, by count or by bytes
   */
  public get hasFullBatch(): boolean {
    return (
      this._queue.length >= this._maxRecordsPerBatch || this._queuedBytes >= this._maxBytesPerBatch
    );
  }

  /**
   * Records confirmed by the transport since construction
   */
  public get acceptedCount(): number {
    return this._acceptedCount;
  }

  public get lastBatchSize(): number {
    return this._lastBatchSize;
  }

  public get lastBatchSuccessCount(): number {
    return this._lastBatchSuccessCount;
  }

  /**
   * Distinct error messages of the records rejected in the last batch
   */
  public get lastBatchFailureMessages(): ReadonlySet<string> {
    return this._lastBatchFailureMessages;
  }
}
