export interface IRecordTooLargeError {
  readonly recordSize: number;
  readonly maxRecordBytes: number;
  readonly messageBytes: number;
  readonly partitionKeyBytes: number;
}

/**
 * The encoded record exceeds the single-record ceiling.
 * Thrown by `enqueue`; the record never enters the queue.
 */
export class RecordTooLargeError extends Error implements IRecordTooLargeError {
  public readonly recordSize: number;
  public readonly maxRecordBytes: number;
  public readonly messageBytes: number;
  public readonly partitionKeyBytes: number;

  constructor(args: IRecordTooLargeError) {
    super(
      `message too large: ${args.recordSize} > ${args.maxRecordBytes} (base message length = ${args.messageBytes}, partition key length = ${args.partitionKeyBytes})`,
    );
    this.name = 'RecordTooLargeError';
    this.recordSize = args.recordSize;
    this.maxRecordBytes = args.maxRecordBytes;
    this.messageBytes = args.messageBytes;
    this.partitionKeyBytes = args.partitionKeyBytes;
  }
}

export interface IPartitionKeyTooLargeError {
  readonly partitionKeyBytes: number;
  readonly maxPartitionKeyBytes: number;
}

/**
 * The UTF-8 encoded partition key is longer than Kinesis accepts
 */
export class PartitionKeyTooLargeError extends Error implements IPartitionKeyTooLargeError {
  public readonly partitionKeyBytes: number;
  public readonly maxPartitionKeyBytes: number;

  constructor(args: IPartitionKeyTooLargeError) {
    super(`partition key too large: ${args.partitionKeyBytes} > ${args.maxPartitionKeyBytes}`);
    this.name = 'PartitionKeyTooLargeError';
    this.partitionKeyBytes = args.partitionKeyBytes;
    this.maxPartitionKeyBytes = args.maxPartitionKeyBytes;
  }
}

/**
 * The transport answered, but not with one result per submitted record
 */
export class TransportResponseError extends Error {
  public readonly streamId: string;
  public readonly submittedCount: number;
  public readonly returnedCount: number | undefined;

  constructor(args: { streamId: string; submittedCount: number; returnedCount?: number }) {
    super(
      args.returnedCount === undefined
        ? `kinesis put to ${args.streamId} returned no records`
        : `kinesis put to ${args.streamId} returned ${args.returnedCount} results for ${args.submittedCount} records`,
    );
    this.name = 'TransportResponseError';
    this.streamId = args.streamId;
    this.submittedCount = args.submittedCount;
    this.returnedCount = args.returnedCount;
  }
}

/**
 * `flush` was called while an earlier `flush` on the same writer was still waiting on the transport
 */
export class FlushInProgressError extends Error {
  constructor(streamId: string) {
    super(`flush already in progress for stream ${streamId}`);
    this.name = 'FlushInProgressError';
  }
}
