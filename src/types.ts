import { PutRecordsCommand, PutRecordsCommandOutput } from '@aws-sdk/client-kinesis';

/**
 * Anything that can send a PutRecordsCommand: a KinesisClient, or a wrapper around one
 */
export interface KinesisPutRecordsSend {
  send(command: PutRecordsCommand): Promise<PutRecordsCommandOutput>;
}

/**
 * One record as handed to the transport
 */
export interface BatchEntry {
  readonly data: Uint8Array;
  readonly partitionKey: string;
}

export interface AcceptedOutcome {
  readonly status: 'accepted';
  readonly shardId?: string;
  readonly sequenceNumber?: string;
}

export interface RejectedOutcome {
  readonly status: 'rejected';
  readonly errorCode: string;
  readonly errorMessage: string;
}

/**
 * Per-record result of a batch submit, aligned positionally with the submitted entries
 */
export type RecordOutcome = AcceptedOutcome | RejectedOutcome;

/**
 * Submits a bounded list of records to a named stream.
 *
 * Resolves with exactly one outcome per entry, in submission order.
 * Rejects when the call as a whole fails (connectivity, auth, stream not found).
 */
export interface BatchTransport {
  submitBatch(streamId: string, entries: readonly BatchEntry[]): Promise<RecordOutcome[]>;
}

/**
 * A record waiting in the writer's queue
 */
export interface PendingRecord extends BatchEntry {
  /** Bytes this record counts against the per-batch ceiling */
  readonly encodedSize: number;
}
