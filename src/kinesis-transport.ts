import {
  PutRecordsCommand,
  PutRecordsCommandInput,
  PutRecordsResultEntry,
} from '@aws-sdk/client-kinesis';
import { TransportResponseError } from './errors';
import { BatchEntry, BatchTransport, KinesisPutRecordsSend, RecordOutcome } from './types';

type StreamParams = Pick<PutRecordsCommandInput, 'StreamName' | 'StreamARN'>;

/**
 * ARNs go in `StreamARN`, everything else in `StreamName`
 */
export function streamParams(streamId: string): StreamParams {
  return streamId.startsWith('arn:') ? { StreamARN: streamId } : { StreamName: streamId };
}

/**
 * Name to show in logs: the resource part of an ARN, or the identifier as given
 */
export function streamDisplayName(streamId: string): string {
  if (!streamId.startsWith('arn:')) {
    return streamId;
  }
  return streamId.substring(streamId.lastIndexOf('/') + 1);
}

function toOutcome(entry: PutRecordsResultEntry): RecordOutcome {
  if (entry.ErrorCode !== undefined) {
    return {
      status: 'rejected',
      errorCode: entry.ErrorCode,
      errorMessage: entry.ErrorMessage ?? entry.ErrorCode,
    };
  }
  return { status: 'accepted', shardId: entry.ShardId, sequenceNumber: entry.SequenceNumber };
}

/**
 * Submits batches with a single PutRecordsCommand each
 */
export class KinesisTransport implements BatchTransport {
  private readonly _kinesisClient: KinesisPutRecordsSend;

  /**
   * Creates a new KinesisTransport
   * @param options KinesisTransport options
   * @param options.kinesisClient - The KinesisClient instance, or anything with the same `send`
   */
  constructor(options: { kinesisClient: KinesisPutRecordsSend }) {
    this._kinesisClient = options.kinesisClient;
  }

  /**
   * Send one PutRecordsCommand and map each result entry to an outcome.
   *
   * Exceptions from the client are not caught.
   */
  public async submitBatch(streamId: string, entries: readonly BatchEntry[]): Promise<RecordOutcome[]> {
    const result = await this._kinesisClient.send(
      new PutRecordsCommand({
        ...streamParams(streamId),
        Records: entries.map((entry) => ({
          Data: entry.data,
          PartitionKey: entry.partitionKey,
        })),
      }),
    );

    if (result.Records === undefined) {
      throw new TransportResponseError({ streamId, submittedCount: entries.length });
    }
    if (result.Records.length !== entries.length) {
      throw new TransportResponseError({
        streamId,
        submittedCount: entries.length,
        returnedCount: result.Records.length,
      });
    }

    return result.Records.map(toOutcome);
  }
}
