/// <reference types="jest" />
import { KinesisClient, PutRecordsCommand } from '@aws-sdk/client-kinesis';
import { mockClient, AwsClientStub } from 'aws-sdk-client-mock';
import { TransportResponseError } from './errors';
import { KinesisTransport, streamDisplayName, streamParams } from './kinesis-transport';
import { KinesisWriter } from './kinesis-writer';
import { BatchEntry } from './types';

const STREAM_ARN = 'arn:aws:kinesis:us-east-2:123456789012:stream/some-stream';

function entries(...keys: string[]): BatchEntry[] {
  return keys.map((key) => ({ data: Buffer.from(key, 'utf-8'), partitionKey: key }));
}

describe('KinesisTransport', () => {
  const kinesisClient: AwsClientStub<KinesisClient> = mockClient(KinesisClient);
  let transport: KinesisTransport;

  beforeEach(() => {
    jest.resetAllMocks();
    kinesisClient.reset();
    transport = new KinesisTransport({ kinesisClient: new KinesisClient({}) });
  });

  it('single success works', async () => {
    kinesisClient.on(PutRecordsCommand).resolves({
      FailedRecordCount: 0,
      Records: [{ ShardId: 'shardId-000000000000', SequenceNumber: '49590' }],
    });

    const outcomes = await transport.submitBatch('some-stream', entries('123'));

    expect(outcomes).toEqual([
      { status: 'accepted', shardId: 'shardId-000000000000', sequenceNumber: '49590' },
    ]);
    const calls = kinesisClient.commandCalls(PutRecordsCommand);
    expect(calls.length).toBe(1);
    expect(calls[0].args[0].input).toEqual({
      StreamName: 'some-stream',
      Records: [{ Data: Buffer.from('123', 'utf-8'), PartitionKey: '123' }],
    });
  });

  it('passes an ARN as StreamARN', async () => {
    kinesisClient.on(PutRecordsCommand).resolves({ Records: [{ ShardId: 'shardId-000000000000' }] });

    await transport.submitBatch(STREAM_ARN, entries('123'));

    const input = kinesisClient.commandCalls(PutRecordsCommand)[0].args[0].input;
    expect(input.StreamARN).toBe(STREAM_ARN);
    expect(input.StreamName).toBeUndefined();
  });

  it('maps failed entries to rejections at the same positions', async () => {
    kinesisClient.on(PutRecordsCommand).resolves({
      FailedRecordCount: 2,
      Records: [
        { ErrorCode: 'ProvisionedThroughputExceededException', ErrorMessage: 'Rate exceeded for shard' },
        { ShardId: 'shardId-000000000001', SequenceNumber: '2' },
        { ErrorCode: 'InternalFailure' },
      ],
    });

    const outcomes = await transport.submitBatch('some-stream', entries('123', '456', '789'));

    expect(outcomes).toEqual([
      {
        status: 'rejected',
        errorCode: 'ProvisionedThroughputExceededException',
        errorMessage: 'Rate exceeded for shard',
      },
      { status: 'accepted', shardId: 'shardId-000000000001', sequenceNumber: '2' },
      { status: 'rejected', errorCode: 'InternalFailure', errorMessage: 'InternalFailure' },
    ]);
  });

  it('throws when no records are returned', async () => {
    kinesisClient.on(PutRecordsCommand).resolves({});

    await expect(transport.submitBatch('some-stream', entries('123'))).rejects.toThrow(
      'kinesis put to some-stream returned no records',
    );
  });

  it('throws when the result count does not match', async () => {
    kinesisClient.on(PutRecordsCommand).resolves({ Records: [{ ShardId: 'shardId-000000000000' }] });

    await expect(transport.submitBatch('some-stream', entries('123', '456'))).rejects.toBeInstanceOf(
      TransportResponseError,
    );
  });

  it('rethrows any underlying KinesisClient.send exception', async () => {
    kinesisClient.onAnyCommand().rejects(new Error('some AWS client error'));

    await expect(transport.submitBatch('some-stream', entries('123'))).rejects.toThrow(
      'some AWS client error',
    );
  });

  it('requeues a throttled record through a KinesisWriter', async () => {
    kinesisClient
      .on(PutRecordsCommand)
      .resolvesOnce({
        FailedRecordCount: 1,
        Records: [
          { ShardId: 'shardId-000000000000', SequenceNumber: '1' },
          { ErrorCode: 'ProvisionedThroughputExceededException', ErrorMessage: 'Rate exceeded' },
          { ShardId: 'shardId-000000000000', SequenceNumber: '2' },
        ],
      })
      .resolves({
        FailedRecordCount: 0,
        Records: [{ ShardId: 'shardId-000000000000', SequenceNumber: '3' }],
      });
    const writer = new KinesisWriter({ streamId: 'some-stream', transport });

    writer.enqueue('123', '123');
    writer.enqueue('456', '456');
    writer.enqueue('789', '789');

    expect(await writer.flush()).toBe(true);
    expect(await writer.flush()).toBe(false);

    const calls = kinesisClient.commandCalls(PutRecordsCommand);
    expect(calls.length).toBe(2);
    expect(calls[1].args[0].input.Records).toEqual([
      { Data: Buffer.from('456', 'utf-8'), PartitionKey: '456' },
    ]);
  });
});

describe('stream identifiers', () => {
  it('uses StreamName for plain names', () => {
    expect(streamParams('some-stream')).toEqual({ StreamName: 'some-stream' });
  });

  it('uses StreamARN for ARNs', () => {
    expect(streamParams(STREAM_ARN)).toEqual({ StreamARN: STREAM_ARN });
  });

  it('shows the resource name of an ARN', () => {
    expect(streamDisplayName(STREAM_ARN)).toBe('some-stream');
    expect(streamDisplayName('some-stream')).toBe('some-stream');
  });
});
