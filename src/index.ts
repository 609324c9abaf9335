export {
  KinesisWriter,
  KinesisWriterOptions,
  BatchLogger,
  PartitionKey,
  KINESIS_MAX_RECORDS_PER_BATCH,
  KINESIS_MAX_BYTES_PER_BATCH,
  KINESIS_MAX_RECORD_BYTES,
  KINESIS_MAX_PARTITION_KEY_BYTES,
} from './kinesis-writer';
export { KinesisTransport, streamParams, streamDisplayName } from './kinesis-transport';
export { drainWriter, backoffDelay, DrainableWriter, DrainOptions, DrainResult } from './kinesis-drain';
export { KinesisBackgroundFlusher } from './kinesis-background-flusher';
export {
  RecordTooLargeError,
  IRecordTooLargeError,
  PartitionKeyTooLargeError,
  IPartitionKeyTooLargeError,
  TransportResponseError,
  FlushInProgressError,
} from './errors';
export { Message, ClassifiedMessage, classifyMessage, encodeMessage } from './message-encoding';
export { loadWriterConfig, createKinesisWriter, WriterConfig } from './config';
export {
  KinesisPutRecordsSend,
  BatchEntry,
  BatchTransport,
  RecordOutcome,
  AcceptedOutcome,
  RejectedOutcome,
  PendingRecord,
} from './types';
