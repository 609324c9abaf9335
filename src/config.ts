import { KinesisClient } from '@aws-sdk/client-kinesis';
import { KinesisTransport } from './kinesis-transport';
import {
  KINESIS_MAX_BYTES_PER_BATCH,
  KINESIS_MAX_RECORD_BYTES,
  KINESIS_MAX_RECORDS_PER_BATCH,
  KinesisWriter,
} from './kinesis-writer';
import { KinesisPutRecordsSend } from './types';

export interface WriterConfig {
  /** Stream name or ARN */
  streamId: string;
  logBatches: boolean;
  maxRecordsPerBatch: number;
  maxBytesPerBatch: number;
  /** Base pause between flushes that had rejections */
  flushBaseDelayMS: number;
}

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, key: string): string {
  const v = env[key];
  if (!v) throw new Error(`Missing required env: ${key}`);
  return v;
}

function parseIntEnv(env: Env, key: string, defaultValue: number): number {
  const v = env[key];
  if (v === undefined || v === '') return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? defaultValue : n;
}

// Batch limits can only be lowered: PutRecords fails the whole call above them
function parseLimitEnv(env: Env, key: string, max: number): number {
  const n = parseIntEnv(env, key, max);
  if (n <= 0 || n > max) throw new Error(`${key} must be between 1 and ${max}, got ${n}`);
  return n;
}

function parseBoolEnv(env: Env, key: string): boolean {
  const v = env[key]?.toLowerCase();
  return v === 'true' || v === '1';
}

export function loadWriterConfig(env: Env = process.env): WriterConfig {
  return {
    streamId: requireEnv(env, 'KINESIS_STREAM'),
    logBatches: parseBoolEnv(env, 'KINESIS_LOG_BATCHES'),
    maxRecordsPerBatch: parseLimitEnv(env, 'KINESIS_MAX_RECORDS_PER_BATCH', KINESIS_MAX_RECORDS_PER_BATCH),
    maxBytesPerBatch: parseLimitEnv(env, 'KINESIS_MAX_BYTES_PER_BATCH', KINESIS_MAX_BYTES_PER_BATCH),
    flushBaseDelayMS: parseIntEnv(env, 'KINESIS_FLUSH_BASE_DELAY_MS', 100),
  };
}

/**
 * Build a writer backed by a KinesisTransport.
 * A KinesisClient with the default credential chain is created when none is given.
 */
export function createKinesisWriter(
  config: WriterConfig,
  kinesisClient: KinesisPutRecordsSend = new KinesisClient({}),
): KinesisWriter {
  return new KinesisWriter({
    streamId: config.streamId,
    transport: new KinesisTransport({ kinesisClient }),
    maxRecordsPerBatch: config.maxRecordsPerBatch,
    maxBytesPerBatch: config.maxBytesPerBatch,
    maxRecordBytes: Math.min(KINESIS_MAX_RECORD_BYTES, config.maxBytesPerBatch),
    logBatches: config.logBatches,
  });
}
