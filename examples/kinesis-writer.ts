/* eslint-disable no-console */
import { createKinesisWriter, drainWriter, loadWriterConfig } from '../src';

const { RECORDS_TO_WRITE = '10000' } = process.env;
const RECORDS_TO_WRITE_NUM = parseInt(RECORDS_TO_WRITE, 10);

async function main() {
  const config = loadWriterConfig();
  const writer = createKinesisWriter(config);

  console.log(`Writing ${RECORDS_TO_WRITE_NUM} records to ${config.streamId}`);

  for (let i = 0; i < RECORDS_TO_WRITE_NUM; i++) {
    writer.enqueue({ sequence: i, writtenAt: new Date().toISOString() }, `partition-${i % 16}`);

    // Send whenever a full batch has built up so the queue stays small
    if (writer.hasFullBatch) {
      await writer.flush();
    }
  }

  console.time('Draining the writer');
  const { flushes } = await drainWriter(writer, { baseDelayMS: config.flushBaseDelayMS });
  console.timeEnd('Draining the writer');

  console.log(`Drained after ${flushes} flushes; ${writer.acceptedCount} records accepted`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
