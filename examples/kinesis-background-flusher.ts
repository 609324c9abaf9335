/* eslint-disable no-console */
import { createKinesisWriter, KinesisBackgroundFlusher, loadWriterConfig } from '../src';

const { RECORDS_TO_WRITE = '40000' } = process.env;
const RECORDS_TO_WRITE_NUM = parseInt(RECORDS_TO_WRITE, 10);

async function main() {
  const config = loadWriterConfig();
  const flusher = new KinesisBackgroundFlusher({
    writer: createKinesisWriter(config),
    drainOptions: { baseDelayMS: config.flushBaseDelayMS },
  });

  console.log(`Writing ${RECORDS_TO_WRITE_NUM} records to ${config.streamId}`);

  console.time(`Adding ${RECORDS_TO_WRITE_NUM} records took`);
  for (let i = 0; i < RECORDS_TO_WRITE_NUM; i++) {
    await flusher.send(`record ${i}`);
  }
  console.timeEnd(`Adding ${RECORDS_TO_WRITE_NUM} records took`);

  // Need to wait until the flusher is idle (has sent everything still queued)
  console.time('Waiting for flusher to be idle');
  await flusher.onIdle();
  console.timeEnd('Waiting for flusher to be idle');

  console.log('Records accepted:', flusher.writer.acceptedCount);
  console.log('Number of errors:', flusher.errors.length);
  flusher.errors.forEach((error) => {
    console.error(error);
  });
}

void main();
