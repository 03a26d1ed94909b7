/**
 * Collect instantaneous values for every state in the site catalog, one
 * Parquet file per state under data/iv/.
 *
 * Usage: node --import tsx src/pipelines/nwis-collect.ts [--resume] [STATE ...]
 * Example: node --import tsx src/pipelines/nwis-collect.ts --resume CA NV
 */
import 'dotenv/config';
import { loadConfig } from '../config.js';
import { FatalError } from '../core/errors.js';
import { runCollection } from '../ingestion/run.js';

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const resume = args.includes('--resume');
  const states = args.filter((arg) => !arg.startsWith('--'));

  try {
    const { exitCode } = await runCollection(loadConfig(), { states, resume });
    return exitCode;
  } catch (err) {
    if (err instanceof FatalError) {
      console.error(`[FATAL] ${err.message}`);
      return 1;
    }
    throw err;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
