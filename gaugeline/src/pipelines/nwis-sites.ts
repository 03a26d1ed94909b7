/**
 * Build the nationwide NWIS site catalog (data/usgs_all_sites.parquet).
 *
 * Usage: node --import tsx src/pipelines/nwis-sites.ts [STATE ...]
 * Example: node --import tsx src/pipelines/nwis-sites.ts MD VA
 */
import 'dotenv/config';
import { loadConfig } from '../config.js';
import { FatalError } from '../core/errors.js';
import { runCatalogBuild } from '../ingestion/run.js';

async function main(): Promise<number> {
  const states = process.argv.slice(2);
  try {
    return await runCatalogBuild(loadConfig(), { states });
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
