#!/usr/bin/env node
import { parseArgs } from 'util';
import {
  CafeStore,
  MemoryCafeStore,
  PostgresCafeStore,
  checkConnection,
  createPool
} from '@cafe-etl/database';
import { loadPipelineConfig } from './config/PipelineConfig';
import { getErrorMessage } from './utils/errorUtils';
import logger from './utils/logger';
import { ETLOrchestrator } from './workers/ETLOrchestrator';

const USAGE = 'Usage: cafe-etl [--config <file>] [--dry-run] <file.csv>...';

async function openStore(dryRun: boolean): Promise<CafeStore> {
  if (dryRun) {
    return new MemoryCafeStore();
  }

  const pool = createPool();
  if (!(await checkConnection(pool))) {
    await pool.end();
    throw new Error('Cannot connect to the database, check DATABASE_URL or POSTGRES_* settings');
  }
  return new PostgresCafeStore(pool);
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      'dry-run': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    }
  });

  if (values.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }
  if (positionals.length === 0) {
    process.stdout.write(`No input files given.\n${USAGE}\n`);
    return 0;
  }

  const config = loadPipelineConfig(values.config);
  const store = await openStore(values['dry-run'] === true);

  try {
    const summary = await new ETLOrchestrator(store, config).runFiles(positionals);
    process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
    return summary.status === 'completed' ? 0 : 1;
  } finally {
    await store.close();
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('ETL run failed', { error: getErrorMessage(error) });
      process.stderr.write(`cafe-etl: ${getErrorMessage(error)}\n`);
      process.exitCode = 1;
    });
}
