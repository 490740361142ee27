#!/usr/bin/env node
import { loadConfig } from './config.js';
import { dispatch } from './cli/index.js';
import { RecordStore } from './phonebook/index.js';
import { createRepository } from './store/index.js';
import { logger } from './utils/index.js';

async function main() {
  const config = await loadConfig();
  const store = new RecordStore(createRepository(config), { defaultCountry: config.defaultCountry });

  logger.debug('Using data file', config.dataPath, config.git ? '(git versioned)' : '');
  await dispatch(process.argv.slice(1), store);
}

main().catch((err) => {
  logger.error('Fatal error:', err);
  process.exit(1);
});
