#!/usr/bin/env node

import chalk from 'chalk';
import { config } from '../config';
import { createResponseCache } from '../services/responseCache';

async function main(): Promise<void> {
  if (config.cacheDriver !== 'file') {
    console.log(chalk.yellow(`⚠️ Cache driver is '${config.cacheDriver}'; nothing is kept between runs`));
    return;
  }

  const cache = createResponseCache(config.cacheDriver, {
    directory: config.cacheDir,
    ttlSeconds: config.cacheTtlSeconds,
  });
  await cache.clear();
  console.log(chalk.green(`🧹 Cleared cached BallDontLie responses in ${config.cacheDir}`));
}

main().catch(error => {
  console.error(chalk.red('\n❌ Failed to clear cache:'));
  console.error(error);
  process.exit(1);
});
