#!/usr/bin/env node

import chalk from 'chalk';
import { config } from '../config';
import { formatComparisonReport } from '../lib/report';
import { BallDontLieClient } from '../services/ballDontLieClient';
import { createResponseCache } from '../services/responseCache';
import { SeasonComparisonService } from '../services/seasonComparisonService';

async function main(): Promise<void> {
  const [playerArg, ...seasonArgs] = process.argv.slice(2);

  if (!playerArg || seasonArgs.length === 0) {
    console.error('Usage: npm run compare -- <playerId> <season> [season...]');
    console.error('Example: npm run compare -- 237 2021 2022 2023');
    process.exit(1);
  }

  if (!config.ballDontLieApiKey) {
    console.error(chalk.red('❌ BALLDONTLIE_API_KEY is not set'));
    process.exit(1);
  }

  const client = new BallDontLieClient({
    apiKey: config.ballDontLieApiKey,
    baseUrl: config.ballDontLieApiBaseUrl,
    cache: createResponseCache(config.cacheDriver, {
      directory: config.cacheDir,
      ttlSeconds: config.cacheTtlSeconds,
    }),
    minRequestIntervalMs: config.apiRateLimitDelayMs,
  });

  const service = new SeasonComparisonService(client);
  const result = await service.compareSeasons(Number(playerArg), seasonArgs.map(Number));

  const lines = formatComparisonReport(result, {
    heading: text => chalk.bold.cyan(text),
    positive: text => chalk.green(text),
    negative: text => chalk.red(text),
    muted: text => chalk.gray(text),
  });
  console.log(lines.join('\n'));
}

main().catch(error => {
  console.error(chalk.red('\n❌ Comparison failed:'));
  console.error(error);
  process.exit(1);
});
