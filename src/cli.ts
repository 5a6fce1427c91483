#!/usr/bin/env node
/**
 * Batch entry point
 * Converts decoded review sheets into the RS table set, year by year
 */

import { parseCliOptions, USAGE } from './app/cli-options.js';
import { hasFailures, runBatches } from './app/run-batches.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import {
  createCsvSourceRepo,
  createCsvTableSink,
  loadMinistryDirectory,
} from './modules/review-sheets/index.js';
import { createTextNormalizer, loadLongVowelDictionary } from './modules/text-normalization/index.js';

const main = async (): Promise<number> => {
  const optionsResult = parseCliOptions(process.argv.slice(2));
  if (optionsResult.isErr()) {
    process.stderr.write(`${optionsResult.error.message}\n\n${USAGE}`);
    return 2;
  }

  const options = optionsResult.value;
  if (options.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: 'rs-tables',
    pretty: config.logger.pretty,
  });

  const inputDir = options.inputDir ?? config.paths.inputDir;
  const outputDir = options.outputDir ?? config.paths.outputDir;
  const writeProfiles = config.output.writeProfiles && !options.skipProfiles;

  logger.info({ inputDir, outputDir, writeProfiles, year: options.year }, 'Starting RS table build');

  const dictionaryResult = await loadLongVowelDictionary(config.paths.dictionary);
  if (dictionaryResult.isErr()) {
    logger.fatal({ err: dictionaryResult.error }, 'Failed to load long-vowel dictionary');
    return 1;
  }

  const ministriesResult = await loadMinistryDirectory(config.paths.ministryMaster);
  if (ministriesResult.isErr()) {
    logger.fatal({ err: ministriesResult.error }, 'Failed to load ministry master');
    return 1;
  }

  const runResult = await runBatches(
    {
      sourceRepo: createCsvSourceRepo({ rootDir: inputDir }),
      sink: createCsvTableSink({ rootDir: outputDir, writeProfiles, logger }),
      normalizer: createTextNormalizer({ longVowelDictionary: dictionaryResult.value }),
      ministries: ministriesResult.value,
      logger,
    },
    options.year !== undefined ? { years: [options.year] } : {}
  );

  if (runResult.isErr()) {
    logger.fatal({ err: runResult.error }, 'Failed to list source years');
    return 1;
  }

  const summary = runResult.value;
  logger.info(
    {
      years: summary.years.map((year) => year.fiscalYear),
      failedYears: summary.failedYears.map((year) => year.fiscalYear),
      total: summary.total,
      succeeded: summary.succeeded,
      skipped: summary.skipped,
      failed: summary.failed,
    },
    'RS table build finished'
  );

  return hasFailures(summary) ? 1 : 0;
};

await main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
