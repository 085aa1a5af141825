#!/usr/bin/env node

import { Command } from 'commander';
import { AggregateStore } from './aggregate/store.js';
import { entryFilename } from './aggregate/schema.js';
import { CATEGORIES, isCategory, type Category } from './categories.js';
import { loadConfig, resolveConfigPath, type AppConfig } from './config/index.js';
import { errorMessage, getExitCode, wrapError } from './errors.js';
import { ChangeTracker, createPipeline, type DocumentPipeline } from './indexer/index.js';
import { logger } from './utils/logger.js';

const program = new Command();

program
  .name('doc-aggregator')
  .description('Aggregates text from PDF and DOCX documents into one XML file per category')
  .version('0.1.0');

async function loadConfigOrExit(configOption: string | undefined, verbose?: boolean): Promise<AppConfig> {
  const configPath = resolveConfigPath(configOption);
  try {
    const config = await loadConfig(configPath);
    logger.setLevel(verbose ? 'debug' : config.logLevel);
    return config;
  } catch (err) {
    logger.error(`Error loading config file: ${errorMessage(err)}`);
    process.exit(getExitCode(err));
  }
}

program
  .command('run')
  .description('Process new and modified documents under the configured root folder')
  .option('-c, --config <file>', 'Path to the YAML configuration file')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: { config?: string; verbose?: boolean }) => {
    const config = await loadConfigOrExit(options.config, options.verbose);

    let pipeline: DocumentPipeline;
    try {
      pipeline = await createPipeline(config, { logger });
    } catch (err) {
      logger.error(`Failed to initialize: ${errorMessage(err)}`);
      process.exit(getExitCode(err));
    }

    try {
      const report = await pipeline.processDirectory();

      console.log(`\nRun complete!`);
      console.log(`  Processed: ${report.processed}`);
      console.log(`  Skipped: ${report.skipped}`);
      console.log(`  Errors: ${report.errored}`);
      for (const failure of report.save.failed) {
        console.log(`  Not saved: ${failure.category} (${failure.error.message})`);
      }
    } catch (err) {
      logger.error(`Run failed: ${errorMessage(err)}`);
      process.exit(getExitCode(wrapError(err)));
    }
  });

program
  .command('list')
  .description('List the entries in the aggregated XML documents')
  .option('-c, --config <file>', 'Path to the YAML configuration file')
  .option('--category <name>', `Only one category (${CATEGORIES.join('|')})`)
  .action(async (options: { config?: string; category?: string }) => {
    const config = await loadConfigOrExit(options.config);

    let categories: readonly Category[] = CATEGORIES;
    if (options.category !== undefined) {
      if (!isCategory(options.category)) {
        console.error(`Unknown category "${options.category}". Expected one of: ${CATEGORIES.join(', ')}`);
        process.exit(1);
      }
      categories = [options.category];
    }

    try {
      logger.setLevel('warn');
      const store = new AggregateStore(config.outputFolder, config.outputFiles, { logger: logger.child('store') });
      await store.load();

      for (const category of categories) {
        const doc = store.getDocument(category);
        console.log(`\n${category} (${store.outputPath(category)}): ${doc.entries.length} entries`);
        for (const entry of doc.entries) {
          const attrs = Object.entries(entry.attributes)
            .filter(([name]) => name !== 'filename')
            .map(([name, value]) => `${name}=${value}`)
            .join(', ');
          console.log(`  ${entryFilename(entry) ?? '(no filename)'}${attrs ? ` [${attrs}]` : ''} - ${entry.text.length} chars`);
        }
      }
    } catch (err) {
      logger.error(`Failed to list entries: ${errorMessage(err)}`);
      process.exit(1);
    }
  });

program
  .command('forget')
  .description('Drop a file from the tracker so the next run processes it again')
  .argument('<path>', 'Path of the tracked file')
  .option('-c, --config <file>', 'Path to the YAML configuration file')
  .action(async (filePath: string, options: { config?: string }) => {
    const config = await loadConfigOrExit(options.config);

    try {
      const tracker = new ChangeTracker(config.trackerFile, { logger: logger.child('tracker') });
      await tracker.load();

      if (await tracker.forget(filePath)) {
        console.log(`Forgot ${filePath}; it will be processed on the next run.`);
      } else {
        console.log(`${filePath} is not tracked.`);
      }
    } catch (err) {
      logger.error(`Failed to update tracker: ${errorMessage(err)}`);
      process.exit(getExitCode(err));
    }
  });

program.parseAsync().catch((err: unknown) => {
  logger.error(errorMessage(err));
  process.exit(1);
});
