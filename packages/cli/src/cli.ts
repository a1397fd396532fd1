#!/usr/bin/env node

/**
 * vies-batch CLI
 */

import { pathToFileURL } from 'node:url';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { VAT_COLUMN } from '@vies-batch/contracts';
import { errorMessage, LOG_LEVEL_NAMES } from '@vies-batch/shared';
import { resolveConfig } from './config.js';
import { runBatch } from './commands/batch.js';
import { runCheck } from './commands/check.js';
import { createCommandContext } from './commands/context.js';
import chalk from './utils/chalk.js';

export function buildCli(args: string[]) {
  return yargs(args)
    .scriptName('vies-batch')
    .usage('$0 <command> [options]')
    .option('log-level', {
      type: 'string',
      choices: LOG_LEVEL_NAMES,
      describe: 'Process log level (LOG_LEVEL)',
    })
    .option('base-url', { type: 'string', describe: 'VIES REST API root (VIES_BASE_URL)' })
    .option('timeout', { type: 'number', describe: 'Per-request timeout in ms (VIES_TIMEOUT_MS)' })
    .option('dry-run', {
      type: 'boolean',
      default: false,
      describe: 'Answer from an in-process mock instead of VIES',
    })
    .command(
      'check <vat>',
      'Validate one VAT number',
      (y) => y.positional('vat', { type: 'string', demandOption: true, describe: 'VAT number, e.g. IT05159640266' }),
      async (argv) => {
        const config = resolveConfig({
          baseUrl: argv['base-url'],
          timeout: argv.timeout,
          logLevel: argv['log-level'],
        });
        process.exitCode = await runCheck({ vat: argv.vat, dryRun: argv['dry-run'] }, createCommandContext(config));
      },
    )
    .command(
      'batch <input>',
      'Validate every row of a spreadsheet and export the results',
      (y) =>
        y
          .positional('input', { type: 'string', demandOption: true, describe: 'Input .xlsx, .xls, .ods or .csv' })
          .option('output', { alias: 'o', type: 'string', describe: 'Results file (default vat_results_<time>.xlsx)' })
          .option('sheet', { type: 'string', describe: 'Sheet to read (default: first)' })
          .option('concurrency', { type: 'number', describe: 'Parallel lookups (VIES_CONCURRENCY)' })
          .option('batch-timeout', { type: 'number', describe: 'Overall limit in ms, 0 for none (VIES_BATCH_TIMEOUT_MS)' })
          .option('vat-column', { type: 'string', default: VAT_COLUMN, describe: 'Header of the VAT number column' })
          .option('log-file', { type: 'string', describe: 'Save the request log to this text file' })
          .option('filter', { type: 'string', describe: 'List the results matching this text after the summary' }),
      async (argv) => {
        const config = resolveConfig({
          baseUrl: argv['base-url'],
          timeout: argv.timeout,
          concurrency: argv.concurrency,
          batchTimeout: argv['batch-timeout'],
          logLevel: argv['log-level'],
        });
        const ctx = createCommandContext(config);

        const controller = new AbortController();
        const onInterrupt = (): void => {
          ctx.output.err(chalk.yellow('Interrupted: finishing requests in flight, then exporting'));
          controller.abort();
        };
        process.once('SIGINT', onInterrupt);
        try {
          process.exitCode = await runBatch(
            {
              input: argv.input,
              output: argv.output,
              sheet: argv.sheet,
              vatColumn: argv['vat-column'],
              logFile: argv['log-file'],
              filter: argv.filter,
              dryRun: argv['dry-run'],
              signal: controller.signal,
            },
            ctx,
          );
        } finally {
          process.removeListener('SIGINT', onInterrupt);
        }
      },
    )
    .demandCommand(1, 'You need a command: check or batch')
    .strict()
    .fail((msg, err) => {
      console.error(chalk.red('❌ Error:'), err ? err.message : msg);
      if (!err) {
        console.error('\nRun --help to see available commands and options');
      }
      process.exit(1);
    })
    .help()
    .version(false)
    .alias('h', 'help');
}

export async function runCli(args: string[] = hideBin(process.argv)): Promise<void> {
  await buildCli(args).parseAsync();
}

// Run when executed directly
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  runCli().catch((error: unknown) => {
    console.error(chalk.red('❌ CLI error:'), errorMessage(error));
    process.exit(1);
  });
}
