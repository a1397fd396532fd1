/**
 * @vies-batch/cli
 *
 * @packageDocumentation
 */

export { buildCli, runCli } from './cli.js';
export { runCheck, type CheckCommandOptions } from './commands/check.js';
export { runBatch, type BatchCommandOptions } from './commands/batch.js';
export {
  createCommandContext,
  consoleOutput,
  type CommandContext,
  type CommandOutput,
} from './commands/context.js';
export { resolveConfig, type ConfigFlags } from './config.js';
export { openViesClient, type ClientHandle, type OpenClientOptions } from './client.js';
export { displayVat, formatStatus, formatCheckResult, formatProgress, formatSummary } from './format.js';
