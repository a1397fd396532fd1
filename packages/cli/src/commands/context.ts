import type { ChalkInstance } from 'chalk';
import {
  createLogger,
  defaultClock,
  type AppConfig,
  type Clock,
  type Logger,
} from '@vies-batch/shared';
import { openViesClient, type ClientHandle, type OpenClientOptions } from '../client.js';
import chalk from '../utils/chalk.js';

/**
 * Where commands print. Results go to `out`, problems to `err`.
 */
export interface CommandOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: CommandOutput = {
  out: (line) => {
    console.log(line);
  },
  err: (line) => {
    console.error(line);
  },
};

/**
 * Everything a command needs, injectable for tests.
 */
export interface CommandContext {
  config: AppConfig;
  output: CommandOutput;
  colors: ChalkInstance;
  logger: Logger;
  clock: Clock;
  openClient(options: OpenClientOptions): ClientHandle;
}

export function createCommandContext(config: AppConfig): CommandContext {
  const logger = createLogger({ level: config.logLevel, prefix: 'vies-batch' });
  return {
    config,
    output: consoleOutput,
    colors: chalk,
    logger,
    clock: defaultClock,
    openClient: (options) => openViesClient(config, options, logger),
  };
}
