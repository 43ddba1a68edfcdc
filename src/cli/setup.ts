import { resolve } from 'path';
import type { Logger } from 'pino';
import { ConfigManager } from '../core/config.js';
import { ConfigError } from '../core/errors.js';
import { createLogger, setLogger } from '../core/logger.js';
import type { CliffKnapsackConfig, CliffKnapsackConfigInput } from '../core/types.js';

export interface CommonOptions {
  dir: string;
  verbose?: boolean;
}

export interface CommandContext {
  projectDir: string;
  config: CliffKnapsackConfig;
  logger: Logger;
}

/**
 * Load configuration for `options.dir` and install the process logger.
 */
export function prepareCommand(options: CommonOptions, overrides?: CliffKnapsackConfigInput): CommandContext {
  const projectDir = resolve(options.dir);
  const config = new ConfigManager({ projectDir }).load(overrides);

  const logger = createLogger('cliff-knapsack', {
    level: options.verbose ? 'debug' : config.logging.level,
    pretty: options.verbose || config.logging.pretty,
    file: config.logging.file,
  });
  setLogger(logger);

  return { projectDir, config, logger };
}

/**
 * The instance named on the command line, else `instance.path` from config,
 * resolved against the project directory.
 */
export function resolveInstancePath(argument: string | undefined, context: CommandContext): string {
  const path = argument ?? context.config.instance.path;
  if (!path) {
    throw new ConfigError(
      'No knapsack instance given; pass a path or set instance.path in .cliff-knapsack.yaml',
    );
  }
  return resolve(context.projectDir, path);
}
