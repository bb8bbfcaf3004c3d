/**
 * Option handling shared by all commands.
 */
import { Command } from 'commander';
import { loadConfig, resolveRoots } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { logger as log } from '../utils/logger.js';

export interface CommonOptions {
  config?: string;
  root?: string[];
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export interface CommandContext {
  config: Config;
  /** Absolute search roots, from --root or the config file. */
  roots: string[];
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Add the options every command accepts.
 */
export function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to config file (default: .cookfind.yaml)')
    .option('-r, --root <dir>', 'Search root; repeat to add more (overrides config)', collect)
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Show debug output')
    .option('-q, --quiet', 'Only show errors');
}

/**
 * Load configuration and apply logging options.
 */
export async function loadContext(options: CommonOptions): Promise<CommandContext> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);

  if (options.verbose) {
    log.setLevel('debug');
  } else if (options.quiet) {
    log.setLevel('error');
  } else {
    log.setLevel(config.log_level);
  }

  const roots = options.root?.length
    ? resolveRoots({ ...config, roots: options.root }, projectRoot)
    : resolveRoots(config, projectRoot);
  log.debug('Search roots', { roots });

  return { config, roots };
}

/**
 * Run a command body, reporting failures and exiting with status 1.
 */
export async function runAction(body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    log.error(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
