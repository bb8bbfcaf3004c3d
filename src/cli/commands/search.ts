import { Command } from 'commander';
import chalk from 'chalk';
import { searchScored } from '../../core/search/search.js';
import { toRecipeRecord } from '../../bindings/records.js';
import { logger as log } from '../../utils/logger.js';
import { loadContext, runAction, withCommonOptions, type CommonOptions } from '../context.js';

interface SearchOptions extends CommonOptions {
  limit?: string;
}

/**
 * Create the search command.
 */
export function createSearchCommand(): Command {
  return withCommonOptions(
    new Command('search')
      .description('Search recipes by file name and content, best match first')
      .argument('<query>', 'Search terms (e.g. "chocolate cake")')
      .option('--limit <n>', 'Maximum results to show')
  ).action(async (query: string, options: SearchOptions) => {
    await runAction(() => runSearch(query, options));
  });
}

async function runSearch(query: string, options: SearchOptions): Promise<void> {
  const { config, roots } = await loadContext(options);
  const limit = options.limit !== undefined ? Number(options.limit) : config.search.limit;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new Error(`Invalid limit: ${options.limit}`);
  }

  const baseDir = roots[0];
  const results = searchScored(baseDir, query).slice(0, limit);

  if (options.json) {
    const records = results.map((result) => ({ score: result.score, ...toRecipeRecord(result.entry) }));
    console.log(JSON.stringify(records, null, 2));
    return;
  }

  if (results.length === 0) {
    log.warn(`No recipes match "${query}"`);
    return;
  }

  for (const { entry, score } of results) {
    console.log(`${chalk.yellow(score.toFixed(1).padStart(5))}  ${chalk.bold(entry.name ?? '(unnamed)')}`);
    console.log(`       ${chalk.dim(entry.path ?? '')}`);
  }
}
