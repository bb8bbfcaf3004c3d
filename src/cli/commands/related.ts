import { Command } from 'commander';
import { getRecipe } from '../../core/fetcher/fetcher.js';
import { logger as log } from '../../utils/logger.js';
import { loadContext, runAction, withCommonOptions, type CommonOptions } from '../context.js';

/**
 * Create the related command.
 */
export function createRelatedCommand(): Command {
  return withCommonOptions(
    new Command('related')
      .description('List the images and referenced recipes a recipe depends on')
      .argument('<name>', 'Recipe name, with or without extension')
  ).action(async (name: string, options: CommonOptions) => {
    await runAction(() => runRelated(name, options));
  });
}

async function runRelated(name: string, options: CommonOptions): Promise<void> {
  const { roots } = await loadContext(options);
  const entry = getRecipe(roots, name);
  const files = entry.relatedFiles;

  if (options.json) {
    console.log(JSON.stringify({ path: entry.path, relatedFiles: files }, null, 2));
    return;
  }
  if (files.length === 0) {
    log.info(`${entry.name ?? name} has no related files`);
    return;
  }
  for (const file of files) {
    console.log(file);
  }
}
