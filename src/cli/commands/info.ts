import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { RecipeEntry } from '../../core/entry/recipe-entry.js';
import { toRecipeRecord } from '../../bindings/records.js';
import { loadContext, runAction, withCommonOptions, type CommonOptions } from '../context.js';
import { printEntry } from './fetch.js';

/**
 * Create the info command.
 */
export function createInfoCommand(): Command {
  return withCommonOptions(
    new Command('info')
      .description('Show metadata and attached images of a recipe file')
      .argument('<file>', 'Path to a .cook or .menu file')
  ).action(async (file: string, options: CommonOptions) => {
    await runAction(() => runInfo(file, options));
  });
}

async function runInfo(file: string, options: CommonOptions): Promise<void> {
  await loadContext(options);
  const entry = RecipeEntry.fromPath(path.resolve(file));

  if (options.json) {
    console.log(JSON.stringify(toRecipeRecord(entry), null, 2));
    return;
  }

  printEntry(entry);
  const keys = entry.metadata.keys();
  if (keys.length > 0) {
    console.log(`  Metadata:`);
    for (const key of keys) {
      console.log(`    ${chalk.cyan(key)}: ${JSON.stringify(entry.metadata.get(key))}`);
    }
  }
}
