import { Command } from 'commander';
import chalk from 'chalk';
import { getRecipe } from '../../core/fetcher/fetcher.js';
import type { RecipeEntry } from '../../core/entry/recipe-entry.js';
import { toRecipeRecord, toStepImagesRecord } from '../../bindings/records.js';
import { loadContext, runAction, withCommonOptions, type CommonOptions } from '../context.js';

/**
 * Create the fetch command.
 */
export function createFetchCommand(): Command {
  return withCommonOptions(
    new Command('fetch')
      .description('Load a recipe or menu by name from the search roots')
      .argument('<name>', 'Recipe name, with or without extension (e.g. "pancakes", "weekly.menu")')
  ).action(async (name: string, options: CommonOptions) => {
    await runAction(() => runFetch(name, options));
  });
}

async function runFetch(name: string, options: CommonOptions): Promise<void> {
  const { roots } = await loadContext(options);
  const entry = getRecipe(roots, name);

  if (options.json) {
    console.log(JSON.stringify(toRecipeRecord(entry), null, 2));
    return;
  }
  printEntry(entry);
}

/**
 * Human-readable summary of an entry.
 */
export function printEntry(entry: RecipeEntry): void {
  console.log(chalk.bold(entry.name ?? '(unnamed)') + (entry.isMenu ? chalk.dim(' [menu]') : ''));
  if (entry.path) {
    console.log(`  Path:        ${entry.path}`);
  }
  if (entry.metadata.servings !== undefined) {
    console.log(`  Servings:    ${entry.metadata.servings}`);
  }
  if (entry.tags.length > 0) {
    console.log(`  Tags:        ${entry.tags.map((tag) => chalk.cyan(tag)).join(', ')}`);
  }
  if (entry.titleImage) {
    console.log(`  Title image: ${entry.titleImage}`);
  }

  const steps = toStepImagesRecord(entry.stepImages);
  if (steps.count > 0) {
    console.log(`  Step images:`);
    for (const image of steps.images) {
      const label = image.section === 0 ? `step ${image.step}` : `section ${image.section}, step ${image.step}`;
      console.log(`    ${chalk.dim(label)}  ${image.imagePath}`);
    }
  }
}
