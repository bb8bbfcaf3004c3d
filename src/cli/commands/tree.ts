import { Command } from 'commander';
import chalk from 'chalk';
import { buildTree } from '../../core/tree/builder.js';
import { allNodes } from '../../core/tree/navigation.js';
import type { RecipeTree } from '../../core/tree/types.js';
import { toTreeNodeRecord } from '../../bindings/records.js';
import { loadContext, runAction, withCommonOptions, type CommonOptions } from '../context.js';

/**
 * Create the tree command.
 */
export function createTreeCommand(): Command {
  return withCommonOptions(
    new Command('tree').description('Show the recipes of the first search root as a directory tree')
  ).action(async (options: CommonOptions) => {
    await runAction(() => runTree(options));
  });
}

async function runTree(options: CommonOptions): Promise<void> {
  const { roots } = await loadContext(options);
  const tree = buildTree(roots[0]);

  if (options.json) {
    console.log(JSON.stringify(allNodes(tree).map(toTreeNodeRecord), null, 2));
    return;
  }
  for (const line of formatTree(tree)) {
    console.log(line);
  }
}

/**
 * Indented outline of a tree: directories first, each level sorted by name.
 */
export function formatTree(tree: RecipeTree, depth = 0): string[] {
  const indent = '  '.repeat(depth);
  const lines = [tree.recipe ? `${indent}${tree.name}` : `${indent}${chalk.bold(`${tree.name}/`)}`];

  const children = [...tree.children.values()].sort((a, b) => {
    const aDir = a.recipe === undefined;
    const bDir = b.recipe === undefined;
    if (aDir !== bDir) return aDir ? -1 : 1;
    return a.name.localeCompare(b.name);
  });
  for (const child of children) {
    lines.push(...formatTree(child, depth + 1));
  }
  return lines;
}
