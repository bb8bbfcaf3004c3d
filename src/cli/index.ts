import { Command } from 'commander';
import { libraryVersion } from '../bindings/records.js';
import { createFetchCommand } from './commands/fetch.js';
import { createSearchCommand } from './commands/search.js';
import { createTreeCommand } from './commands/tree.js';
import { createRelatedCommand } from './commands/related.js';
import { createInfoCommand } from './commands/info.js';

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('cookfind')
    .description('Find, search and browse Cooklang recipe collections')
    .version(libraryVersion());
  [createFetchCommand, createSearchCommand, createTreeCommand, createRelatedCommand, createInfoCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}
