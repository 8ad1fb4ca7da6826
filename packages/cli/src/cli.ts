/**
 * @opbind/cli - CLI for the opbind operator binding generator
 */

import { Command } from 'commander';
import { OPBIND_VERSION } from '@opbind/core';
import { generateCommand } from './commands/generate.js';
import { listCommand } from './commands/list.js';
import { ownersCommand } from './commands/owners.js';

const program = new Command();

program
  .name('opbind')
  .description('Generate typed operator bindings from a native operator registry')
  .version(OPBIND_VERSION);

program.addCommand(generateCommand);
program.addCommand(listCommand);
program.addCommand(ownersCommand);

await program.parseAsync();
