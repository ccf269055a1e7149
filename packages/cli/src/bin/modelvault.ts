#!/usr/bin/env tsx

/**
 * modelvault CLI Entry Point
 *
 * Command modules register their groups in commandRegistry when imported.
 * registerXCommands functions add the Commander commands and options.
 */

import { program } from 'commander';
import { reportError } from '../core/error-handler.js';
import { commandRegistry } from '../core/command-registry.js';
import { registerModelCommands } from '../commands/models.js';
import { registerVersionCommands } from '../commands/versions.js';
import { registerAliasCommands } from '../commands/aliases.js';
import { registerArtifactCommands } from '../commands/artifacts.js';
import { registerServerCommands } from '../commands/server.js';

program.name('modelvault').description('modelvault CLI - registry of versioned model artifacts').version('0.1.0');

registerModelCommands(program);
registerVersionCommands(program);
registerAliasCommands(program);
registerArtifactCommands(program);
registerServerCommands(program);

program.addHelpText('after', () => {
  const examples = commandRegistry
    .getGroups()
    .flatMap((group) => group.commands.flatMap((command) => command.examples?.slice(0, 1) ?? []));
  return ['', 'Examples:', ...examples.map((example) => `  $ ${example}`)].join('\n');
});

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${reportError(error, { phase: 'cli' })}`);
  process.exit(1);
});
