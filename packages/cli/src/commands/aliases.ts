/**
 * Alias Commands
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import { commandRegistry } from '../core/command-registry.js';
import type { CommandGroup } from '../types/index.js';
import { aliasesResolveSchema } from '../command-defs/aliases.js';
import { resolveAliasHandler } from '../handlers/aliases/resolve-alias.js';

export const aliasesGroup: CommandGroup = {
  groupName: 'aliases',
  description: 'Named pointers to model versions',
  commands: [
    {
      name: 'resolve',
      description: 'Show the model and version an alias points at',
      schema: aliasesResolveSchema,
      handler: resolveAliasHandler,
      examples: ['modelvault aliases resolve prod'],
    },
  ],
};

commandRegistry.registerGroup(aliasesGroup);

export function registerAliasCommands(program: Command): void {
  const aliasesCmd = program
    .command('aliases')
    .description(aliasesGroup.description)
    .addHelpText('after', () => `\n${commandRegistry.generateGroupHelp(aliasesGroup.groupName)}`);

  defineCommand(
    aliasesCmd.command('resolve <name>').option('--format <format>', 'Output format (json|table)', 'table'),
    { definition: commandRegistry.requireCommand('aliases', 'resolve'), positionals: ['name'] }
  );
}
