/**
 * Version Commands
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import { commandRegistry } from '../core/command-registry.js';
import type { CommandGroup } from '../types/index.js';
import {
  versionsDeleteSchema,
  versionsDownloadSchema,
  versionsRegisterSchema,
  versionsShowSchema,
} from '../command-defs/versions.js';
import { registerVersionHandler } from '../handlers/versions/register-version.js';
import { showVersionHandler } from '../handlers/versions/show-version.js';
import { deleteVersionHandler } from '../handlers/versions/delete-version.js';
import { downloadVersionHandler } from '../handlers/versions/download-version.js';

export const versionsGroup: CommandGroup = {
  groupName: 'versions',
  description: 'Versions of a registered model',
  commands: [
    {
      name: 'register',
      description: 'Register the next version of a model from a local file',
      schema: versionsRegisterSchema,
      handler: registerVersionHandler,
      examples: [
        `modelvault versions register 3 ./weights.bin --metadata '{"description":"retrained","createdBy":"bob","alias":"staging"}'`,
      ],
    },
    {
      name: 'show',
      description: 'Show one version',
      schema: versionsShowSchema,
      handler: showVersionHandler,
      examples: ['modelvault versions show 3 2'],
    },
    {
      name: 'delete',
      description: 'Delete one version and its artifact',
      schema: versionsDeleteSchema,
      handler: deleteVersionHandler,
      examples: ['modelvault versions delete 3 2'],
    },
    {
      name: 'download',
      description: "Copy a version's artifact to a local file",
      schema: versionsDownloadSchema,
      handler: downloadVersionHandler,
      examples: ['modelvault versions download 3 2 --out ./model.bin'],
    },
  ],
};

commandRegistry.registerGroup(versionsGroup);

/**
 * Register version commands
 */
export function registerVersionCommands(program: Command): void {
  const versionsCmd = program
    .command('versions')
    .description(versionsGroup.description)
    .addHelpText('after', () => `\n${commandRegistry.generateGroupHelp(versionsGroup.groupName)}`);

  defineCommand(
    versionsCmd
      .command('register <modelId> <file>')
      .requiredOption('--metadata <json>', 'Version metadata as a JSON document')
      .option('--format <format>', 'Output format (json|table)', 'table'),
    { definition: commandRegistry.requireCommand('versions', 'register'), positionals: ['modelId', 'file'] }
  );

  defineCommand(
    versionsCmd
      .command('show <modelId> <versionNumber>')
      .option('--format <format>', 'Output format (json|table)', 'table'),
    { definition: commandRegistry.requireCommand('versions', 'show'), positionals: ['modelId', 'versionNumber'] }
  );

  defineCommand(
    versionsCmd
      .command('delete <modelId> <versionNumber>')
      .option('--format <format>', 'Output format (json|table)', 'table'),
    { definition: commandRegistry.requireCommand('versions', 'delete'), positionals: ['modelId', 'versionNumber'] }
  );

  defineCommand(
    versionsCmd
      .command('download <modelId> <versionNumber>')
      .option('--out <path>', 'Destination file (default: the artifact file name)')
      .option('--format <format>', 'Output format (json|table)', 'table'),
    { definition: commandRegistry.requireCommand('versions', 'download'), positionals: ['modelId', 'versionNumber'] }
  );
}
