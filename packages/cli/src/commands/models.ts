/**
 * Model Commands
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import { commandRegistry } from '../core/command-registry.js';
import type { CommandGroup } from '../types/index.js';
import {
  modelsDeleteSchema,
  modelsListSchema,
  modelsRegisterSchema,
  modelsShowSchema,
  modelsUpdateSchema,
} from '../command-defs/models.js';
import { listModelsHandler } from '../handlers/models/list-models.js';
import { showModelHandler } from '../handlers/models/show-model.js';
import { registerModelHandler } from '../handlers/models/register-model.js';
import { updateModelHandler } from '../handlers/models/update-model.js';
import { deleteModelHandler } from '../handlers/models/delete-model.js';

export const modelsGroup: CommandGroup = {
  groupName: 'models',
  description: 'Registered models and their metadata',
  commands: [
    {
      name: 'list',
      description: 'List every model',
      schema: modelsListSchema,
      handler: listModelsHandler,
      columns: ['modelId', 'name', 'versions', 'latestVersionNumber', 'createdBy', 'updatedAt'],
      examples: ['modelvault models list', 'modelvault models list --format json'],
    },
    {
      name: 'show',
      description: 'Show a model with its versions',
      schema: modelsShowSchema,
      handler: showModelHandler,
      examples: ['modelvault models show 3'],
    },
    {
      name: 'register',
      description: 'Register a new model from a local file',
      schema: modelsRegisterSchema,
      handler: registerModelHandler,
      examples: [
        `modelvault models register ./weights.bin --metadata '{"name":"resnet","description":"classifier","createdBy":"alice","versionDescription":"first"}'`,
      ],
    },
    {
      name: 'update',
      description: "Change a model's metadata",
      schema: modelsUpdateSchema,
      handler: updateModelHandler,
      examples: [`modelvault models update 3 --description "retrained" --tags '{"team":"vision"}'`],
    },
    {
      name: 'delete',
      description: 'Delete a model, its versions and their artifacts',
      schema: modelsDeleteSchema,
      handler: deleteModelHandler,
      examples: ['modelvault models delete 3'],
    },
  ],
};

commandRegistry.registerGroup(modelsGroup);

/**
 * Register model commands
 */
export function registerModelCommands(program: Command): void {
  const modelsCmd = program
    .command('models')
    .description(modelsGroup.description)
    .addHelpText('after', () => `\n${commandRegistry.generateGroupHelp(modelsGroup.groupName)}`);

  defineCommand(modelsCmd.command('list').option('--format <format>', 'Output format (json|table)', 'table'), {
    definition: commandRegistry.requireCommand('models', 'list'),
  });

  defineCommand(
    modelsCmd.command('show <modelId>').option('--format <format>', 'Output format (json|table)', 'table'),
    { definition: commandRegistry.requireCommand('models', 'show'), positionals: ['modelId'] }
  );

  defineCommand(
    modelsCmd
      .command('register <file>')
      .requiredOption('--metadata <json>', 'Model metadata as a JSON document')
      .option('--format <format>', 'Output format (json|table)', 'table'),
    { definition: commandRegistry.requireCommand('models', 'register'), positionals: ['file'] }
  );

  defineCommand(
    modelsCmd
      .command('update <modelId>')
      .option('--name <name>', 'New display name')
      .option('--description <text>', 'New description')
      .option('--created-by <author>', 'New author')
      .option('--tags <json>', 'Replacement tags as a JSON object')
      .option('--format <format>', 'Output format (json|table)', 'table'),
    { definition: commandRegistry.requireCommand('models', 'update'), positionals: ['modelId'] }
  );

  defineCommand(
    modelsCmd.command('delete <modelId>').option('--format <format>', 'Output format (json|table)', 'table'),
    { definition: commandRegistry.requireCommand('models', 'delete'), positionals: ['modelId'] }
  );
}
