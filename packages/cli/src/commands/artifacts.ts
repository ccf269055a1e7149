/**
 * Artifact Commands
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import { commandRegistry } from '../core/command-registry.js';
import type { CommandGroup } from '../types/index.js';
import { artifactsVerifySchema } from '../command-defs/artifacts.js';
import { verifyArtifactsHandler } from '../handlers/artifacts/verify-artifacts.js';

export const artifactsGroup: CommandGroup = {
  groupName: 'artifacts',
  description: 'Artifact store integrity',
  commands: [
    {
      name: 'verify',
      description: 'Check every version against the artifact store and record what is missing',
      schema: artifactsVerifySchema,
      handler: verifyArtifactsHandler,
      examples: ['modelvault artifacts verify', 'modelvault artifacts verify --format json'],
    },
  ],
};

commandRegistry.registerGroup(artifactsGroup);

/**
 * Register artifact commands
 */
export function registerArtifactCommands(program: Command): void {
  const artifactsCmd = program
    .command('artifacts')
    .description(artifactsGroup.description)
    .addHelpText('after', () => `\n${commandRegistry.generateGroupHelp(artifactsGroup.groupName)}`);

  defineCommand(
    artifactsCmd.command('verify').option('--format <format>', 'Output format (json|table)', 'table'),
    { definition: commandRegistry.requireCommand('artifacts', 'verify') }
  );
}
