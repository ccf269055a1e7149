/**
 * Server Commands
 * ===============
 * Commands for starting the API server
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import { commandRegistry } from '../core/command-registry.js';
import type { CommandGroup } from '../types/index.js';
import { serveSchema } from '../command-defs/server.js';
import { serveHandler } from '../handlers/server/serve.js';

export const serverGroup: CommandGroup = {
  groupName: 'server',
  description: 'API server commands',
  commands: [
    {
      name: 'serve',
      description: 'Start the modelvault API server',
      schema: serveSchema,
      handler: serveHandler,
      examples: ['modelvault serve', 'modelvault serve --port 8080 --host localhost'],
    },
  ],
};

commandRegistry.registerGroup(serverGroup);

/**
 * Register server commands
 */
export function registerServerCommands(program: Command): void {
  const serveCmd = program
    .command('serve')
    .option('--port <number>', 'Server port (default: PORT)')
    .option('--host <host>', 'Server host (default: HOST)')
    .addHelpText('after', () => `\n${commandRegistry.generateGroupHelp(serverGroup.groupName)}`);

  defineCommand(serveCmd, { definition: commandRegistry.requireCommand('server', 'serve') });
}
