/**
 * @modelvault/cli
 *
 * Command-line interface of the model registry.
 */

export { CommandContext, type CommandContextOptions } from './core/command-context.js';
export { CommandRegistry, commandRegistry } from './core/command-registry.js';
export { defineCommand, argsToOpts } from './core/defineCommand.js';
export { execute, type ExecutionResult } from './core/execute.js';
export { formatJSON, formatOutput, formatRecord, formatTable } from './core/output-formatter.js';
export { formatError, reportError } from './core/error-handler.js';
export { registerModelCommands } from './commands/models.js';
export { registerVersionCommands } from './commands/versions.js';
export { registerAliasCommands } from './commands/aliases.js';
export { registerArtifactCommands } from './commands/artifacts.js';
export { registerServerCommands } from './commands/server.js';
export type { CommandDefinition, CommandGroup, OutputFormat } from './types/index.js';
