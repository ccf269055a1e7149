/**
 * Standard Command Wrapper
 *
 * - Commander owns flags & parsing
 * - The wrapper merges positional arguments into the options, validates them
 *   with the command schema, runs the handler, prints the output and reports
 *   errors
 */

import type { Command } from 'commander';
import type { z } from 'zod';
import { CommandContext, type CommandContextOptions } from './command-context.js';
import { execute } from './execute.js';
import { reportError } from './error-handler.js';
import type { CommandDefinition } from '../types/index.js';

export type DefineCommandArgs<S extends z.ZodTypeAny, R> = {
  definition: CommandDefinition<S, R>;
  /** Names of the command's positional arguments, in order */
  positionals?: string[];
  context?: CommandContextOptions;
};

/**
 * Merge commander positional values into the option object under the given names
 */
export function argsToOpts(
  positionals: string[],
  values: unknown[],
  opts: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...opts };
  positionals.forEach((name, index) => {
    if (values[index] !== undefined) {
      merged[name] = values[index];
    }
  });
  return merged;
}

export function defineCommand<S extends z.ZodTypeAny, R>(
  cmd: Command,
  { definition, positionals = [], context }: DefineCommandArgs<S, R>
): Command {
  cmd.description(definition.description);

  cmd.action(async (...commanderArgs: unknown[]) => {
    const ctx = new CommandContext(context);
    try {
      const raw = argsToOpts(positionals, commanderArgs, cmd.opts());
      const { output } = await execute(definition, raw, ctx);
      if (output.length > 0) {
        console.log(output);
      }
    } catch (error) {
      console.error(`Error: ${reportError(error, { command: cmd.name() })}`);
      process.exitCode = 1;
    } finally {
      await ctx.close();
    }
  });

  return cmd;
}
