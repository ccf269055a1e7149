/**
 * CLI-specific type definitions
 */

import type { z } from 'zod';
import type { CommandContext } from '../core/command-context.js';

/**
 * Output format options
 */
export type OutputFormat = 'json' | 'table';

/**
 * Command definition structure
 *
 * The handler receives the arguments as parsed by `schema`.
 */
export interface CommandDefinition<S extends z.ZodTypeAny = z.ZodTypeAny, R = unknown> {
  /** Command name (e.g. 'list', 'show') */
  name: string;
  description: string;
  schema: S;
  handler: (args: z.output<S>, ctx: CommandContext) => Promise<R>;
  /** Columns shown by the table format, in order */
  columns?: string[];
  examples?: string[];
}

/**
 * A top-level command group (`models`, `versions`, ...) and its subcommands
 */
export interface CommandGroup {
  groupName: string;
  description: string;
  commands: CommandDefinition[];
}
