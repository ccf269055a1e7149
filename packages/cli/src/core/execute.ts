/**
 * Command Executor
 *
 * Validates raw arguments against the command schema, runs the handler and
 * formats its result.
 */

import type { z } from 'zod';
import { ValidationError } from '@modelvault/utils';
import { formatOutput } from './output-formatter.js';
import type { CommandContext } from './command-context.js';
import type { CommandDefinition, OutputFormat } from '../types/index.js';
import { logger } from '../logger.js';

function parseArgs<S extends z.ZodTypeAny>(schema: S, raw: Record<string, unknown>): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `--${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid arguments: ${details}`, { issues: result.error.issues });
  }
  return result.data;
}

function outputFormat(raw: Record<string, unknown>): OutputFormat {
  return raw.format === 'json' ? 'json' : 'table';
}

export interface ExecutionResult<R> {
  result: R;
  output: string;
}

/**
 * Execute a command and return both the handler result and its rendering
 */
export async function execute<S extends z.ZodTypeAny, R>(
  definition: CommandDefinition<S, R>,
  raw: Record<string, unknown>,
  ctx: CommandContext
): Promise<ExecutionResult<R>> {
  const args = parseArgs(definition.schema, raw);
  const started = Date.now();

  const result = await definition.handler(args, ctx);

  logger.debug('Command finished', { command: definition.name, durationMs: Date.now() - started });
  return { result, output: formatOutput(result, outputFormat(raw), definition.columns) };
}
