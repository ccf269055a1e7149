/**
 * defineCommand wiring: commander parsing, schema validation, output and errors
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { Command } from 'commander';
import { z } from 'zod';
import { argsToOpts, defineCommand } from '../../src/core/defineCommand.js';
import type { CommandDefinition } from '../../src/types/index.js';

const echoSchema = z.object({
  modelId: z.coerce.number().int().positive(),
  format: z.enum(['json', 'table']).default('table'),
});

describe('argsToOpts', () => {
  it('merges positionals into the options by name', () => {
    expect(argsToOpts(['modelId', 'versionNumber'], ['3', '2', {}], { format: 'json' })).toEqual({
      format: 'json',
      modelId: '3',
      versionNumber: '2',
    });
  });

  it('skips positionals commander left undefined', () => {
    expect(argsToOpts(['modelId'], [undefined], { format: 'table' })).toEqual({ format: 'table' });
  });
});

describe('defineCommand', () => {
  function captureConsole() {
    return {
      log: vi.spyOn(console, 'log').mockImplementation(() => undefined),
      errorLog: vi.spyOn(console, 'error').mockImplementation(() => undefined),
    };
  }

  afterEach(() => {
    process.exitCode = undefined;
  });

  function program(definition: CommandDefinition<typeof echoSchema, unknown>): Command {
    const root = new Command().exitOverride();
    defineCommand(root.command('show <modelId>').option('--format <format>', 'Output format', 'table'), {
      definition,
      positionals: ['modelId'],
    });
    return root;
  }

  it('passes validated arguments to the handler and prints the result', async () => {
    const { log } = captureConsole();
    const handler = vi.fn(async (args: z.output<typeof echoSchema>) => ({ modelId: args.modelId }));

    await program({ name: 'show', description: 'Show', schema: echoSchema, handler }).parseAsync(
      ['show', '12', '--format', 'json'],
      { from: 'user' }
    );

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[0]).toEqual({ modelId: 12, format: 'json' });
    expect(log).toHaveBeenCalledWith('{\n  "modelId": 12\n}');
    expect(process.exitCode).toBeUndefined();
  });

  it('reports invalid arguments without calling the handler', async () => {
    const { errorLog } = captureConsole();
    const handler = vi.fn(async () => 'unreachable');

    await program({ name: 'show', description: 'Show', schema: echoSchema, handler }).parseAsync(['show', 'abc'], {
      from: 'user',
    });

    expect(handler).not.toHaveBeenCalled();
    expect(errorLog).toHaveBeenCalledWith(
      'Error: Invalid arguments: --modelId: Expected number, received nan (VALIDATION_ERROR)'
    );
    expect(process.exitCode).toBe(1);
  });

  it('reports handler failures', async () => {
    const { errorLog } = captureConsole();
    const handler = vi.fn(async () => {
      throw new Error('disk unplugged');
    });

    await program({ name: 'show', description: 'Show', schema: echoSchema, handler }).parseAsync(['show', '1'], {
      from: 'user',
    });

    expect(errorLog).toHaveBeenCalledWith('Error: disk unplugged');
    expect(process.exitCode).toBe(1);
  });
});
