/**
 * Serve Handler
 *
 * Runs the HTTP API in the foreground until the process is asked to stop.
 */

import type { z } from 'zod';
import { createApiServer, startApiServer } from '@modelvault/api';
import type { CommandContext } from '../../core/command-context.js';
import type { serveSchema } from '../../command-defs/server.js';
import { logger } from '../../logger.js';

export type ServeArgs = z.infer<typeof serveSchema>;

export interface ServeResult {
  address: string;
  signal: string;
}

/**
 * Resolves with the name of the first termination signal received
 */
export function waitForSignal(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): Promise<string> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      for (const name of signals) {
        process.off(name, onSignal);
      }
      resolve(signal);
    };
    for (const name of signals) {
      process.on(name, onSignal);
    }
  });
}

export async function serveHandler(
  args: ServeArgs,
  ctx: CommandContext,
  untilStopped: () => Promise<string> = () => waitForSignal()
): Promise<ServeResult> {
  const config = ctx.config();
  const port = args.port ?? config.PORT;
  const host = args.host ?? config.HOST;

  const server = await createApiServer({
    service: await ctx.registry(),
    port,
    host,
    enableSwagger: config.NODE_ENV !== 'production',
  });

  const address = await startApiServer(server, { port, host });
  const signal = await untilStopped();

  logger.info('Shutting down API server', { signal });
  await server.close();
  return { address, signal };
}
