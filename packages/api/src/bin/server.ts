#!/usr/bin/env tsx
/**
 * API Server Entry Point
 */

import { handleError, loadConfig, logger } from '@modelvault/utils';
import { createRegistryContext } from '@modelvault/services';
import { createApiServer, startApiServer } from '../server.js';

async function main() {
  const config = loadConfig();
  const context = await createRegistryContext(config);

  const server = await createApiServer({
    service: context.service,
    port: config.PORT,
    host: config.HOST,
    enableSwagger: config.NODE_ENV !== 'production',
  });
  server.addHook('onClose', async () => {
    await context.close();
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down API server', { signal });
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        handleError(error, { phase: 'shutdown' });
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await startApiServer(server, { port: config.PORT, host: config.HOST });
}

main().catch((error: unknown) => {
  handleError(error, { phase: 'startup' });
  process.exit(1);
});
