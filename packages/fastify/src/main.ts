/**
 * starts the authorization proxy from DCRBRIDGE_* environment variables
 *
 * registered clients and upstream grants persist in the data directory,
 * transactions and codes live in memory.
 */

import { FileKeyValueStore, MemoryKeyValueStore } from '@dcrbridge/core';

import { loadConfigFromEnv } from '#config';
import { createProxyServer } from '#server';

/**
 * writes a fatal startup failure to stderr
 * @param error the failure
 */
function reportFailure(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(
    `${JSON.stringify({ level: 'fatal', message: 'dcrbridge failed to start', error: message })}\n`,
  );
  process.exitCode = 1;
}

/** starts the server and stops it on SIGINT or SIGTERM */
async function startServer(): Promise<void> {
  const { proxy: config, server: settings } = loadConfigFromEnv();

  const { server } = createProxyServer({
    config: {
      ...config,
      storage: new FileKeyValueStore({ directory: settings.dataDir }),
      ephemeralStorage: new MemoryKeyValueStore(),
    },
    logLevel: settings.logLevel,
  });

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    server.log.info({ signal }, 'shutting down');
    await server.close();
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch(reportFailure);
    });
  }

  await server.listen({ host: settings.host, port: settings.port });
}

// start server immediately
startServer().catch(reportFailure);
