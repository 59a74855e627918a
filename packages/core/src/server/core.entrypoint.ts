/**
 * Standalone core process entry point
 *
 * Boots the agent system and the WebSocket bridge and waits for a UI.
 *
 * Usage:
 *   npm run core -- [--port <number>] [--host <address>]
 *
 * The CLI normally runs the server in-process; this entry point is for
 * running the core on its own, e.g. behind another front end.
 */
import { loadConfig } from '../config/config.loader.js';
import { createProvider } from '../providers/provider.factory.js';
import { createLogger } from '../logging/logger.js';
import { errorMessage } from '../utils/guards.js';
import { TickertapeServer } from './websocket.server.js';
import { parseCoreArgs } from './core.args.js';

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const { port, host } = parseCoreArgs(process.argv);

  const config = await loadConfig();
  const logger = createLogger({ level: config.logs.level });
  const provider = createProvider(config);

  const server = new TickertapeServer({ config, provider, logger, port, host });
  const bound = await server.start();

  // Signal the parent process (or any reader of stdout) that the server is ready
  process.stdout.write(JSON.stringify({ type: 'ready', port: bound }) + '\n');

  const shutdown = (): void => {
    server
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error(`shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  process.stderr.write(errorMessage(err) + '\n');
  process.exit(1);
});
