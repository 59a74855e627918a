export interface CoreArgs {
  port: number;
  host: string;
}

export const DEFAULT_CORE_PORT = 7433;

/**
 * Reads `--port` and `--host` from `process.argv`. Under
 * `npm run core -- --port 9000` npm forwards everything after `--`, so the
 * flags arrive after the runtime and script paths.
 */
export function parseCoreArgs(argv: string[]): CoreArgs {
  const args = argv.slice(2);
  let port = DEFAULT_CORE_PORT;
  let host = '127.0.0.1';

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === '--port' && value) {
      port = parseInt(value, 10);
      i++;
    } else if (args[i] === '--host' && value) {
      host = value;
      i++;
    }
  }

  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid --port: ${String(port)}`);
  }
  return { port, host };
}
