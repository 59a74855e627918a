#!/usr/bin/env node
/**
 * tickertape: conversational crypto-market assistant
 *
 *   1. Start a TickertapeServer (agent system + WebSocket bridge) in-process
 *   2. Connect a TickertapeClient to it
 *   3. Render the ink UI, which talks to the core only through the client
 *
 * Logs go to ~/.tickertape/tickertape.log so they never tear the ink frame.
 */
import fs from 'node:fs';
import path from 'node:path';
import React from 'react';
import { render } from 'ink';
import {
  loadConfig,
  createLogger,
  createProvider,
  errorMessage,
  TickertapeServer,
  TICKERTAPE_DIR,
} from '@tickertape/core';
import type { LogSink } from '@tickertape/core';
import { TickertapeClient } from './ws.client.js';
import { App } from './components/App.js';

const LOG_PATH = path.join(TICKERTAPE_DIR, 'tickertape.log');

const fileSink: LogSink = (line) => {
  fs.appendFileSync(LOG_PATH, `${new Date().toISOString()} ${line}`);
};

async function connectWithRetry(client: TickertapeClient, attempts: number): Promise<boolean> {
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      await client.connect();
      return true;
    } catch {
      await new Promise((r) => setTimeout(r, 50));
    }
  }
  return false;
}

async function main(): Promise<void> {
  const config = await loadConfig();
  const logger = createLogger({ level: config.logs.level, sink: fileSink });
  const provider = createProvider(config);

  // ── Start the core on an ephemeral port ────────────────────────────────────
  const server = new TickertapeServer({ config, provider, logger, port: 0 });
  const port = await server.start();

  const client = new TickertapeClient(`ws://127.0.0.1:${port}`);
  if (!(await connectWithRetry(client, 10))) {
    process.stderr.write('Failed to connect to core server\n');
    await server.close();
    process.exit(1);
  }

  // ── Render the ink UI ──────────────────────────────────────────────────────
  const { waitUntilExit } = render(React.createElement(App, { config, client }), {
    exitOnCtrlC: false,
  });

  await waitUntilExit();

  // ── Cleanup ────────────────────────────────────────────────────────────────
  client.close();
  await server.close();
  process.exit(0);
}

main().catch((err: unknown) => {
  process.stderr.write(errorMessage(err) + '\n');
  process.exit(1);
});
