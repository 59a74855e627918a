import { WebSocketServer, type WebSocket } from 'ws';
import type { ClientMessage, ProviderAdapter, TickertapeConfig } from '@tickertape/shared';
import { AgentSystem } from '../orchestrator/agent.system.js';
import { CommandDispatcher } from '../commands/command.dispatcher.js';
import type { DataSources } from '../tools/sources/data.sources.js';
import { createDataSources } from '../tools/sources/data.sources.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import { errorMessage } from '../utils/guards.js';
import { WsBroadcaster } from './ws.broadcaster.js';
import { parseClientMessage } from './client.message.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TickertapeServerOptions {
  config: TickertapeConfig;
  provider: ProviderAdapter;
  /** Data clients for the tools. Built from `config.sources` when omitted. */
  sources?: DataSources;
  logger?: Logger;
  /** WebSocket port. Defaults to 7433; 0 picks a free one. */
  port?: number;
  host?: string;
}

// ---------------------------------------------------------------------------
// TickertapeServer
// ---------------------------------------------------------------------------

/**
 * Core WebSocket server that wraps the AgentSystem.
 *
 * The protocol is defined by ClientMessage / ServerMessage in @tickertape/shared.
 *
 * Lifecycle:
 *   new TickertapeServer(options) → await server.start() → server.close()
 *
 * Replies (REQUEST_COMPLETE, RESEARCH_*, SLASH_RESULT, ERROR) go to the client
 * that asked; PHASE, TASK_UPDATE, AGENT_UPDATE, LOCK_UPDATE and SYSTEM_RESET
 * go to everyone.
 */
export class TickertapeServer {
  readonly system: AgentSystem;

  private readonly wss: WebSocketServer;
  private readonly broadcaster: WsBroadcaster;
  private readonly dispatcher: CommandDispatcher;
  private readonly logger: Logger;

  constructor(options: TickertapeServerOptions) {
    const rootLogger = options.logger ?? createLogger({ level: options.config.logs.level });
    this.logger = rootLogger.child('server');

    this.system = new AgentSystem({
      config: options.config,
      provider: options.provider,
      sources: options.sources ?? createDataSources(options.config.sources),
      logger: rootLogger,
    });
    this.dispatcher = new CommandDispatcher({ config: options.config, system: this.system });

    this.wss = new WebSocketServer({ port: options.port ?? 7433, host: options.host ?? '127.0.0.1' });
    this.broadcaster = new WsBroadcaster(this.wss);
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  /** Wire events, accept connections, and resolve with the bound port. */
  start(): Promise<number> {
    this.broadcaster.wireSystem(this.system);
    this.wss.on('connection', (ws) => this.handleConnection(ws));

    return new Promise((resolve, reject) => {
      const bound = this.boundPort();
      if (bound !== null) {
        resolve(bound);
        return;
      }
      this.wss.once('error', reject);
      this.wss.once('listening', () => {
        this.wss.off('error', reject);
        const port = this.boundPort();
        this.logger.info(`listening on port ${port ?? '?'}`);
        if (port === null) reject(new Error('WebSocket server has no TCP address'));
        else resolve(port);
      });
    });
  }

  /** Drop every client and stop listening. */
  close(): Promise<void> {
    this.system.destroy();
    for (const client of this.wss.clients) {
      client.terminate();
    }
    return new Promise((resolve) => {
      this.wss.close(() => resolve());
    });
  }

  // ---------------------------------------------------------------------------
  // Connection handling
  // ---------------------------------------------------------------------------

  private handleConnection(ws: WebSocket): void {
    this.logger.debug(`client connected (${this.wss.clients.size} open)`);

    ws.on('message', (raw) => {
      const parsed = parseClientMessage(raw.toString());
      if (!parsed.ok) {
        this.broadcaster.send(ws, { type: 'ERROR', payload: { message: parsed.error } });
        return;
      }

      this.handleClientMessage(parsed.message, ws).catch((err: unknown) => {
        const message = errorMessage(err);
        this.logger.warn(`${parsed.message.type} failed: ${message}`);
        this.broadcaster.send(ws, { type: 'ERROR', payload: { message } });
      });
    });
  }

  private async handleClientMessage(msg: ClientMessage, ws: WebSocket): Promise<void> {
    switch (msg.type) {
      case 'SUBMIT_REQUEST': {
        const outcome = await this.system.processUserRequest(msg.payload.prompt);
        this.broadcaster.send(ws, { type: 'REQUEST_COMPLETE', payload: outcome });
        break;
      }

      case 'RESEARCH_START': {
        const started = await this.system.startResearch(msg.payload.symbol);
        this.broadcaster.send(ws, { type: 'RESEARCH_QUESTIONS', payload: started });
        break;
      }

      case 'RESEARCH_ANSWER': {
        const report = await this.system.answerResearch(msg.payload.answers);
        this.broadcaster.send(ws, { type: 'RESEARCH_COMPLETE', payload: report });
        break;
      }

      case 'SLASH_COMMAND': {
        const output = await this.dispatcher.dispatch(msg.payload.command, msg.payload.args);
        this.broadcaster.send(ws, {
          type: 'SLASH_RESULT',
          payload: { command: msg.payload.command, output },
        });
        break;
      }
    }
  }

  private boundPort(): number | null {
    const address = this.wss.address();
    return address !== null && typeof address === 'object' ? address.port : null;
  }
}
