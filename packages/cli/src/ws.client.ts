import { EventEmitter } from 'node:events';
import { WebSocket } from 'ws';
import type {
  AgentLock,
  AgentState,
  ClientMessage,
  RequestOutcome,
  ResearchReport,
  ServerMessage,
  SystemPhase,
  Task,
} from '@tickertape/shared';

// ---------------------------------------------------------------------------
// Event type augmentation
// ---------------------------------------------------------------------------

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface TickertapeClient {
  on(event: 'phase', listener: (phase: SystemPhase) => void): this;
  on(event: 'task:update', listener: (task: Task) => void): this;
  on(event: 'system:reset', listener: () => void): this;
  on(event: 'agent:state', listener: (state: AgentState) => void): this;
  on(event: 'lock:update', listener: (locks: AgentLock[]) => void): this;
  on(event: 'request:complete', listener: (outcome: RequestOutcome) => void): this;
  on(event: 'research:questions', listener: (payload: { symbol: string; questions: string[] }) => void): this;
  on(event: 'research:complete', listener: (report: ResearchReport) => void): this;
  on(event: 'slash:result', listener: (payload: { command: string; output: string }) => void): this;
  on(event: 'ws:error', listener: (err: Error) => void): this;

  off(event: 'phase', listener: (phase: SystemPhase) => void): this;
  off(event: 'task:update', listener: (task: Task) => void): this;
  off(event: 'system:reset', listener: () => void): this;
  off(event: 'agent:state', listener: (state: AgentState) => void): this;
  off(event: 'lock:update', listener: (locks: AgentLock[]) => void): this;
  off(event: 'request:complete', listener: (outcome: RequestOutcome) => void): this;
  off(event: 'research:questions', listener: (payload: { symbol: string; questions: string[] }) => void): this;
  off(event: 'research:complete', listener: (report: ResearchReport) => void): this;
  off(event: 'slash:result', listener: (payload: { command: string; output: string }) => void): this;
  off(event: 'ws:error', listener: (err: Error) => void): this;
}

function isServerMessage(value: unknown): value is ServerMessage {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    'payload' in value
  );
}

// ---------------------------------------------------------------------------
// TickertapeClient
// ---------------------------------------------------------------------------

/**
 * WebSocket client for the TickertapeServer.
 *
 * Translates ServerMessages into EventEmitter events; requests are
 * fire-and-forget and their answers arrive as events.
 *
 * Usage:
 *   const client = new TickertapeClient('ws://127.0.0.1:7433');
 *   await client.connect();
 *   client.on('request:complete', ...);
 *   client.submitRequest('How is ETH doing?');
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class TickertapeClient extends EventEmitter {
  private ws: WebSocket | null = null;

  // Reconnection state
  private reconnectAttempt = 0;
  private readonly MAX_RECONNECT_ATTEMPTS = 4;
  private readonly RECONNECT_BASE_MS = 2000;
  private isReconnecting = false;

  constructor(private readonly url: string) {
    super();
  }

  // ---------------------------------------------------------------------------
  // Connection
  // ---------------------------------------------------------------------------

  /** Open the WebSocket connection. Resolves when the connection is established. */
  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.url);
      this.ws = ws;

      ws.once('error', reject);
      ws.once('open', () => {
        ws.off('error', reject);
        this.reconnectAttempt = 0;
        this.isReconnecting = false;

        ws.on('message', (raw) => {
          let parsed: unknown;
          try {
            parsed = JSON.parse(raw.toString());
          } catch {
            this.emit('ws:error', new Error('Malformed message from server'));
            return;
          }
          if (isServerMessage(parsed)) this.handleServerMessage(parsed);
        });

        ws.on('error', (err) => {
          this.emit('ws:error', err);
        });

        ws.on('close', (code) => {
          // Only reconnect on abnormal closure (not intentional close with code 1000)
          if (code !== 1000) {
            this.scheduleReconnect();
          }
        });

        resolve();
      });
    });
  }

  close(): void {
    this.ws?.close(1000);
    this.ws = null;
  }

  /** Schedule a reconnect attempt with exponential backoff (2s, 4s, 8s, 16s). */
  private scheduleReconnect(): void {
    if (this.isReconnecting) return;
    if (this.reconnectAttempt >= this.MAX_RECONNECT_ATTEMPTS) {
      this.emit('ws:error', new Error('WebSocket disconnected; max reconnect attempts reached'));
      return;
    }
    this.isReconnecting = true;
    this.reconnectAttempt++;
    const delayMs = this.RECONNECT_BASE_MS * Math.pow(2, this.reconnectAttempt - 1);
    this.emit(
      'ws:error',
      new Error(
        `WebSocket disconnected. Reconnecting in ${delayMs / 1000}s ` +
          `(attempt ${this.reconnectAttempt}/${this.MAX_RECONNECT_ATTEMPTS})...`,
      ),
    );
    setTimeout(() => {
      this.connect()
        .then(() => {
          this.isReconnecting = false;
        })
        .catch(() => {
          this.isReconnecting = false;
          this.scheduleReconnect();
        });
    }, delayMs);
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  submitRequest(prompt: string): void {
    this.send({ type: 'SUBMIT_REQUEST', payload: { prompt } });
  }

  startResearch(symbol: string): void {
    this.send({ type: 'RESEARCH_START', payload: { symbol } });
  }

  answerResearch(answers: string): void {
    this.send({ type: 'RESEARCH_ANSWER', payload: { answers } });
  }

  sendSlashCommand(command: string, args: string): void {
    this.send({ type: 'SLASH_COMMAND', payload: { command, args } });
  }

  // ---------------------------------------------------------------------------
  // Inbound message routing
  // ---------------------------------------------------------------------------

  private handleServerMessage(msg: ServerMessage): void {
    switch (msg.type) {
      case 'PHASE':
        this.emit('phase', msg.payload.phase);
        break;

      case 'TASK_UPDATE':
        this.emit('task:update', msg.payload);
        break;

      case 'SYSTEM_RESET':
        this.emit('system:reset');
        break;

      case 'AGENT_UPDATE':
        this.emit('agent:state', msg.payload);
        break;

      case 'LOCK_UPDATE':
        this.emit('lock:update', msg.payload);
        break;

      case 'REQUEST_COMPLETE':
        this.emit('request:complete', msg.payload);
        break;

      case 'RESEARCH_QUESTIONS':
        this.emit('research:questions', msg.payload);
        break;

      case 'RESEARCH_COMPLETE':
        this.emit('research:complete', msg.payload);
        break;

      case 'SLASH_RESULT':
        this.emit('slash:result', msg.payload);
        break;

      case 'ERROR':
        // 'ws:error' rather than 'error': an unhandled 'error' event would crash the process
        this.emit('ws:error', new Error(msg.payload.message));
        break;
    }
  }

  // ---------------------------------------------------------------------------
  // Send helper
  // ---------------------------------------------------------------------------

  private send(msg: ClientMessage): void {
    if (this.ws?.readyState === WebSocket.OPEN) {
      this.ws.send(JSON.stringify(msg));
    } else {
      this.emit(
        'ws:error',
        new Error(`Cannot send ${msg.type}: WebSocket not open (readyState=${this.ws?.readyState ?? -1})`),
      );
    }
  }
}
