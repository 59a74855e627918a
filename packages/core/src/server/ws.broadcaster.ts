import { WebSocketServer, WebSocket } from 'ws';
import type { ServerMessage } from '@tickertape/shared';
import type { AgentSystem } from '../orchestrator/agent.system.js';

// ---------------------------------------------------------------------------
// WsBroadcaster
// ---------------------------------------------------------------------------

/**
 * Outgoing side of the WebSocket bridge: fan-out, single-client send, and the
 * AgentSystem event → ServerMessage mapping.
 */
export class WsBroadcaster {
  constructor(private readonly wss: WebSocketServer) {}

  /** Send a message to all open clients. */
  broadcast(msg: ServerMessage): void {
    const json = JSON.stringify(msg);
    this.wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(json);
      }
    });
  }

  /** Send a message to a single client. */
  send(ws: WebSocket, msg: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(msg));
    }
  }

  wireSystem(system: AgentSystem): void {
    system.on('phase', (phase) => {
      this.broadcast({ type: 'PHASE', payload: { phase } });
    });

    system.on('task:update', (task) => {
      this.broadcast({ type: 'TASK_UPDATE', payload: task });
    });

    system.on('system:reset', () => {
      this.broadcast({ type: 'SYSTEM_RESET', payload: { at: Date.now() } });
    });

    system.on('agent:state', (state) => {
      this.broadcast({ type: 'AGENT_UPDATE', payload: state });
    });

    system.on('lock:update', (locks) => {
      this.broadcast({ type: 'LOCK_UPDATE', payload: locks });
    });
  }
}
