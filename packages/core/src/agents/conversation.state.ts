import { randomUUID } from 'node:crypto';
import type {
  ChatMessage,
  ConversationMessage,
  MessageRole,
  ToolCallRecord,
  ToolCallRequest,
  ToolResultRecord,
} from '@tickertape/shared';

export interface AppendOptions {
  toolCallId?: string;
  toolCalls?: ToolCallRequest[];
}

/**
 * Append-only record of one agent's exchange with the model, plus the tool
 * calls it requested and how each one went.
 */
export class ConversationState {
  private messages: ConversationMessage[] = [];
  private toolCalls: ToolCallRecord[] = [];
  private toolResults: ToolResultRecord[] = [];

  append(role: MessageRole, content: string, options: AppendOptions = {}): ConversationMessage {
    const message: ConversationMessage = {
      id: randomUUID(),
      role,
      content,
      timestamp: Date.now(),
      ...(options.toolCallId !== undefined ? { toolCallId: options.toolCallId } : {}),
      ...(options.toolCalls && options.toolCalls.length > 0 ? { toolCalls: options.toolCalls } : {}),
    };
    this.messages.push(message);
    return message;
  }

  recordToolCall(call: ToolCallRequest): ToolCallRecord {
    const record: ToolCallRecord = { ...call, timestamp: Date.now() };
    this.toolCalls.push(record);
    return record;
  }

  recordToolResult(result: ToolResultRecord): void {
    this.toolResults.push(result);
  }

  clear(): void {
    this.messages = [];
    this.toolCalls = [];
    this.toolResults = [];
  }

  getHistory(): ConversationMessage[] {
    return [...this.messages];
  }

  getLastN(n: number): ConversationMessage[] {
    if (n <= 0) return [];
    return this.messages.slice(-n);
  }

  getToolCalls(): ToolCallRecord[] {
    return [...this.toolCalls];
  }

  getToolResults(): ToolResultRecord[] {
    return [...this.toolResults];
  }

  get length(): number {
    return this.messages.length;
  }

  /**
   * Messages handed to the model: the first system message, the whole current
   * turn (from the last user message on), then as many earlier messages as
   * still fit in `limit`. The earlier part never opens on a tool message whose
   * request was cut off.
   */
  toPrompt(limit: number): ChatMessage[] {
    const system = this.messages.find((m) => m.role === 'system');
    const rest = this.messages.filter((m) => m.role !== 'system');

    let turnStart = -1;
    for (let i = rest.length - 1; i >= 0; i--) {
      if (rest[i]?.role === 'user') {
        turnStart = i;
        break;
      }
    }
    const current = turnStart === -1 ? [] : rest.slice(turnStart);
    const earlier = turnStart === -1 ? rest : rest.slice(0, turnStart);

    const room = Math.max(0, limit - current.length);
    let older = room > 0 ? earlier.slice(-room) : [];
    while (older.length > 0 && older[0]?.role === 'tool') {
      older = older.slice(1);
    }

    const picked = system ? [system, ...older, ...current] : [...older, ...current];
    return picked.map(toChatMessage);
  }
}

function toChatMessage(message: ConversationMessage): ChatMessage {
  const chat: ChatMessage = { role: message.role, content: message.content };
  if (message.toolCallId !== undefined) chat.toolCallId = message.toolCallId;
  if (message.toolCalls) chat.toolCalls = message.toolCalls;
  return chat;
}
