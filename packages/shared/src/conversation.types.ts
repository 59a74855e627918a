export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ConversationMessage {
  id: string;
  role: MessageRole;
  content: string;
  timestamp: number;
  /** Set on tool messages: the call this output answers. */
  toolCallId?: string;
  /** Set on assistant messages that requested tools. */
  toolCalls?: ToolCallRequest[];
}

export interface ToolCallRecord {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  timestamp: number;
}

export interface ToolResultRecord {
  callId: string;
  toolName: string;
  success: boolean;
  error: string | null;
  executionMs: number;
}
