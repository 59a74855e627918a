import type { ConversationMessage, ToolCallRequest } from './conversation.types.js';

export type ChatMessage = Pick<ConversationMessage, 'role' | 'content' | 'toolCallId' | 'toolCalls'>;

export type SchemaProperty = {
  type: 'string' | 'number' | 'boolean' | 'array';
  description: string;
  items?: { type: 'string' | 'number' };
};

export type FunctionParameters = {
  type: 'object';
  properties: Record<string, SchemaProperty>;
  required: string[];
};

/** JSON-schema function declaration handed to the model. */
export type FunctionSchema = {
  name: string;
  description: string;
  parameters: FunctionParameters;
};

export interface ChatResponse {
  content: string;
  toolCalls: ToolCallRequest[];
  /** Tokens spent on this call, when the backend reports them. */
  usage?: TokenUsage;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ProviderAdapter {
  /** One round trip. Tool calls come back unexecuted. */
  chat(messages: ChatMessage[], tools?: FunctionSchema[]): Promise<ChatResponse>;
  /**
   * Ask for a JSON object matching `schema`. Returns the raw text; callers validate it.
   */
  structured(messages: ChatMessage[], schemaName: string, schema: Record<string, unknown>): Promise<string>;
}
