import crypto from 'node:crypto';
import { Ollama } from 'ollama';
import type { ChatResponse as OllamaChatResponse, Message as OllamaMessage, Tool } from 'ollama';
import type {
  TickertapeConfig,
  ProviderAdapter,
  ChatMessage,
  ChatResponse,
  FunctionSchema,
  OllamaProviderConfig,
  TokenUsage,
} from '@tickertape/shared';
import { isNetworkError, withRetry } from '../provider.retry.js';

function toOllamaMessage(message: ChatMessage): OllamaMessage {
  if (message.role === 'assistant' && message.toolCalls && message.toolCalls.length > 0) {
    return {
      role: 'assistant',
      content: message.content,
      tool_calls: message.toolCalls.map((call) => ({
        function: { name: call.name, arguments: call.arguments },
      })),
    };
  }
  return { role: message.role, content: message.content };
}

function toOllamaTool(schema: FunctionSchema): Tool {
  const properties: Record<string, { type: string; description: string }> = {};
  for (const [name, prop] of Object.entries(schema.parameters.properties)) {
    properties[name] = { type: prop.type, description: prop.description };
  }
  return {
    type: 'function',
    function: {
      name: schema.name,
      description: schema.description,
      parameters: {
        type: 'object',
        required: schema.parameters.required,
        properties,
      },
    },
  };
}

function toUsage(response: OllamaChatResponse): TokenUsage | undefined {
  if (response.prompt_eval_count == null || response.eval_count == null) return undefined;
  return {
    promptTokens: response.prompt_eval_count,
    completionTokens: response.eval_count,
    totalTokens: response.prompt_eval_count + response.eval_count,
  };
}

export interface OllamaAdapterOptions {
  sleep?: (ms: number) => Promise<void>;
}

export class OllamaAdapter implements ProviderAdapter {
  private readonly client: Ollama;
  private readonly providerConfig: OllamaProviderConfig;
  private readonly maxRetries: number;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(config: TickertapeConfig, options: OllamaAdapterOptions = {}) {
    if (config.provider.name !== 'ollama') {
      throw new Error('OllamaAdapter requires provider.name === "ollama"');
    }
    this.providerConfig = config.provider;
    this.maxRetries = config.task.max_retries;
    this.sleep = options.sleep;
    this.client = new Ollama({
      host: `http://${this.providerConfig.host}:${this.providerConfig.port}`,
    });
  }

  async chat(messages: ChatMessage[], tools: FunctionSchema[] = []): Promise<ChatResponse> {
    const response = await withRetry(
      () =>
        this.client.chat({
          model: this.providerConfig.model,
          messages: messages.map(toOllamaMessage),
          ...(tools.length > 0 ? { tools: tools.map(toOllamaTool) } : {}),
          stream: false,
        }),
      { maxRetries: this.maxRetries, isRetryable: isNetworkError, sleep: this.sleep },
    );
    // Ollama does not assign call ids, so one is minted per call
    const toolCalls = (response.message.tool_calls ?? []).map((call) => ({
      id: `call_${crypto.randomUUID()}`,
      name: call.function.name,
      arguments: { ...call.function.arguments },
    }));
    const usage = toUsage(response);
    return { content: response.message.content, toolCalls, ...(usage ? { usage } : {}) };
  }

  async structured(
    messages: ChatMessage[],
    schemaName: string,
    schema: Record<string, unknown>,
  ): Promise<string> {
    const instruction: ChatMessage = {
      role: 'system',
      content: `Reply with a single JSON object named "${schemaName}" that matches this JSON schema:\n${JSON.stringify(schema)}`,
    };
    const response = await withRetry(
      () =>
        this.client.chat({
          model: this.providerConfig.model,
          messages: [instruction, ...messages].map(toOllamaMessage),
          format: 'json',
          stream: false,
        }),
      { maxRetries: this.maxRetries, isRetryable: isNetworkError, sleep: this.sleep },
    );
    return response.message.content;
  }
}
