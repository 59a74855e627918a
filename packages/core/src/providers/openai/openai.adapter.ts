import OpenAI from 'openai';
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import type {
  TickertapeConfig,
  ProviderAdapter,
  ChatMessage,
  ChatResponse,
  FunctionSchema,
  TokenUsage,
  ToolCallRequest,
} from '@tickertape/shared';
import type { CompletionUsage } from 'openai/resources/completions';
import { isNetworkError, withRetry } from '../provider.retry.js';
import { isRecord } from '../../utils/guards.js';

/** Return true for transient errors worth retrying. */
function isRetryable(err: unknown): boolean {
  if (err instanceof OpenAI.APIError && typeof err.status === 'number') {
    // Rate limit or server errors are retryable; auth/bad-request errors are not
    return err.status === 429 || err.status >= 500;
  }
  return isNetworkError(err);
}

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (isRecord(parsed)) {
      return parsed;
    }
  } catch {
    // Malformed arguments reach the tool as an empty object and fail its validation
    return {};
  }
  return {};
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: 'assistant',
          content: message.content || null,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: 'function' as const,
            function: { name: call.name, arguments: JSON.stringify(call.arguments) },
          })),
        };
      }
      return { role: 'assistant', content: message.content };
    case 'tool':
      if (message.toolCallId) {
        return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };
      }
      return { role: 'user', content: `Tool output:\n${message.content}` };
  }
}

function toUsage(usage: CompletionUsage | undefined): TokenUsage | undefined {
  if (!usage) return undefined;
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  };
}

function toOpenAITool(schema: FunctionSchema): ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: schema.name,
      description: schema.description,
      parameters: schema.parameters,
    },
  };
}

export interface OpenAIAdapterOptions {
  apiKey?: string;
  baseURL?: string;
  sleep?: (ms: number) => Promise<void>;
}

export class OpenAIAdapter implements ProviderAdapter {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly maxRetries: number;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(config: TickertapeConfig, options: OpenAIAdapterOptions = {}) {
    if (config.provider.name !== 'openai') {
      throw new Error('OpenAIAdapter requires provider.name === "openai"');
    }
    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY environment variable is required for the openai provider');
    }

    this.model = config.provider.model;
    this.maxRetries = config.task.max_retries;
    this.sleep = options.sleep;
    this.client = new OpenAI({
      apiKey,
      baseURL: options.baseURL ?? config.provider.base_url,
      // Retries are handled here so the backoff policy matches the Ollama adapter
      maxRetries: 0,
    });
  }

  async chat(messages: ChatMessage[], tools: FunctionSchema[] = []): Promise<ChatResponse> {
    const completion = await withRetry(
      () =>
        this.client.chat.completions.create({
          model: this.model,
          messages: messages.map(toOpenAIMessage),
          ...(tools.length > 0 ? { tools: tools.map(toOpenAITool) } : {}),
        }),
      { maxRetries: this.maxRetries, isRetryable, sleep: this.sleep },
    );

    const message = completion.choices[0]?.message;
    const toolCalls: ToolCallRequest[] = (message?.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: parseArguments(call.function.arguments),
    }));
    const usage = toUsage(completion.usage);
    return { content: message?.content ?? '', toolCalls, ...(usage ? { usage } : {}) };
  }

  async structured(
    messages: ChatMessage[],
    schemaName: string,
    schema: Record<string, unknown>,
  ): Promise<string> {
    const completion = await withRetry(
      () =>
        this.client.chat.completions.create({
          model: this.model,
          messages: messages.map(toOpenAIMessage),
          response_format: {
            type: 'json_schema',
            json_schema: { name: schemaName, schema },
          },
        }),
      { maxRetries: this.maxRetries, isRetryable, sleep: this.sleep },
    );
    return completion.choices[0]?.message.content ?? '';
  }
}
