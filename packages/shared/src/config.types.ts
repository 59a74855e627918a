export interface OllamaProviderConfig {
  name: 'ollama';
  model: string;
  host: string;
  port: number;
}

export interface OpenAIProviderConfig {
  name: 'openai';
  model: string;
  /** Any OpenAI-compatible endpoint. Defaults to the OpenAI API. */
  base_url?: string;
}

export type ProviderConfig = OllamaProviderConfig | OpenAIProviderConfig;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface SourcesConfig {
  coingecko_api_key?: string;
  bitquery_api_key?: string;
  llamafeed_base_url: string;
  request_timeout_ms: number;
}

export interface TickertapeConfig {
  provider: ProviderConfig;
  agents: {
    max_history_messages: number;
    max_iterations: number;
  };
  task: {
    max_retries: number;
  };
  sources: SourcesConfig;
  logs: {
    level: LogLevel;
  };
}
