import type { ProviderConfig, TickertapeConfig } from '@tickertape/shared';

export function makeConfig(provider: ProviderConfig = { name: 'openai', model: 'test-model' }): TickertapeConfig {
  return {
    provider,
    agents: { max_history_messages: 40, max_iterations: 6 },
    task: { max_retries: 2 },
    sources: {
      llamafeed_base_url: 'http://feed.test',
      request_timeout_ms: 1000,
    },
    logs: { level: 'silent' },
  };
}
