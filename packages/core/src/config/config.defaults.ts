import type { TickertapeConfig } from '@tickertape/shared'

export const DEFAULT_CONFIG: TickertapeConfig = {
  provider: {
    name: 'openai',
    model: 'gpt-4o-mini',
  },
  agents: {
    max_history_messages: 40,
    max_iterations: 8,
  },
  task: {
    max_retries: 3,
  },
  sources: {
    llamafeed_base_url: 'https://feed-api.llama.fi',
    request_timeout_ms: 15000,
  },
  logs: {
    level: 'info',
  },
}
