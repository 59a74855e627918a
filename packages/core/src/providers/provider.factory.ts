import type { TickertapeConfig, ProviderAdapter } from '@tickertape/shared';
import { OllamaAdapter } from './ollama/ollama.adapter.js';
import { OpenAIAdapter } from './openai/openai.adapter.js';

export function createProvider(config: TickertapeConfig): ProviderAdapter {
  switch (config.provider.name) {
    case 'ollama':
      return new OllamaAdapter(config);
    case 'openai':
      return new OpenAIAdapter(config);
  }
}
