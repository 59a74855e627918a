import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';

// Use a hardcoded temp path to avoid needing os.tmpdir() inside the mock
const MOCK_HOME = `/tmp/tickertape-test-${process.pid}`;
const TICKERTAPE_DIR = path.join(MOCK_HOME, '.tickertape');
const CONFIG_PATH = path.join(TICKERTAPE_DIR, 'config.yaml');

vi.mock('node:os', () => ({
  default: { homedir: () => MOCK_HOME },
  homedir: () => MOCK_HOME,
}));

const NO_ENV: NodeJS.ProcessEnv = {};

describe('config.loader', () => {
  beforeEach(() => {
    vi.resetModules();
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    if (fs.existsSync(TICKERTAPE_DIR)) {
      fs.rmSync(TICKERTAPE_DIR, { recursive: true });
    }
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (fs.existsSync(TICKERTAPE_DIR)) {
      fs.rmSync(TICKERTAPE_DIR, { recursive: true });
    }
  });

  it('returns defaults when config file is missing', async () => {
    const { loadConfig } = await import('./config.loader.js');
    const { DEFAULT_CONFIG } = await import('./config.defaults.js');
    const config = await loadConfig(NO_ENV);
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('creates ~/.tickertape and writes the default file', async () => {
    const { loadConfig } = await import('./config.loader.js');
    expect(fs.existsSync(TICKERTAPE_DIR)).toBe(false);
    await loadConfig(NO_ENV);
    expect(fs.existsSync(CONFIG_PATH)).toBe(true);
  });

  it('loads user overrides and merges with defaults', async () => {
    const { loadConfig } = await import('./config.loader.js');
    const { DEFAULT_CONFIG } = await import('./config.defaults.js');
    fs.mkdirSync(TICKERTAPE_DIR, { recursive: true });
    fs.writeFileSync(
      CONFIG_PATH,
      `
provider:
  name: ollama
  model: llama3.1:8b
  host: localhost
  port: 11435
agents:
  max_history_messages: 12
`,
    );

    const config = await loadConfig(NO_ENV);
    expect(config.provider).toEqual({
      name: 'ollama',
      model: 'llama3.1:8b',
      host: 'localhost',
      port: 11435,
    });
    expect(config.agents.max_history_messages).toBe(12);
    expect(config.agents.max_iterations).toBe(DEFAULT_CONFIG.agents.max_iterations);
    expect(config.sources.llamafeed_base_url).toBe(DEFAULT_CONFIG.sources.llamafeed_base_url);
  });

  it('handles an empty config file by using defaults', async () => {
    const { loadConfig } = await import('./config.loader.js');
    const { DEFAULT_CONFIG } = await import('./config.defaults.js');
    fs.mkdirSync(TICKERTAPE_DIR, { recursive: true });
    fs.writeFileSync(CONFIG_PATH, '');

    const config = await loadConfig(NO_ENV);
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('throws on invalid port in config file', async () => {
    const { loadConfig } = await import('./config.loader.js');
    fs.mkdirSync(TICKERTAPE_DIR, { recursive: true });
    fs.writeFileSync(
      CONFIG_PATH,
      `provider:\n  name: ollama\n  model: m\n  host: localhost\n  port: 99999\n`,
    );
    await expect(loadConfig(NO_ENV)).rejects.toThrow('provider.port');
  });

  it('throws on unknown provider name', async () => {
    const { loadConfig } = await import('./config.loader.js');
    fs.mkdirSync(TICKERTAPE_DIR, { recursive: true });
    fs.writeFileSync(CONFIG_PATH, `provider:\n  name: unknown_provider\n`);
    await expect(loadConfig(NO_ENV)).rejects.toThrow('Config validation failed: provider.name');
  });

  it('lets environment keys override the file', async () => {
    const { loadConfig } = await import('./config.loader.js');
    fs.mkdirSync(TICKERTAPE_DIR, { recursive: true });
    fs.writeFileSync(CONFIG_PATH, `sources:\n  coingecko_api_key: from-file\n`);

    const config = await loadConfig({
      COINGECKO_API_KEY: 'test-secret',
      TICKERTAPE_LOG_LEVEL: 'debug',
    });
    expect(config.sources.coingecko_api_key).toBe('test-secret');
    expect(config.logs.level).toBe('debug');
  });

  it('rejects an unknown log level from the environment', async () => {
    const { loadConfig } = await import('./config.loader.js');
    await expect(loadConfig({ TICKERTAPE_LOG_LEVEL: 'loud' })).rejects.toThrow('logs.level');
  });
});
