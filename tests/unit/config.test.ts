import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import path from 'path';
import { clearConfigCache, getConfig, loadConfig } from '../../apps/api/src/services/config';

const ENV_KEYS = ['CONFIG_PATH', 'LLM_MODEL', 'LLM_BASE_URL', 'GITHUB_TOKEN', 'LOG_LEVEL'] as const;

describe('Config Service', () => {
  const saved: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    clearConfigCache();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    clearConfigCache();
  });

  it('should load the default config file', () => {
    const config = getConfig();
    expect(config.llm.provider).toBe('openai-compatible');
    expect(config.agents.maxAttempts).toBe(3);
    expect(config.intent.maxQuestions).toBe(3);
    expect(config.intent.maxSessions).toBe(500);
    expect(config.intent.sessionIdleMinutes).toBe(60);
    expect(config.relatedWork.windowDays).toBe(1095);
    expect(config.search.perSourceLimit).toEqual({ arxiv: 20, github: 10, huggingface: 10, modelscope: 10 });
    expect(config.search.exploreWindowDays).toBe(3);
  });

  it('should cache the loaded config', () => {
    expect(getConfig()).toBe(getConfig());
  });

  it('should resolve a relative CONFIG_PATH from the repository root', () => {
    const originalCwd = process.cwd();
    try {
      process.chdir(path.join(originalCwd, 'apps/api'));
      process.env.CONFIG_PATH = 'config/default.json';
      expect(loadConfig().server.port).toBe(4000);
    } finally {
      process.chdir(originalCwd);
    }
  });

  it('should apply environment overrides', () => {
    process.env.LLM_MODEL = 'gpt-4o';
    process.env.LLM_BASE_URL = 'http://localhost:8080/v1';
    process.env.GITHUB_TOKEN = 'test-token';
    process.env.LOG_LEVEL = 'debug';

    const config = getConfig();
    expect(config.llm.model).toBe('gpt-4o');
    expect(config.llm.baseUrl).toBe('http://localhost:8080/v1');
    expect(config.search.githubToken).toBe('test-token');
    expect(config.logging.level).toBe('debug');
  });

  it('should ignore an unknown LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'verbose';
    expect(getConfig().logging.level).toBe('info');
  });

  it('should fail on a missing config file', () => {
    process.env.CONFIG_PATH = 'missing.json';
    expect(() => loadConfig()).toThrow('Configuration file not found or invalid: missing.json');
  });
});
