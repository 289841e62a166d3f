import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigService } from '../src/core/services/config.service';

const KEYS = [
  'PORT',
  'HOST',
  'EXECUTOR_CONCURRENCY',
  'EXECUTOR_RETRY_BUDGET',
  'EXECUTOR_RETRY_DELAY_MS',
  'GRAPH_FILE_PATH',
  'GRAPH_AUTO_LOAD',
  'EXECUTION_HISTORY_LIMIT',
  'CORS_ORIGINS',
  'LOG_LEVEL',
] as const;

describe('ConfigService.fromEnv', () => {
  const previousEnv: Partial<Record<(typeof KEYS)[number], string>> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      previousEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = previousEnv[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    ConfigService.clearInstanceForTest();
  });

  it('falls back to defaults when nothing is set', () => {
    const config = ConfigService.fromEnv();
    expect(config.port).toBe(8080);
    expect(config.host).toBe('127.0.0.1');
    expect(config.executorConcurrency).toBe(4);
    expect(config.executorRetryBudget).toBe(3);
    expect(config.executorRetryDelayMs).toBe(0);
    expect(config.graphFilePath).toBe('./data/graph.json');
    expect(config.graphAutoLoad).toBe(false);
    expect(config.executionHistoryLimit).toBe(50);
    expect(config.corsOrigins).toEqual([]);
    expect(config.logLevel).toBe('info');
  });

  it('parses values from the process environment', () => {
    process.env.PORT = '9090';
    process.env.EXECUTOR_CONCURRENCY = '8';
    process.env.EXECUTOR_RETRY_BUDGET = '5';
    process.env.GRAPH_AUTO_LOAD = 'TRUE';
    process.env.CORS_ORIGINS = ' http://localhost:3000 , ,http://example.test ';
    process.env.LOG_LEVEL = 'DEBUG';

    const config = ConfigService.fromEnv();
    expect(config.port).toBe(9090);
    expect(config.executorConcurrency).toBe(8);
    expect(config.executorRetryBudget).toBe(5);
    expect(config.graphAutoLoad).toBe(true);
    expect(config.corsOrigins).toEqual(['http://localhost:3000', 'http://example.test']);
    expect(config.logLevel).toBe('debug');
  });

  it('uses the default for a non-numeric count', () => {
    process.env.EXECUTOR_CONCURRENCY = 'many';
    process.env.EXECUTOR_RETRY_BUDGET = '';
    const config = ConfigService.fromEnv();
    expect(config.executorConcurrency).toBe(4);
    expect(config.executorRetryBudget).toBe(3);
  });

  it('refuses a count below one', () => {
    process.env.EXECUTOR_RETRY_BUDGET = '0';
    expect(() => ConfigService.fromEnv()).toThrow();
  });

  it('keeps one process-wide instance until cleared', () => {
    const first = ConfigService.getInstance();
    expect(ConfigService.getInstance()).toBe(first);
    ConfigService.clearInstanceForTest();
    expect(ConfigService.getInstance()).not.toBe(first);
  });
});
