import { Injectable } from '@nestjs/common';
import * as dotenv from 'dotenv';
import { z } from 'zod';
dotenv.config();

const numeric = (fallback: number) =>
  z
    .union([z.string(), z.number()])
    .default(String(fallback))
    .transform((v) => {
      if (typeof v === 'string' && v.trim() === '') return fallback;
      const n = typeof v === 'number' ? v : Number(v);
      return Number.isFinite(n) ? n : fallback;
    });

export const configSchema = z.object({
  port: numeric(8080).pipe(z.number().int().min(1).max(65535)),
  host: z.string().min(1).default('127.0.0.1'),
  // Worker pool size per run
  executorConcurrency: numeric(4).pipe(z.number().int().min(1)),
  // Total attempts per node, first one included
  executorRetryBudget: numeric(3).pipe(z.number().int().min(1)),
  executorRetryDelayMs: numeric(0).pipe(z.number().int().min(0)),
  graphFilePath: z.string().min(1).default('./data/graph.json'),
  graphAutoLoad: z
    .union([z.boolean(), z.string()])
    .default('false')
    .transform((v) => (typeof v === 'string' ? v.toLowerCase() === 'true' : v)),
  executionHistoryLimit: numeric(50).pipe(z.number().int().min(1)),
  // CORS origins (comma-separated in env; parsed to string[])
  corsOrigins: z
    .string()
    .default('')
    .transform((s) =>
      s
        .split(',')
        .map((x) => x.trim())
        .filter((x) => !!x),
    ),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

@Injectable()
export class ConfigService implements Config {
  private static instance?: ConfigService;
  private _params?: Config;

  private get params(): Config {
    if (!this._params) {
      throw new Error('ConfigService not initialized with parameters');
    }
    return this._params;
  }

  init(params: Config): this {
    this._params = params;
    return this;
  }

  get port(): number {
    return this.params.port;
  }
  get host(): string {
    return this.params.host;
  }
  get executorConcurrency(): number {
    return this.params.executorConcurrency;
  }
  get executorRetryBudget(): number {
    return this.params.executorRetryBudget;
  }
  get executorRetryDelayMs(): number {
    return this.params.executorRetryDelayMs;
  }
  get graphFilePath(): string {
    return this.params.graphFilePath;
  }
  get graphAutoLoad(): boolean {
    return this.params.graphAutoLoad;
  }
  get executionHistoryLimit(): number {
    return this.params.executionHistoryLimit;
  }
  get corsOrigins(): string[] {
    return this.params.corsOrigins;
  }
  get logLevel(): Config['logLevel'] {
    return this.params.logLevel;
  }

  /** Process-wide instance, parsed from the environment on first use. */
  static getInstance(): ConfigService {
    if (!ConfigService.instance) ConfigService.instance = ConfigService.fromEnv();
    return ConfigService.instance;
  }

  static clearInstanceForTest(): void {
    ConfigService.instance = undefined;
  }

  static fromEnv(): ConfigService {
    const parsed = configSchema.parse({
      port: process.env.PORT,
      host: process.env.HOST,
      executorConcurrency: process.env.EXECUTOR_CONCURRENCY,
      executorRetryBudget: process.env.EXECUTOR_RETRY_BUDGET,
      executorRetryDelayMs: process.env.EXECUTOR_RETRY_DELAY_MS,
      graphFilePath: process.env.GRAPH_FILE_PATH,
      graphAutoLoad: process.env.GRAPH_AUTO_LOAD,
      executionHistoryLimit: process.env.EXECUTION_HISTORY_LIMIT,
      corsOrigins: process.env.CORS_ORIGINS,
      logLevel: process.env.LOG_LEVEL?.toLowerCase(),
    });
    return new ConfigService().init(parsed);
  }
}
