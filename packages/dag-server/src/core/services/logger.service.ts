import { Inject, Injectable, Optional } from '@nestjs/common';

import { ConfigService, type Config } from './config.service';

export type LogLevel = Config['logLevel'];

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

type SanitizationOptions = {
  redactKeyRe: RegExp;
  maxString: number;
  maxJson: number;
  maxDepth: number;
  maxKeys: number;
};

const DEFAULT_SANITIZATION: SanitizationOptions = {
  redactKeyRe: /(authorization|token|api[_-]?key|password|secret)/i,
  maxString: 2000,
  maxJson: 20000,
  maxDepth: 3,
  maxKeys: 100,
};

/**
 * One JSON record per line: { ts, level, message, ...context }.
 * A single plain-object argument is merged into the record; anything else
 * lands under `context`.
 */
@Injectable()
export class LoggerService {
  private readonly threshold: LogLevel;

  constructor(@Optional() @Inject(ConfigService) config?: ConfigService) {
    this.threshold = config?.logLevel ?? 'info';
  }

  debug(message: string, ...optionalParams: unknown[]) {
    this.log('debug', message, optionalParams);
  }

  info(message: string, ...optionalParams: unknown[]) {
    this.log('info', message, optionalParams);
  }

  warn(message: string, ...optionalParams: unknown[]) {
    this.log('warn', message, optionalParams);
  }

  error(message: string, ...optionalParams: unknown[]) {
    this.log('error', message, optionalParams);
  }

  private log(level: LogLevel, message: string, optionalParams: unknown[]) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) return;
    const payload = JSON.stringify(this.buildRecord(level, message, optionalParams));
    switch (level) {
      case 'debug':
        console.debug(payload);
        break;
      case 'warn':
        console.warn(payload);
        break;
      case 'error':
        console.error(payload);
        break;
      default:
        console.info(payload);
    }
  }

  private buildRecord(level: LogLevel, message: string, optionalParams: unknown[]): Record<string, unknown> {
    const record: Record<string, unknown> = { ts: new Date().toISOString(), level, message };
    if (optionalParams.length === 0) return record;

    const context = this.sanitize(optionalParams);
    const [first] = context;
    if (context.length === 1 && this.isPlainRecord(first) && !this.hasReservedKey(first)) {
      Object.assign(record, first);
    } else {
      record.context = context;
    }
    return record;
  }

  private sanitize(params: unknown[], options: SanitizationOptions = DEFAULT_SANITIZATION): unknown[] {
    const seen = new WeakSet<object>();

    const clip = (s: string): string =>
      s.length > options.maxString ? `${s.slice(0, options.maxString)}…(+${s.length - options.maxString} chars)` : s;

    const toSafe = (v: unknown, depth: number): unknown => {
      if (v instanceof Error) {
        const safe: Record<string, unknown> = { name: v.name, message: clip(v.message), stack: v.stack };
        for (const [key, val] of Object.entries(v)) {
          if (key === 'cause' || key in safe) continue;
          safe[key] = options.redactKeyRe.test(key) ? '[REDACTED]' : toSafe(val, depth + 1);
        }
        if (v.cause !== undefined) {
          safe.cause = depth + 1 >= options.maxDepth ? '[Truncated]' : toSafe(v.cause, depth + 1);
        }
        return safe;
      }
      if (v instanceof Map) return toSafe(Object.fromEntries(v), depth);
      if (v && typeof v === 'object') {
        if (seen.has(v)) return '[Circular]';
        seen.add(v);
        if (depth >= options.maxDepth) return '[Truncated]';
        if (Array.isArray(v)) return v.slice(0, options.maxKeys).map((x: unknown) => toSafe(x, depth + 1));
        const out: Record<string, unknown> = {};
        const entries = Object.entries(v);
        for (const [index, [key, val]] of entries.entries()) {
          if (index >= options.maxKeys) {
            out.__truncated__ = `[+${entries.length - options.maxKeys} keys omitted]`;
            break;
          }
          out[key] = options.redactKeyRe.test(key) ? '[REDACTED]' : toSafe(val, depth + 1);
        }
        return out;
      }
      if (typeof v === 'bigint') return v.toString();
      if (typeof v === 'string') return clip(v);
      return v;
    };

    const safeParams = params.map((p) => toSafe(p, 0));
    const json = JSON.stringify(safeParams);
    if (json.length > options.maxJson) {
      return [{ __truncated__: `context truncated after ${options.maxJson} chars` }];
    }
    return safeParams;
  }

  private isPlainRecord(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
  }

  private hasReservedKey(obj: Record<string, unknown>): boolean {
    return ['ts', 'level', 'message'].some((key) => key in obj);
  }
}
