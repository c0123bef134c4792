import pino, { type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  name?: string;
}

/**
 * JSON構造化ロガーを生成する
 */
export function createLogger(options: LoggerOptions): Logger {
  return pino({
    name: options.name ?? 'crisis-response',
    level: options.level
  });
}

/**
 * コンポーネント名を束縛した子ロガー
 */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
