/**
 * Structured Logger - 結構化日誌系統
 * JSON 格式日誌，每個組件一個實例
 * 特性：
 *   - 日誌級別控制（LINKEDIN_LOG_LEVEL）
 *   - requestId 追蹤
 *   - 錯誤碼與堆棧記錄
 * 不記錄請求 / 回應內容；URL 需先經過 redactSecrets
 * 輸出走 stderr（console.error / console.warn）
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** 請求唯一識別碼 */
  requestId?: string;
  method?: string;
  /** 已遮蔽敏感參數的 URL */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  statusCode?: number;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'warn') */
  minLevel?: LogLevel;
  /** 是否輸出到控制台 (default: true) */
  console?: boolean;
  formatter?: (entry: LogEntry) => string;
  /** 是否包含堆棧追蹤 (default: true) */
  includeStack?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * 從環境變數決定預設級別
 */
export function resolveLogLevel(value: string | undefined, fallback: LogLevel = 'warn'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

function errorCodeOf(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;
  private requestIdStack: string[] = [];

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel || 'warn',
      console: config.console !== false,
      formatter: config.formatter || this.defaultFormatter,
      includeStack: config.includeStack !== false,
    };
  }

  private defaultFormatter = (entry: LogEntry): string => {
    return JSON.stringify(entry);
  };

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    if (!this.config.console) return;

    // 日誌一律寫入 stderr，stdout 保留給指令結果
    const formatted = this.config.formatter(entry);
    if (entry.level === 'warn') {
      console.warn(formatted);
    } else {
      console.error(formatted);
    }
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;
    this.log('warn', message, context);
  }

  error(message: string, error?: Error | null, context?: LogContext): void {
    if (!this.shouldLog('error')) return;

    const entry = this.createEntry('error', message, context);
    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCodeOf(error),
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.output(this.createEntry(level, message, context));
  }

  private createEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context: this.enrichContext(context),
    };
  }

  /**
   * 未提供 requestId 時補上棧頂的值
   */
  private enrichContext(context?: LogContext): LogContext | undefined {
    const current = this.getCurrentRequestId();
    if (!context) {
      return current ? { requestId: current } : undefined;
    }
    if (!context.requestId && current) {
      return { ...context, requestId: current };
    }
    return context;
  }

  /**
   * 推入新的 requestId（支持嵌套請求）
   */
  pushRequestId(requestId?: string): string {
    const id = requestId || randomUUID();
    this.requestIdStack.push(id);
    return id;
  }

  popRequestId(): string | undefined {
    return this.requestIdStack.pop();
  }

  getCurrentRequestId(): string | undefined {
    return this.requestIdStack[this.requestIdStack.length - 1];
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }
}

const DEFAULT_LEVEL = resolveLogLevel(process.env.LINKEDIN_LOG_LEVEL);

/**
 * 預設的日誌記錄器實例
 */
export const loggers = {
  api: new StructuredLogger('API', { minLevel: DEFAULT_LEVEL }),
  auth: new StructuredLogger('Auth', { minLevel: DEFAULT_LEVEL }),
  config: new StructuredLogger('Config', { minLevel: DEFAULT_LEVEL }),
};
