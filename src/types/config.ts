import type { HttpTransport } from '../services/transport.js';
import type { StructuredLogger } from '../lib/logger.js';

/**
 * ApiClient 建構參數
 */
export interface ClientConfig {
  /** LinkedIn API Key (client_id) */
  clientId: string;
  /** LinkedIn API Secret (client_secret) */
  clientSecret: string;
  /** OAuth2 redirect 回呼網址 */
  callbackUrl?: string | null;
  apiBaseUrl?: string;
  oauthBaseUrl?: string;
  /** 連線逾時（毫秒） */
  connectTimeoutMs?: number;
  /** 整體請求逾時（毫秒） */
  timeoutMs?: number;
  /** 是否驗證 TLS 憑證（預設 true） */
  rejectUnauthorized?: boolean;
  userAgent?: string;
  /** 自訂 HTTP 傳輸層，未提供時使用 ofetch */
  transport?: HttpTransport;
  logger?: StructuredLogger;
}

/**
 * 套用預設值後的設定（不可變）
 */
export interface ResolvedClientConfig {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly callbackUrl: string | null;
  readonly apiBaseUrl: string;
  readonly oauthBaseUrl: string;
  readonly connectTimeoutMs: number;
  readonly timeoutMs: number;
  readonly rejectUnauthorized: boolean;
  readonly userAgent: string;
}

/**
 * 設定檔結構（CLI 使用）
 * 不儲存 access token
 */
export interface AppConfig {
  clientId?: string;
  clientSecret?: string;
  callbackUrl?: string;
  apiBaseUrl?: string;
  oauthBaseUrl?: string;
}

/**
 * 設定鍵值
 */
export type ConfigKey = keyof AppConfig;
