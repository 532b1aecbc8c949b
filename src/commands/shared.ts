/**
 * Command Helpers
 * 指令共用 - 建立 client、輸出、錯誤與退出碼
 */

import { ApiClient } from '../services/api.js';
import { ConfigService } from '../services/config.js';
import { ApiError, ConfigError, TransportError } from '../lib/errors.js';
import type { ClientConfig } from '../types/config.js';

export const EXIT_CODES = {
  OK: 0,
  INPUT: 1,
  API: 2,
  CONFIG: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * 依設定檔與環境變數建立 ApiClient
 */
export function createApiClient(
  configService: ConfigService = new ConfigService(),
  overrides: Partial<ClientConfig> = {}
): ApiClient {
  return new ApiClient(configService.toClientConfig(overrides));
}

export function formatJSON<T>(data: T, pretty: boolean = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG;
  if (error instanceof ApiError || error instanceof TransportError) return EXIT_CODES.API;
  return EXIT_CODES.INPUT;
}

/**
 * 輸出錯誤到 stderr 並設定退出碼
 */
export function reportError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`❌ ${message}`);
  if (error instanceof ConfigError) {
    console.error('請設定環境變數 LINKEDIN_CLIENT_ID 和 LINKEDIN_CLIENT_SECRET，或執行 linkedin-api config set');
  }
  process.exitCode = exitCodeFor(error);
}
