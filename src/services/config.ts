/**
 * Config Service
 * 設定管理服務 - 用戶端設定預設值、設定檔讀寫與環境變數
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { ConfigError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { VERSION } from '../version.js';
import type { AppConfig, ClientConfig, ConfigKey, ResolvedClientConfig } from '../types/config.js';

export const DEFAULT_API_BASE_URL = 'https://api.linkedin.com/v1';
export const DEFAULT_OAUTH_BASE_URL = 'https://www.linkedin.com/uas/oauth2';
export const DEFAULT_CONNECT_TIMEOUT_MS = 30 * 1000;
export const DEFAULT_TIMEOUT_MS = 90 * 1000;
export const DEFAULT_USER_AGENT = `linkedin-api-client/${VERSION}`;

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'linkedin-api');
const DEFAULT_CONFIG_FILE = 'config.json';

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'clientId',
  'clientSecret',
  'callbackUrl',
  'apiBaseUrl',
  'oauthBaseUrl',
];

const ENV_KEYS: Record<ConfigKey, string> = {
  clientId: 'LINKEDIN_CLIENT_ID',
  clientSecret: 'LINKEDIN_CLIENT_SECRET',
  callbackUrl: 'LINKEDIN_CALLBACK_URL',
  apiBaseUrl: 'LINKEDIN_API_BASE_URL',
  oauthBaseUrl: 'LINKEDIN_OAUTH_BASE_URL',
};

export function isConfigKey(value: string): value is ConfigKey {
  return Object.prototype.hasOwnProperty.call(ENV_KEYS, value);
}

function requireCredential(value: unknown, name: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigError(`Required parameter: ${name}`);
  }
  return value.trim();
}

function resolveTimeout(value: number | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number of milliseconds`);
  }
  return value;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * 驗證並套用預設值，回傳凍結的設定
 */
export function resolveClientConfig(config: ClientConfig): ResolvedClientConfig {
  const callbackUrl = config.callbackUrl?.trim();

  return Object.freeze({
    clientId: requireCredential(config.clientId, 'clientId'),
    clientSecret: requireCredential(config.clientSecret, 'clientSecret'),
    callbackUrl: callbackUrl ? callbackUrl : null,
    apiBaseUrl: stripTrailingSlash(config.apiBaseUrl ?? DEFAULT_API_BASE_URL),
    oauthBaseUrl: stripTrailingSlash(config.oauthBaseUrl ?? DEFAULT_OAUTH_BASE_URL),
    connectTimeoutMs: resolveTimeout(config.connectTimeoutMs, DEFAULT_CONNECT_TIMEOUT_MS, 'connectTimeoutMs'),
    timeoutMs: resolveTimeout(config.timeoutMs, DEFAULT_TIMEOUT_MS, 'timeoutMs'),
    rejectUnauthorized: config.rejectUnauthorized ?? true,
    userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
  });
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * 載入設定檔，無法解析時以空設定繼續
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }

    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      return this.pickKnownKeys(parsed);
    } catch (error) {
      loggers.config.warn('Ignoring unreadable config file', {
        path: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  private pickKnownKeys(value: unknown): AppConfig {
    const result: AppConfig = {};
    if (typeof value !== 'object' || value === null) {
      return result;
    }
    for (const [key, field] of Object.entries(value)) {
      if (isConfigKey(key) && typeof field === 'string') {
        result[key] = field;
      }
    }
    return result;
  }

  private save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), { encoding: 'utf-8', mode: 0o600 });
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.save();
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  clear(): void {
    this.config = {};
    this.save();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 取得設定值（優先環境變數）
   */
  resolve(key: ConfigKey): string | undefined {
    const envValue = process.env[ENV_KEYS[key]];
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config[key];
  }

  hasCredentials(): boolean {
    return Boolean(this.resolve('clientId') && this.resolve('clientSecret'));
  }

  /**
   * 組合 ApiClient 建構參數，缺少認證資訊時拋出 ConfigError
   */
  toClientConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
    const clientId = this.resolve('clientId');
    const clientSecret = this.resolve('clientSecret');
    if (!clientId || !clientSecret) {
      throw new ConfigError(
        `Missing credentials: set ${ENV_KEYS.clientId} and ${ENV_KEYS.clientSecret} or run "linkedin-api config set"`
      );
    }

    return {
      clientId,
      clientSecret,
      callbackUrl: this.resolve('callbackUrl') ?? null,
      apiBaseUrl: this.resolve('apiBaseUrl'),
      oauthBaseUrl: this.resolve('oauthBaseUrl'),
      ...overrides,
    };
  }
}
