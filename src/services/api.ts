/**
 * LinkedIn API Client
 * LinkedIn API 客戶端 - OAuth2 授權流程與帶 token 的 API 請求
 *
 * 1. 以 API Key / Secret 與回呼網址建立 client
 * 2. 將 buildAuthorizationUrl() 的網址提供給使用者登入
 * 3. 使用者回到回呼網址後，以 exchangeCodeForToken(code) 換取 token
 * 4. token 由呼叫端自行保存，下次以 setAccessToken() 設定
 * 5. 以 call('GET', '/people/~') 等方式呼叫 API
 */

import { ValidationError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { makeUrl } from '../lib/url.js';
import type { QueryParams } from '../lib/url.js';
import { AuthService } from './auth.js';
import { resolveClientConfig } from './config.js';
import { RequestExecutor } from './request.js';
import { OfetchTransport } from './transport.js';
import type { AuthorizationUrlOptions, SessionState } from '../types/auth.js';
import type { ClientConfig, ResolvedClientConfig } from '../types/config.js';
import type { HttpMethod, RequestBody, RequestOptions, ResponseValue } from '../types/api.js';

export class ApiClient {
  private config: ResolvedClientConfig;
  private auth: AuthService;
  private executor: RequestExecutor;
  private session: SessionState = {
    accessToken: null,
    accessTokenExpiresInSeconds: null,
    lastAuthState: null,
  };

  constructor(config: ClientConfig) {
    this.config = resolveClientConfig(config);

    const transport =
      config.transport ??
      new OfetchTransport({
        connectTimeoutMs: this.config.connectTimeoutMs,
        timeoutMs: this.config.timeoutMs,
        rejectUnauthorized: this.config.rejectUnauthorized,
      });

    this.executor = new RequestExecutor(transport, config.logger ?? loggers.api, this.config.userAgent);
    this.auth = new AuthService(this.config, this.executor, config.logger ?? loggers.auth);
  }

  /**
   * 取得授權網址，並記錄本次的 state
   */
  buildAuthorizationUrl(options: AuthorizationUrlOptions = {}): string {
    const { url, state } = this.auth.buildAuthorizationUrl(options);
    this.session.lastAuthState = state;
    return url;
  }

  /**
   * 最後一次產生授權網址時的 state，供呼叫端驗證 redirect
   */
  getLastAuthState(): string | null {
    return this.session.lastAuthState;
  }

  /**
   * 以授權碼換取 Access Token 並保存於 session
   */
  async exchangeCodeForToken(code: string, extraParams: Record<string, string> = {}): Promise<string> {
    const token = await this.auth.exchangeCode(code, extraParams);

    this.session.accessToken = token.access_token;
    this.session.accessTokenExpiresInSeconds = token.expires_in;

    return token.access_token;
  }

  getAccessToken(): string | null {
    return this.session.accessToken;
  }

  hasAccessToken(): boolean {
    return this.session.accessToken !== null;
  }

  /**
   * token 有效秒數（token 端點的 expires_in）
   */
  getAccessTokenExpiration(): number | null {
    return this.session.accessTokenExpiresInSeconds;
  }

  /**
   * 手動設定 Access Token（例如從資料庫讀回）
   */
  setAccessToken(token: string, expirationSeconds?: number): string {
    const trimmed = typeof token === 'string' ? token.trim() : '';
    if (trimmed.length === 0) {
      throw new ValidationError('Invalid access token');
    }

    this.session.accessToken = trimmed;
    if (expirationSeconds !== undefined) {
      this.session.accessTokenExpiresInSeconds = expirationSeconds;
    }

    return trimmed;
  }

  /**
   * 發送 API 請求
   * 有 token 時附加 oauth2_access_token；沒有時照常送出，由 API 端拒絕
   */
  async call(
    method: HttpMethod,
    path: string,
    body?: RequestBody,
    options: RequestOptions = {}
  ): Promise<ResponseValue> {
    const params: QueryParams = {};
    if (this.session.accessToken) {
      params.oauth2_access_token = this.session.accessToken;
    }

    const url = makeUrl(`${this.config.apiBaseUrl}${path}`, params);
    return this.executor.execute(method, url, body, options);
  }

  getConfig(): ResolvedClientConfig {
    return this.config;
  }
}
