/**
 * Auth Service
 * OAuth2 認證服務 - 產生授權網址、以授權碼換取 Access Token
 */

import { randomUUID } from 'node:crypto';
import { ApiError, ValidationError } from '../lib/errors.js';
import { isJsonObject } from '../lib/formats.js';
import type { StructuredLogger } from '../lib/logger.js';
import { makeUrl } from '../lib/url.js';
import type { QueryParams } from '../lib/url.js';
import type { RequestExecutor } from './request.js';
import type { AuthorizationUrlOptions, TokenResponse } from '../types/auth.js';
import type { ResolvedClientConfig } from '../types/config.js';
import type { JsonObject, ResponseValue } from '../types/api.js';

export const DEFAULT_SCOPE = 'r_basicprofile w_share';

export interface AuthorizationRequest {
  url: string;
  state: string;
}

/**
 * 產生授權 state（每次呼叫不同）
 */
export function generateState(): string {
  return randomUUID();
}

function toExpiresIn(value: unknown): number | undefined {
  const seconds = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof seconds === 'number' && Number.isFinite(seconds) ? seconds : undefined;
}

/**
 * 檢查 token 端點回應是否包含 access_token 與 expires_in
 */
export function parseTokenResponse(value: ResponseValue): TokenResponse {
  if (!isJsonObject(value)) {
    throw new ApiError('Unexpected token response', JSON.stringify(value ?? null));
  }

  const accessToken = value.access_token;
  if (typeof accessToken !== 'string' || accessToken.trim().length === 0) {
    throw new ApiError('Token response is missing access_token', JSON.stringify(value));
  }

  const expiresIn = toExpiresIn(value.expires_in);
  if (expiresIn === undefined) {
    throw new ApiError('Token response is missing expires_in', JSON.stringify(value));
  }

  return { access_token: accessToken.trim(), expires_in: expiresIn };
}

export class AuthService {
  private config: ResolvedClientConfig;
  private executor: RequestExecutor;
  private logger: StructuredLogger;

  constructor(config: ResolvedClientConfig, executor: RequestExecutor, logger: StructuredLogger) {
    this.config = config;
    this.executor = executor;
    this.logger = logger;
  }

  /**
   * 產生授權網址
   * 呼叫端參數覆蓋預設值；extraParams 不會覆蓋已知欄位
   */
  buildAuthorizationUrl(options: AuthorizationUrlOptions = {}): AuthorizationRequest {
    const state = options.state ?? generateState();

    const params: QueryParams = {
      ...options.extraParams,
      response_type: options.responseType ?? 'code',
      client_id: options.clientId ?? this.config.clientId,
      scope: options.scope ?? DEFAULT_SCOPE,
      state,
      redirect_uri: options.redirectUri === undefined ? this.config.callbackUrl : options.redirectUri,
    };

    return {
      url: makeUrl(`${this.config.oauthBaseUrl}/authorization`, params),
      state,
    };
  }

  /**
   * 以授權碼換取 token
   */
  async exchangeCode(code: string, extraParams: Record<string, string> = {}): Promise<TokenResponse> {
    if (typeof code !== 'string' || code.trim().length === 0) {
      throw new ValidationError('Supplied "code" argument is empty');
    }

    const form: JsonObject = {
      grant_type: 'authorization_code',
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      redirect_uri: this.config.callbackUrl,
      ...extraParams,
      code,
    };

    const response = await this.executor.execute('POST', `${this.config.oauthBaseUrl}/accessToken`, form, {
      requestFormat: 'urlencoded',
      responseFormat: 'json',
    });

    const token = parseTokenResponse(response);
    this.logger.info('Access token obtained', { expiresIn: token.expires_in });

    return token;
  }
}
