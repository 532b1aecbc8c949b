/**
 * OAuth2 Token Response
 * 授權碼交換後 token 端點回傳的內容
 */
export interface TokenResponse {
  access_token: string;
  expires_in: number;
}

/**
 * Session 狀態（可變）
 */
export interface SessionState {
  accessToken: string | null;
  /** token 有效秒數（由 token 端點或呼叫端提供） */
  accessTokenExpiresInSeconds: number | null;
  /** 最後一次產生授權網址時使用的 state */
  lastAuthState: string | null;
}

/**
 * 授權網址參數
 * 未提供的欄位使用預設值
 */
export interface AuthorizationUrlOptions {
  responseType?: string;
  clientId?: string;
  scope?: string;
  state?: string;
  redirectUri?: string | null;
  /** 額外附加到 query 的參數 */
  extraParams?: Record<string, string>;
}
