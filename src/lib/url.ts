/**
 * URL Utilities
 * URL 組合與敏感參數遮蔽
 */

export type QueryParams = Record<string, string | number | boolean | null | undefined>;

/** 日誌與錯誤訊息中需遮蔽的參數 */
const SENSITIVE_PARAM_PATTERN = /([?&])(oauth2_access_token|access_token|client_secret|code)=[^&#\s"']*/g;

export const REDACTED = '[REDACTED]';

/**
 * 以 form 編碼組合 query 字串（空白編碼為 +）
 * null / undefined 值會被略過
 */
export function buildQuery(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;
    search.append(key, String(value));
  }
  return search.toString();
}

/**
 * 在 URL 後附加 query 參數
 * URL 已有 query 時使用 & 連接
 */
export function makeUrl(url: string, params: QueryParams = {}): string {
  const query = buildQuery(params);
  if (query.length === 0) {
    return url;
  }
  return `${url}${url.includes('?') ? '&' : '?'}${query}`;
}

/**
 * 遮蔽 URL（或含 URL 的訊息）中的 token / secret 參數值
 */
export function redactSecrets(text: string): string {
  return text.replace(SENSITIVE_PARAM_PATTERN, `$1$2=${REDACTED}`);
}
