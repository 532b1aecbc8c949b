/**
 * Error Types
 * 錯誤分類 - 設定、輸入驗證、傳輸層、API 回應
 */

export type ClientErrorCode =
  | 'CONFIG_ERROR'
  | 'ENVIRONMENT_ERROR'
  | 'VALIDATION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'API_ERROR';

export class LinkedInClientError extends Error {
  readonly code: ClientErrorCode;

  constructor(code: ClientErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LinkedInClientError';
    this.code = code;
  }
}

/**
 * 建構時的設定錯誤（缺少 client id / secret 等）
 */
export class ConfigError extends LinkedInClientError {
  constructor(message: string, code: ClientErrorCode = 'CONFIG_ERROR') {
    super(code, message);
    this.name = 'ConfigError';
  }
}

/**
 * 執行環境缺少必要能力（fetch）
 */
export class EnvironmentError extends ConfigError {
  constructor(message: string) {
    super(message, 'ENVIRONMENT_ERROR');
    this.name = 'EnvironmentError';
  }
}

export class ValidationError extends LinkedInClientError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

/**
 * 網路層錯誤（連線失敗、DNS、逾時）
 * transportCode 保留底層錯誤碼，例如 ECONNREFUSED
 */
export class TransportError extends LinkedInClientError {
  readonly transportCode: string;

  constructor(transportCode: string, message: string, cause?: unknown) {
    super('TRANSPORT_ERROR', `Transport error [${transportCode}]: ${message}`, { cause });
    this.name = 'TransportError';
    this.transportCode = transportCode;
  }
}

/**
 * 遠端 API 回傳錯誤狀態，或回應內容無法解析
 */
export class ApiError extends LinkedInClientError {
  /** HTTP 狀態或回應內容中的 status 欄位 */
  readonly status: number | undefined;
  readonly rawBody: string;

  constructor(message: string, rawBody: string, status?: number) {
    super('API_ERROR', message);
    this.name = 'ApiError';
    this.status = status;
    this.rawBody = rawBody;
  }
}

export function isClientError(error: unknown): error is LinkedInClientError {
  return error instanceof LinkedInClientError;
}
