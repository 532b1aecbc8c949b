/**
 * HTTP Transport
 * 傳輸層 - 預設使用 ofetch，連線設定交給 undici Agent
 */

import { ofetch } from 'ofetch';
import { Agent } from 'undici';
import { EnvironmentError, TransportError } from '../lib/errors.js';
import { redactSecrets } from '../lib/url.js';
import type { HttpMethod } from '../types/api.js';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface TransportResponse {
  status: number;
  body: string;
}

/**
 * 可替換的傳輸層
 * 連線層失敗應拋出 TransportError；HTTP 錯誤狀態照常回傳
 */
export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export interface OfetchTransportOptions {
  connectTimeoutMs: number;
  timeoutMs: number;
  rejectUnauthorized: boolean;
}

const FALLBACK_TRANSPORT_CODE = 'ETRANSPORT';
const MAX_CAUSE_DEPTH = 5;

function readCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value) {
    const { code } = value;
    if (typeof code === 'string' || typeof code === 'number') {
      return String(code);
    }
  }
  return undefined;
}

/**
 * 沿著 cause 鏈取出底層錯誤碼（ECONNREFUSED、UND_ERR_CONNECT_TIMEOUT 等）
 */
export function extractTransportCode(error: unknown): string {
  let current: unknown = error;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current instanceof Error; depth++) {
    // DOMException 的 code 是數字，逾時需先判斷
    if (current.name === 'TimeoutError') return 'ETIMEDOUT';
    const code = readCode(current);
    if (code) return code;
    current = current.cause;
  }
  return FALLBACK_TRANSPORT_CODE;
}

/**
 * 複製錯誤鏈並遮蔽訊息中的 token，保留 name 與 code
 */
function redactError(error: unknown, depth: number = 0): unknown {
  if (typeof error === 'string') return redactSecrets(error);
  if (!(error instanceof Error)) return error;

  const cause = depth + 1 < MAX_CAUSE_DEPTH ? redactError(error.cause, depth + 1) : undefined;
  const copy = new Error(redactSecrets(error.message), cause === undefined ? undefined : { cause });
  copy.name = error.name;

  const code = readCode(error);
  return code === undefined ? copy : Object.assign(copy, { code });
}

export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  // ofetch 的錯誤訊息包含完整 URL
  const message = redactSecrets(error instanceof Error ? error.message : String(error));
  return new TransportError(extractTransportCode(error), message, redactError(error));
}

export class OfetchTransport implements HttpTransport {
  private options: OfetchTransportOptions;

  constructor(options: OfetchTransportOptions) {
    if (typeof globalThis.fetch !== 'function') {
      throw new EnvironmentError('The fetch API is not available in this runtime');
    }
    this.options = options;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    // 每個請求各自建立並關閉 Agent
    const dispatcher = new Agent({
      connect: {
        timeout: this.options.connectTimeoutMs,
        rejectUnauthorized: this.options.rejectUnauthorized,
      },
    });

    try {
      const response = await ofetch.raw(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        responseType: 'text',
        ignoreResponseError: true,
        retry: 0,
        timeout: this.options.timeoutMs,
        dispatcher,
      });

      return {
        status: response.status,
        body: response._data ?? '',
      };
    } catch (error) {
      throw toTransportError(error);
    } finally {
      await dispatcher.close();
    }
  }
}
