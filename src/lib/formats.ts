/**
 * Format Codecs
 * 請求 / 回應格式 - 每種格式一組編碼與解碼策略
 */

import { ApiError, ValidationError } from './errors.js';
import { XmlDocument, XmlParseError } from './xml.js';
import type {
  JsonObject,
  JsonValue,
  RequestBody,
  RequestFormat,
  RequestOptions,
  ResponseFormat,
  ResponseValue,
} from '../types/api.js';

export interface RequestCodec {
  contentType: string;
  /** 回傳 undefined 表示不送出 body */
  encode(body: RequestBody | undefined): string | undefined;
}

export interface ResponseCodec {
  /** x-li-format 標頭值 */
  formatHeader: string;
  decode(raw: string): ResponseValue;
}

export const DEFAULT_REQUEST_OPTIONS: Required<RequestOptions> = {
  requestFormat: 'json',
  responseFormat: 'json',
};

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof XmlDocument);
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function isEmptyBody(body: RequestBody | undefined): body is null | undefined | '' {
  return body === null || body === undefined || body === '';
}

const jsonRequestCodec: RequestCodec = {
  contentType: 'application/json',
  encode(body) {
    if (isEmptyBody(body)) return undefined;
    if (body instanceof XmlDocument) {
      throw new ValidationError('Cannot send an XML document with the json request format');
    }
    if (typeof body === 'object') {
      return JSON.stringify(body);
    }
    // 純量直接送出
    return String(body);
  },
};

const xmlRequestCodec: RequestCodec = {
  contentType: 'text/xml',
  encode(body) {
    if (isEmptyBody(body)) return undefined;
    if (body instanceof XmlDocument) {
      return body.toString();
    }
    if (typeof body === 'string') {
      return body;
    }
    throw new ValidationError('The xml request format expects an XmlDocument or an XML string');
  },
};

const urlencodedRequestCodec: RequestCodec = {
  contentType: 'application/x-www-form-urlencoded',
  encode(body) {
    if (isEmptyBody(body)) return undefined;
    if (typeof body === 'string') {
      return body;
    }
    if (!isJsonObject(body)) {
      throw new ValidationError('The urlencoded request format expects a flat object or a string');
    }

    const form = new URLSearchParams();
    for (const [key, value] of Object.entries(body)) {
      if (value === null) continue;
      if (typeof value === 'object') {
        throw new ValidationError(`Cannot form-encode nested value for "${key}"`);
      }
      form.append(key, String(value));
    }
    return form.toString();
  },
};

/**
 * 從 JSON 錯誤內容取出供應商訊息
 */
export function extractErrorMessage(value: JsonValue | undefined): string | undefined {
  if (!isJsonObject(value)) return undefined;
  for (const key of ['message', 'error_description', 'error']) {
    const field = value[key];
    if (typeof field === 'string' && field.length > 0) {
      return field;
    }
  }
  return undefined;
}

/**
 * 回應內容的 status 欄位，接受數字或數字字串
 */
export function readStatusField(value: JsonObject): number | undefined {
  const { status } = value;
  if (typeof status === 'number') {
    return Number.isFinite(status) ? status : undefined;
  }
  if (typeof status === 'string' && status.trim() !== '') {
    const parsed = Number(status);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function tryParseJson(raw: string): JsonValue | undefined {
  try {
    const parsed: JsonValue = JSON.parse(raw);
    return parsed;
  } catch {
    return undefined;
  }
}

const jsonResponseCodec: ResponseCodec = {
  formatHeader: 'json',
  decode(raw) {
    if (raw.trim().length === 0) {
      return null;
    }

    const value = tryParseJson(raw);
    if (value === undefined) {
      throw new ApiError('Malformed JSON response', raw);
    }

    // 只有 status 欄位存在且為數值時才檢查
    const status = isJsonObject(value) ? readStatusField(value) : undefined;
    if (isJsonObject(value) && status !== undefined && !isSuccessStatus(status)) {
      const message = extractErrorMessage(value) ?? 'Unknown error';
      throw new ApiError(`Request Error: ${message}`, raw, status);
    }

    return value;
  },
};

const xmlResponseCodec: ResponseCodec = {
  formatHeader: 'xml',
  decode(raw) {
    try {
      return XmlDocument.parse(raw);
    } catch (error) {
      if (error instanceof XmlParseError) {
        throw new ApiError(`Malformed XML response: ${error.message}`, raw);
      }
      throw error;
    }
  },
};

export const REQUEST_CODECS: Record<RequestFormat, RequestCodec> = {
  json: jsonRequestCodec,
  xml: xmlRequestCodec,
  urlencoded: urlencodedRequestCodec,
};

export const RESPONSE_CODECS: Record<ResponseFormat, ResponseCodec> = {
  json: jsonResponseCodec,
  xml: xmlResponseCodec,
};

export function isRequestFormat(value: string): value is RequestFormat {
  return Object.prototype.hasOwnProperty.call(REQUEST_CODECS, value);
}

export function isResponseFormat(value: string): value is ResponseFormat {
  return Object.prototype.hasOwnProperty.call(RESPONSE_CODECS, value);
}
