import type { XmlDocument } from '../lib/xml.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type RequestFormat = 'json' | 'xml' | 'urlencoded';

export type ResponseFormat = 'json' | 'xml';

export interface RequestOptions {
  requestFormat?: RequestFormat;
  responseFormat?: ResponseFormat;
}

export type RequestBody = JsonValue | XmlDocument;

export type ResponseValue = JsonValue | XmlDocument;
