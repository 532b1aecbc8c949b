/**
 * Call Command
 * API 請求指令 - 以 token 呼叫任意 API 路徑
 */

import { Command } from 'commander';
import { ValidationError } from '../lib/errors.js';
import { isRequestFormat, isResponseFormat } from '../lib/formats.js';
import { XmlDocument } from '../lib/xml.js';
import type { ApiClient } from '../services/api.js';
import { createApiClient, formatJSON, reportError } from './shared.js';
import { HTTP_METHODS } from '../types/api.js';
import type { HttpMethod, JsonValue, RequestBody, RequestFormat, ResponseFormat } from '../types/api.js';

export interface CallCommandOptions {
  data?: string;
  requestFormat: string;
  responseFormat: string;
  token?: string;
}

export interface CallInput {
  method: HttpMethod;
  path: string;
  body: RequestBody | undefined;
  requestFormat: RequestFormat;
  responseFormat: ResponseFormat;
  token: string | undefined;
}

export function parseMethod(value: string): HttpMethod {
  const upper = value.toUpperCase();
  const method = HTTP_METHODS.find((candidate) => candidate === upper);
  if (!method) {
    throw new ValidationError(`Unsupported HTTP method: ${value}`);
  }
  return method;
}

/**
 * 解析 --data：json 格式需為合法 JSON，其他格式原樣送出
 */
export function parseBody(data: string | undefined, requestFormat: RequestFormat): RequestBody | undefined {
  if (data === undefined) return undefined;
  if (requestFormat !== 'json') return data;

  try {
    const parsed: JsonValue = JSON.parse(data);
    return parsed;
  } catch {
    throw new ValidationError('--data must be valid JSON when the request format is json');
  }
}

export function parseCallInput(
  method: string,
  path: string,
  options: CallCommandOptions,
  env: NodeJS.ProcessEnv = process.env
): CallInput {
  if (!isRequestFormat(options.requestFormat)) {
    throw new ValidationError(`Unsupported request format: ${options.requestFormat}`);
  }
  if (!isResponseFormat(options.responseFormat)) {
    throw new ValidationError(`Unsupported response format: ${options.responseFormat}`);
  }

  return {
    method: parseMethod(method),
    path: path.startsWith('/') ? path : `/${path}`,
    body: parseBody(options.data, options.requestFormat),
    requestFormat: options.requestFormat,
    responseFormat: options.responseFormat,
    token: options.token ?? env.LINKEDIN_ACCESS_TOKEN,
  };
}

/**
 * 執行請求並轉成輸出文字
 */
export async function runCall(client: ApiClient, input: CallInput): Promise<string> {
  if (input.token) {
    client.setAccessToken(input.token);
  }

  const result = await client.call(input.method, input.path, input.body, {
    requestFormat: input.requestFormat,
    responseFormat: input.responseFormat,
  });

  return result instanceof XmlDocument ? result.toString() : formatJSON(result);
}

export const callCommand = new Command('call')
  .description('呼叫 LinkedIn API')
  .argument('<method>', 'HTTP 方法 (GET|POST|PUT|PATCH|DELETE)')
  .argument('<path>', 'API 路徑，例如 /people/~')
  .option('-d, --data <body>', '請求內容')
  .option('--request-format <format>', '請求格式: json | xml | urlencoded', 'json')
  .option('--response-format <format>', '回應格式: json | xml', 'json')
  .option('-t, --token <token>', 'Access Token（預設讀取 LINKEDIN_ACCESS_TOKEN）')
  .action(async (method: string, path: string, options: CallCommandOptions) => {
    try {
      const input = parseCallInput(method, path, options);
      const client = createApiClient();
      console.log(await runCall(client, input));
    } catch (error) {
      reportError(error);
    }
  });
