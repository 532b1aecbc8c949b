/**
 * Request Executor
 * 請求流程 - 編碼 body、送出、檢查狀態、解碼回應
 */

import { ApiError } from '../lib/errors.js';
import {
  DEFAULT_REQUEST_OPTIONS,
  REQUEST_CODECS,
  RESPONSE_CODECS,
  extractErrorMessage,
  isSuccessStatus,
  tryParseJson,
} from '../lib/formats.js';
import type { StructuredLogger } from '../lib/logger.js';
import { redactSecrets } from '../lib/url.js';
import { toTransportError } from './transport.js';
import type { HttpTransport, TransportResponse } from './transport.js';
import type { HttpMethod, RequestBody, RequestOptions, ResponseValue } from '../types/api.js';

/**
 * 非 2xx 的 HTTP 回應
 */
function apiErrorFromResponse(response: TransportResponse): ApiError {
  const message = extractErrorMessage(tryParseJson(response.body)) ?? `HTTP ${response.status}`;
  return new ApiError(`Request Error: ${message}`, response.body, response.status);
}

export class RequestExecutor {
  private transport: HttpTransport;
  private logger: StructuredLogger;
  private userAgent: string;

  constructor(transport: HttpTransport, logger: StructuredLogger, userAgent: string) {
    this.transport = transport;
    this.logger = logger;
    this.userAgent = userAgent;
  }

  async execute(
    method: HttpMethod,
    url: string,
    body?: RequestBody,
    options: RequestOptions = {}
  ): Promise<ResponseValue> {
    const requestCodec = REQUEST_CODECS[options.requestFormat ?? DEFAULT_REQUEST_OPTIONS.requestFormat];
    const responseCodec = RESPONSE_CODECS[options.responseFormat ?? DEFAULT_REQUEST_OPTIONS.responseFormat];

    const payload = requestCodec.encode(body);
    const headers: Record<string, string> = {
      'Content-Type': requestCodec.contentType,
      'x-li-format': responseCodec.formatHeader,
      'User-Agent': this.userAgent,
    };

    const startTime = Date.now();
    const requestId = this.logger.pushRequestId();
    const context = { requestId, method, url: redactSecrets(url) };

    this.logger.debug('API request started', context);

    try {
      let response: TransportResponse;
      try {
        response = await this.transport.send({ method, url, headers, body: payload });
      } catch (error) {
        throw toTransportError(error);
      }

      if (!isSuccessStatus(response.status)) {
        throw apiErrorFromResponse(response);
      }

      const value = responseCodec.decode(response.body);

      this.logger.info('API request completed', {
        ...context,
        duration: Date.now() - startTime,
        statusCode: response.status,
      });

      return value;
    } catch (error) {
      this.logger.error(
        'API request failed',
        error instanceof Error ? error : new Error(String(error)),
        { ...context, duration: Date.now() - startTime }
      );
      throw error;
    } finally {
      this.logger.popRequestId();
    }
  }
}
