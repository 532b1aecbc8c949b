export { ApiClient } from './services/api.js';
export { AuthService, DEFAULT_SCOPE, generateState, parseTokenResponse } from './services/auth.js';
export type { AuthorizationRequest } from './services/auth.js';
export {
  ConfigService,
  resolveClientConfig,
  DEFAULT_API_BASE_URL,
  DEFAULT_OAUTH_BASE_URL,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from './services/config.js';
export { RequestExecutor } from './services/request.js';
export { OfetchTransport, extractTransportCode, toTransportError } from './services/transport.js';
export type {
  HttpTransport,
  OfetchTransportOptions,
  TransportRequest,
  TransportResponse,
} from './services/transport.js';
export {
  LinkedInClientError,
  ConfigError,
  EnvironmentError,
  ValidationError,
  TransportError,
  ApiError,
  isClientError,
} from './lib/errors.js';
export type { ClientErrorCode } from './lib/errors.js';
export { REQUEST_CODECS, RESPONSE_CODECS, isJsonObject, isSuccessStatus } from './lib/formats.js';
export type { RequestCodec, ResponseCodec } from './lib/formats.js';
export { XmlDocument, XmlParseError } from './lib/xml.js';
export type { XmlNode } from './lib/xml.js';
export { StructuredLogger, loggers, resolveLogLevel } from './lib/logger.js';
export type { LogContext, LogEntry, LogLevel, LoggerConfig } from './lib/logger.js';
export { makeUrl, buildQuery, redactSecrets } from './lib/url.js';
export { VERSION } from './version.js';
export { HTTP_METHODS } from './types/api.js';
export type * from './types/api.js';
export type * from './types/auth.js';
export type * from './types/config.js';
