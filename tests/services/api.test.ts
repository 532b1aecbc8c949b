import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ApiClient } from '../../src/services/api.js';
import { StructuredLogger } from '../../src/lib/logger.js';
import { XmlDocument } from '../../src/lib/xml.js';
import {
  ApiError,
  ConfigError,
  EnvironmentError,
  TransportError,
  ValidationError,
} from '../../src/lib/errors.js';
import { FakeTransport, silentLogger } from '../helpers/fake-transport.js';

const CALLBACK_URL = 'https://app.example.com/callback';

describe('ApiClient', () => {
  let transport: FakeTransport;
  let client: ApiClient;

  beforeEach(() => {
    transport = new FakeTransport();
    client = new ApiClient({
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      callbackUrl: CALLBACK_URL,
      transport,
      logger: silentLogger(),
    });
  });

  describe('constructor', () => {
    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it('should accept valid credentials', () => {
      expect(client.getConfig().clientId).toBe('test-client-id');
    });

    it('should reject an empty clientId', () => {
      expect(() => new ApiClient({ clientId: '', clientSecret: 'test-secret', transport })).toThrow(ConfigError);
    });

    it('should reject a whitespace-only clientSecret', () => {
      expect(() => new ApiClient({ clientId: 'test-client-id', clientSecret: '   ', transport })).toThrow(
        'Required parameter: clientSecret'
      );
    });

    it('should fail with EnvironmentError when fetch is unavailable', () => {
      vi.stubGlobal('fetch', undefined);

      const create = () => new ApiClient({ clientId: 'test-client-id', clientSecret: 'test-secret' });

      expect(create).toThrow(EnvironmentError);
      expect(create).toThrow(ConfigError);
    });

    it('should not need fetch when a transport is supplied', () => {
      vi.stubGlobal('fetch', undefined);

      expect(() => new ApiClient({ clientId: 'test-client-id', clientSecret: 'test-secret', transport })).not.toThrow();
    });

    it('should keep configuration per instance', () => {
      const other = new ApiClient({
        clientId: 'other-id',
        clientSecret: 'other-secret',
        apiBaseUrl: 'https://api.example.test/v2/',
        transport,
      });

      expect(other.getConfig().apiBaseUrl).toBe('https://api.example.test/v2');
      expect(client.getConfig().apiBaseUrl).toBe('https://api.linkedin.com/v1');
      expect(Object.isFrozen(client.getConfig())).toBe(true);
    });

    it('should verify TLS certificates by default', () => {
      expect(client.getConfig().rejectUnauthorized).toBe(true);
      expect(client.getConfig().connectTimeoutMs).toBe(30000);
      expect(client.getConfig().timeoutMs).toBe(90000);
    });
  });

  describe('buildAuthorizationUrl', () => {
    it('should build the authorization URL with defaults', () => {
      const url = new URL(client.buildAuthorizationUrl());

      expect(`${url.origin}${url.pathname}`).toBe('https://www.linkedin.com/uas/oauth2/authorization');
      expect(url.searchParams.get('response_type')).toBe('code');
      expect(url.searchParams.get('client_id')).toBe('test-client-id');
      expect(url.searchParams.get('scope')).toBe('r_basicprofile w_share');
      expect(url.searchParams.get('redirect_uri')).toBe(CALLBACK_URL);
    });

    it('should encode spaces in scope as +', () => {
      expect(client.buildAuthorizationUrl()).toContain('scope=r_basicprofile+w_share');
    });

    it('should store the generated state', () => {
      expect(client.getLastAuthState()).toBeNull();

      const url = new URL(client.buildAuthorizationUrl());

      expect(url.searchParams.get('state')).toBe(client.getLastAuthState());
    });

    it('should generate a different state on every call', () => {
      const first = new URL(client.buildAuthorizationUrl()).searchParams.get('state');
      const second = new URL(client.buildAuthorizationUrl()).searchParams.get('state');

      expect(first).not.toBe(second);
      expect(client.getLastAuthState()).toBe(second);
    });

    it('should let caller options override defaults', () => {
      const url = new URL(
        client.buildAuthorizationUrl({
          scope: 'r_emailaddress',
          state: 'fixed-state',
          extraParams: { prompt: 'login', state: 'ignored' },
        })
      );

      expect(url.searchParams.get('scope')).toBe('r_emailaddress');
      expect(url.searchParams.get('state')).toBe('fixed-state');
      expect(url.searchParams.get('prompt')).toBe('login');
      expect(client.getLastAuthState()).toBe('fixed-state');
    });

    it('should omit redirect_uri when no callback is configured', () => {
      const noCallback = new ApiClient({ clientId: 'test-client-id', clientSecret: 'test-secret', transport });

      const url = new URL(noCallback.buildAuthorizationUrl());

      expect(url.searchParams.has('redirect_uri')).toBe(false);
    });
  });

  describe('exchangeCodeForToken', () => {
    it('should reject an empty code without a network call', async () => {
      await expect(client.exchangeCodeForToken('')).rejects.toThrow(ValidationError);
      expect(transport.requests).toHaveLength(0);
    });

    it('should store the token and expiration', async () => {
      transport.reply(200, { access_token: 'tok123', expires_in: 3600 });

      const token = await client.exchangeCodeForToken('goodcode');

      expect(token).toBe('tok123');
      expect(client.getAccessToken()).toBe('tok123');
      expect(client.getAccessTokenExpiration()).toBe(3600);
      expect(client.hasAccessToken()).toBe(true);
    });

    it('should POST a form-encoded body to the token endpoint', async () => {
      transport.reply(200, { access_token: 'tok123', expires_in: 3600 });

      await client.exchangeCodeForToken('goodcode');

      const request = transport.requests[0];
      expect(request.method).toBe('POST');
      expect(request.url).toBe('https://www.linkedin.com/uas/oauth2/accessToken');
      expect(request.headers['Content-Type']).toBe('application/x-www-form-urlencoded');
      expect(request.headers['x-li-format']).toBe('json');
      expect(request.body).toBe(
        'grant_type=authorization_code&client_id=test-client-id&client_secret=test-secret' +
          '&redirect_uri=https%3A%2F%2Fapp.example.com%2Fcallback&code=goodcode'
      );
    });

    it('should merge extra parameters before the code', async () => {
      transport.reply(200, { access_token: 'tok123', expires_in: 3600 });

      await client.exchangeCodeForToken('goodcode', { redirect_uri: 'https://other.example.com/cb' });

      expect(transport.requests[0].body).toBe(
        'grant_type=authorization_code&client_id=test-client-id&client_secret=test-secret' +
          '&redirect_uri=https%3A%2F%2Fother.example.com%2Fcb&code=goodcode'
      );
    });

    it('should fail with ApiError when access_token is missing', async () => {
      transport.reply(200, { expires_in: 3600 });

      await expect(client.exchangeCodeForToken('goodcode')).rejects.toThrow('Token response is missing access_token');
      expect(client.hasAccessToken()).toBe(false);
    });

    it('should fail with ApiError when the body is not JSON', async () => {
      transport.reply(200, '<html>error</html>');

      await expect(client.exchangeCodeForToken('goodcode')).rejects.toThrow(ApiError);
    });

    it('should surface the provider message for an HTTP error', async () => {
      transport.reply(400, { error: 'invalid_request', error_description: 'missing required parameters' });

      const error = await client.exchangeCodeForToken('goodcode').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ status: 400, message: 'Request Error: missing required parameters' });
    });

    it('should fail with TransportError on connection failure', async () => {
      transport.fail(new TransportError('ECONNREFUSED', 'connect ECONNREFUSED'));

      await expect(client.exchangeCodeForToken('goodcode')).rejects.toThrow(TransportError);
    });
  });

  describe('setAccessToken', () => {
    it('should reject a whitespace-only token', () => {
      expect(() => client.setAccessToken('  ')).toThrow(ValidationError);
      expect(client.getAccessToken()).toBeNull();
    });

    it('should trim and store the token', () => {
      expect(client.setAccessToken(' abc ')).toBe('abc');
      expect(client.getAccessToken()).toBe('abc');
    });

    it('should store the expiration only when provided', () => {
      client.setAccessToken('abc', 60);
      client.setAccessToken('def');

      expect(client.getAccessTokenExpiration()).toBe(60);
    });
  });

  describe('call', () => {
    it('should omit the token parameter when no token is set', async () => {
      transport.reply(200, { firstName: 'Ada' });

      const result = await client.call('GET', '/people/~');

      expect(result).toEqual({ firstName: 'Ada' });
      expect(transport.requests[0].url).toBe('https://api.linkedin.com/v1/people/~');
    });

    it('should append the token parameter when a token is set', async () => {
      client.setAccessToken('abc');
      transport.reply(200, { firstName: 'Ada' });

      await client.call('GET', '/people/~');

      expect(transport.requests[0].url).toBe('https://api.linkedin.com/v1/people/~?oauth2_access_token=abc');
    });

    it('should join the token onto an existing query', async () => {
      client.setAccessToken('abc');
      transport.reply(200, { values: [] });

      await client.call('GET', '/companies?count=5');

      expect(transport.requests[0].url).toBe('https://api.linkedin.com/v1/companies?count=5&oauth2_access_token=abc');
    });

    it('should send default JSON headers', async () => {
      transport.reply(200, {});

      await client.call('GET', '/people/~');

      expect(transport.requests[0].headers).toEqual({
        'Content-Type': 'application/json',
        'x-li-format': 'json',
        'User-Agent': 'linkedin-api-client/1.0.0',
      });
      expect(transport.requests[0].body).toBeUndefined();
    });

    it('should JSON-encode an object body', async () => {
      transport.reply(201, '');

      const result = await client.call('POST', '/people/~/shares', { comment: 'Hello', visibility: { code: 'anyone' } });

      expect(result).toBeNull();
      expect(transport.requests[0].body).toBe('{"comment":"Hello","visibility":{"code":"anyone"}}');
    });

    it('should fail with ApiError for an error status in the body', async () => {
      transport.reply(200, { status: 404, message: 'not found' });

      await expect(client.call('GET', '/foo')).rejects.toThrow('not found');
    });

    it('should fail with ApiError for an HTTP error status', async () => {
      transport.reply(404, { status: 404, message: 'not found' });

      const error = await client.call('GET', '/foo').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ status: 404, message: 'Request Error: not found' });
    });

    it('should keep the raw body on ApiError', async () => {
      const raw = '{"status":500,"message":"Internal API error"}';
      transport.reply(200, raw);

      const error = await client.call('GET', '/foo').catch((err: unknown) => err);

      expect(error).toMatchObject({ rawBody: raw, status: 500 });
    });

    it('should treat a body without a status field as success', async () => {
      transport.reply(200, { id: 'abc123' });

      await expect(client.call('GET', '/people/~')).resolves.toEqual({ id: 'abc123' });
    });

    it('should parse XML responses', async () => {
      transport.reply(200, '<person><first-name>Ada</first-name></person>');

      const result = await client.call('GET', '/people/~', undefined, { responseFormat: 'xml' });

      expect(result).toBeInstanceOf(XmlDocument);
      expect(result).toMatchObject({ root: { person: { 'first-name': 'Ada' } } });
      expect(transport.requests[0].headers['x-li-format']).toBe('xml');
    });

    it('should send an XML document body', async () => {
      transport.reply(201, '');

      await client.call('POST', '/people/~/shares', new XmlDocument({ share: { comment: 'Hi' } }), {
        requestFormat: 'xml',
      });

      expect(transport.requests[0].headers['Content-Type']).toBe('text/xml');
      expect(transport.requests[0].body).toBe('<share><comment>Hi</comment></share>');
    });

    it('should wrap an unexpected transport failure in TransportError', async () => {
      transport.fail(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }));

      const error = await client.call('GET', '/people/~').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ transportCode: 'ECONNRESET' });
    });

    it('should never resolve after a transport failure', async () => {
      transport.fail(new Error('network down'));

      await expect(client.call('GET', '/people/~')).rejects.toThrow(TransportError);
    });
  });

  describe('logging', () => {
    let lines: string[];

    beforeEach(() => {
      lines = [];
      const capture = (message: string) => {
        lines.push(message);
      };
      vi.spyOn(console, 'log').mockImplementation(capture);
      vi.spyOn(console, 'debug').mockImplementation(capture);
      vi.spyOn(console, 'error').mockImplementation(capture);
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should not write tokens or secrets to the log', async () => {
      const logger = new StructuredLogger('API', { minLevel: 'debug' });
      const logged = new ApiClient({
        clientId: 'test-client-id',
        clientSecret: 'test-secret',
        transport,
        logger,
      });
      transport.reply(200, { access_token: 'tok123', expires_in: 3600 }).reply(200, { status: 401, message: 'denied' });

      await logged.exchangeCodeForToken('goodcode');
      await expect(logged.call('GET', '/people/~')).rejects.toThrow(ApiError);

      expect(lines.length).toBeGreaterThan(0);
      for (const line of lines) {
        expect(line).not.toContain('tok123');
        expect(line).not.toContain('test-secret');
      }
      expect(lines.some((line) => line.includes('oauth2_access_token=[REDACTED]'))).toBe(true);
    });
  });
});
