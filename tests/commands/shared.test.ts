import { describe, it, expect, afterEach, vi } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { EXIT_CODES, createApiClient, exitCodeFor, formatJSON, reportError } from '../../src/commands/shared.js';
import { maskConfig } from '../../src/commands/config.js';
import { ConfigService } from '../../src/services/config.js';
import { ApiClient } from '../../src/services/api.js';
import {
  ApiError,
  ConfigError,
  EnvironmentError,
  TransportError,
  ValidationError,
} from '../../src/lib/errors.js';

const MISSING_CONFIG = path.join(os.tmpdir(), 'linkedin-api-missing', 'config.json');

describe('Command Helpers', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe('exitCodeFor', () => {
    it('should map errors to exit codes', () => {
      expect(exitCodeFor(new ConfigError('x'))).toBe(EXIT_CODES.CONFIG);
      expect(exitCodeFor(new EnvironmentError('x'))).toBe(EXIT_CODES.CONFIG);
      expect(exitCodeFor(new ApiError('x', ''))).toBe(EXIT_CODES.API);
      expect(exitCodeFor(new TransportError('ECONNRESET', 'x'))).toBe(EXIT_CODES.API);
      expect(exitCodeFor(new ValidationError('x'))).toBe(EXIT_CODES.INPUT);
      expect(exitCodeFor('unknown')).toBe(EXIT_CODES.INPUT);
    });
  });

  describe('reportError', () => {
    it('should print the message and set the exit code', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      reportError(new ApiError('Request Error: not found', '{}', 404));

      expect(errorSpy).toHaveBeenCalledWith('❌ Request Error: not found');
      expect(process.exitCode).toBe(2);
    });
  });

  describe('createApiClient', () => {
    it('should fail without credentials', () => {
      vi.stubEnv('LINKEDIN_CLIENT_ID', '');
      vi.stubEnv('LINKEDIN_CLIENT_SECRET', '');

      expect(() => createApiClient(new ConfigService(MISSING_CONFIG))).toThrow(ConfigError);
    });

    it('should build a client from the environment', () => {
      vi.stubEnv('LINKEDIN_CLIENT_ID', 'env-id');
      vi.stubEnv('LINKEDIN_CLIENT_SECRET', 'env-secret');
      vi.stubEnv('LINKEDIN_CALLBACK_URL', 'https://app.example.com/cb');

      const client = createApiClient(new ConfigService(MISSING_CONFIG));

      expect(client).toBeInstanceOf(ApiClient);
      expect(client.getConfig().callbackUrl).toBe('https://app.example.com/cb');
    });
  });

  it('should format JSON', () => {
    expect(formatJSON({ a: 1 })).toBe('{\n  "a": 1\n}');
    expect(formatJSON({ a: 1 }, false)).toBe('{"a":1}');
  });

  it('should mask the client secret', () => {
    expect(maskConfig({ clientId: 'id', clientSecret: 'secret' })).toEqual({ clientId: 'id', clientSecret: '********' });
    expect(maskConfig({ clientId: 'id' })).toEqual({ clientId: 'id' });
  });
});
