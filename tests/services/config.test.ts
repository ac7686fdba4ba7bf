import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigService, DEFAULT_SCOPE_STRING, parseScopes } from '../../src/services/config.js';
import { ConfigError } from '../../src/services/errors.js';

describe('ConfigService', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'asio-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function createService(env: NodeJS.ProcessEnv, files: { dotenv?: string; config?: string } = {}): ConfigService {
    const dotenvPath = path.join(dir, '.env');
    const configPath = path.join(dir, 'config.json');
    if (files.dotenv !== undefined) {
      fs.writeFileSync(dotenvPath, files.dotenv);
    }
    if (files.config !== undefined) {
      fs.writeFileSync(configPath, files.config);
    }
    return new ConfigService({ env, dotenvPath, configPath });
  }

  it('should build the application config from the environment', () => {
    const config = createService({
      ASIO_BASE_URL: 'https://example.test/',
      ASIO_CLIENT_ID: 'test-client',
      ASIO_CLIENT_SECRET: 'test-secret',
      ASIO_SCOPE: 'platform.sites.read',
    }).getAppConfig();

    expect(config).toEqual({
      baseUrl: 'https://example.test',
      clientId: 'test-client',
      clientSecret: 'test-secret',
      scope: 'platform.sites.read',
      tokenEndpoint: 'https://example.test/v1/token',
      logLevel: 'warn',
    });
  });

  it('should list every missing variable', () => {
    const service = createService({ ASIO_CLIENT_ID: 'test-client' });

    expect(() => service.getAppConfig()).toThrow(ConfigError);
    expect(() => service.getAppConfig()).toThrow(
      'Missing required configuration environment variables: ASIO_BASE_URL, ASIO_CLIENT_SECRET'
    );
    expect(service.hasCredentials()).toBe(false);
  });

  it('should load .env values without overriding the environment', () => {
    const env: NodeJS.ProcessEnv = { ASIO_CLIENT_ID: 'from-env' };
    const service = createService(env, {
      dotenv: 'ASIO_BASE_URL=https://dotenv.test\nASIO_CLIENT_ID=from-dotenv\nASIO_CLIENT_SECRET="test-secret"\n',
    });

    expect(service.getBaseUrl()).toBe('https://dotenv.test');
    expect(service.getClientId()).toBe('from-env');
    expect(service.getClientSecret()).toBe('test-secret');
  });

  it('should fall back to the config file', () => {
    const service = createService(
      { ASIO_BASE_URL: '  ' },
      { config: JSON.stringify({ baseUrl: 'https://file.test', logLevel: 'debug', clientId: 42 }) }
    );

    expect(service.getBaseUrl()).toBe('https://file.test');
    expect(service.getLogLevel()).toBe('debug');
    expect(service.getClientId()).toBeUndefined();
  });

  it('should reject an invalid config file', () => {
    expect(() => createService({}, { config: '{not json' })).toThrow(ConfigError);
  });

  it('should use the default scope set and log level', () => {
    const service = createService({ ASIO_LOG_LEVEL: 'chatty' });

    expect(service.getScope()).toBe(DEFAULT_SCOPE_STRING);
    expect(service.getLogLevel()).toBe('warn');
  });

  it('should split scope strings', () => {
    expect(parseScopes('"a.read  b.write"')).toEqual(['a.read', 'b.write']);
    expect(parseScopes('   ')).toEqual([]);
  });
});
