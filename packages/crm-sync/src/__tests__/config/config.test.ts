/**
 * Configuration Tests
 *
 * @module __tests__/config
 */

import { describe, test, expect } from 'vitest';
import { loadConfig } from '../../config';
import { SyncValidationError } from '../../errors';

describe('loadConfig', () => {
  test('applies defaults in development', () => {
    const config = loadConfig({ NODE_ENV: 'development' });

    expect(config).toMatchObject({
      environment: 'development',
      port: 4010,
      apiSecret: undefined,
      corsOrigins: ['http://localhost:5173'],
      logging: { level: 'info', format: 'json' },
      redis: undefined,
      slack: undefined,
      cacheTtlSeconds: 3600,
    });
    expect(config.crm.hubspot.baseUrl).toBe('https://api.hubapi.com');
    expect(config.crm.salesforce).toEqual({ instanceUrl: '', clientId: '', clientSecret: '' });
  });

  test('reads CRM, cache and notification settings', () => {
    const config = loadConfig({
      API_SECRET: 'test-secret',
      PORT: '8080',
      LOG_LEVEL: 'debug',
      CORS_ORIGINS: 'https://app.example.com, http://localhost:5173',
      SALESFORCE_INSTANCE_URL: 'https://acme.my.salesforce.com',
      SALESFORCE_CLIENT_ID: 'sf-client',
      SALESFORCE_CLIENT_SECRET: 'test-secret',
      CREATIO_IDENTITY_URL: 'https://identity.creatio.test',
      UPSTASH_REDIS_REST_URL: 'https://redis.upstash.test',
      UPSTASH_REDIS_REST_TOKEN: 'test-token',
      SLACK_BOT_TOKEN: 'xoxb-test',
      CRM_SYNC_CACHE_TTL_SECONDS: '600',
    });

    expect(config.port).toBe(8080);
    expect(config.apiSecret).toBe('test-secret');
    expect(config.corsOrigins).toEqual(['https://app.example.com', 'http://localhost:5173']);
    expect(config.logging.level).toBe('debug');
    expect(config.crm.salesforce).toEqual({
      instanceUrl: 'https://acme.my.salesforce.com',
      clientId: 'sf-client',
      clientSecret: 'test-secret',
    });
    expect(config.crm.creatio.identityUrl).toBe('https://identity.creatio.test');
    expect(config.redis).toEqual({ url: 'https://redis.upstash.test', token: 'test-token' });
    expect(config.slack).toEqual({ botToken: 'xoxb-test', channel: 'crm-sync-escalations' });
    expect(config.cacheTtlSeconds).toBe(600);
  });

  test('ignores a Redis URL without its token', () => {
    const config = loadConfig({ NODE_ENV: 'development', UPSTASH_REDIS_REST_URL: 'https://redis.upstash.test' });

    expect(config.redis).toBeUndefined();
  });

  test('requires the API secret outside development', () => {
    expect(() => loadConfig({})).toThrow('API_SECRET is required outside development');
  });

  test('lists invalid variables', () => {
    const error = (() => {
      try {
        loadConfig({ NODE_ENV: 'development', PORT: 'abc', LOG_LEVEL: 'verbose' });
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(SyncValidationError);
    expect(error).toMatchObject({ code: 'VALIDATION_FAILED' });
    expect(String(error)).toContain('PORT');
    expect(String(error)).toContain('LOG_LEVEL');
  });
});
