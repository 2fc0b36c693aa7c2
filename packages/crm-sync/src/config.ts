/**
 * Configuration
 *
 * Environment parsing for the sync service. Settings are read once here
 * and passed into constructors; services never read `process.env`.
 *
 * @module config
 */

import { z } from 'zod';
import type { CRMConnectionsConfig } from './clients';
import { HUBSPOT_DEFAULT_BASE_URL } from './clients';
import { SyncValidationError } from './errors';
import type { LogLevel } from './logger';

// ===========================================
// Schema
// ===========================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.string().default('production'),
  PORT: z.coerce.number().int().positive().default(4010),
  API_SECRET: optionalString,
  CORS_ORIGINS: z.string().default('http://localhost:5173'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).default('json'),

  SALESFORCE_INSTANCE_URL: z.string().default(''),
  SALESFORCE_CLIENT_ID: z.string().default(''),
  SALESFORCE_CLIENT_SECRET: z.string().default(''),

  HUBSPOT_BASE_URL: z.string().default(HUBSPOT_DEFAULT_BASE_URL),
  HUBSPOT_CLIENT_ID: z.string().default(''),
  HUBSPOT_CLIENT_SECRET: z.string().default(''),

  CREATIO_BASE_URL: z.string().default(''),
  CREATIO_IDENTITY_URL: z.string().default(''),
  CREATIO_CLIENT_ID: z.string().default(''),
  CREATIO_CLIENT_SECRET: z.string().default(''),

  SAP_C4C_BASE_URL: z.string().default(''),
  SAP_C4C_CLIENT_ID: z.string().default(''),
  SAP_C4C_CLIENT_SECRET: z.string().default(''),

  UPSTASH_REDIS_REST_URL: optionalString,
  UPSTASH_REDIS_REST_TOKEN: optionalString,

  SLACK_BOT_TOKEN: optionalString,
  SLACK_ESCALATION_CHANNEL: z.string().default('crm-sync-escalations'),

  CRM_SYNC_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
});

// ===========================================
// Config
// ===========================================

export interface AppConfig {
  environment: string;
  port: number;
  /** Undefined disables API auth; only accepted in development */
  apiSecret?: string;
  corsOrigins: string[];
  logging: { level: LogLevel; format: 'json' | 'pretty' };
  crm: CRMConnectionsConfig;
  redis?: { url: string; token: string };
  slack?: { botToken: string; channel: string };
  cacheTtlSeconds: number;
}

export type Env = Record<string, string | undefined>;

/**
 * Parse the environment into an `AppConfig`.
 * Throws `SyncValidationError` listing every invalid variable.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new SyncValidationError(`Invalid configuration: ${issues.join('; ')}`, undefined, { issues });
  }
  const e = parsed.data;

  if (!e.API_SECRET && e.NODE_ENV !== 'development') {
    throw new SyncValidationError('API_SECRET is required outside development');
  }

  return {
    environment: e.NODE_ENV,
    port: e.PORT,
    apiSecret: e.API_SECRET,
    corsOrigins: e.CORS_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    logging: { level: e.LOG_LEVEL, format: e.LOG_FORMAT },
    crm: {
      salesforce: {
        instanceUrl: e.SALESFORCE_INSTANCE_URL,
        clientId: e.SALESFORCE_CLIENT_ID,
        clientSecret: e.SALESFORCE_CLIENT_SECRET,
      },
      hubspot: {
        baseUrl: e.HUBSPOT_BASE_URL,
        clientId: e.HUBSPOT_CLIENT_ID,
        clientSecret: e.HUBSPOT_CLIENT_SECRET,
      },
      creatio: {
        baseUrl: e.CREATIO_BASE_URL,
        identityUrl: e.CREATIO_IDENTITY_URL,
        clientId: e.CREATIO_CLIENT_ID,
        clientSecret: e.CREATIO_CLIENT_SECRET,
      },
      sap_c4c: {
        baseUrl: e.SAP_C4C_BASE_URL,
        clientId: e.SAP_C4C_CLIENT_ID,
        clientSecret: e.SAP_C4C_CLIENT_SECRET,
      },
    },
    redis:
      e.UPSTASH_REDIS_REST_URL && e.UPSTASH_REDIS_REST_TOKEN
        ? { url: e.UPSTASH_REDIS_REST_URL, token: e.UPSTASH_REDIS_REST_TOKEN }
        : undefined,
    slack: e.SLACK_BOT_TOKEN ? { botToken: e.SLACK_BOT_TOKEN, channel: e.SLACK_ESCALATION_CHANNEL } : undefined,
    cacheTtlSeconds: e.CRM_SYNC_CACHE_TTL_SECONDS,
  };
}
