/**
 * Test Fixtures
 *
 * Wires the API over in-memory services, a virtual clock and a CRM
 * HTTP stand-in.
 *
 * @module __tests__/fixtures
 */

import { MemoryCacheStore } from '@meetsync/lib';
import { VirtualClock } from '@meetsync/lib/testing';
import {
  createLogger,
  createSyncServices,
  type AppConfig,
  type FetchFn,
  type SyncServices,
  type ValidationSessionInput,
} from '@meetsync/crm-sync';
import { createApp, type AppOptions, type SyncApiApp } from '../app';

export const API_SECRET = 'test-secret';
export const NOW_ISO = '2024-01-15T09:00:00.000Z';

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Issues a token for any `/token` URL and answers API calls with
 * `respond`, recording every API URL.
 */
export class CRMStub {
  readonly apiCalls: string[] = [];
  respond: () => Response = () => jsonResponse({ id: 'crm-rec-1' });

  readonly fetch: FetchFn = async (input, init) => {
    if (input.endsWith('/token')) {
      return jsonResponse({ access_token: 'token-1', token_type: 'Bearer', expires_in: 3600 });
    }
    this.apiCalls.push(`${init?.method ?? 'GET'} ${input}`);
    return this.respond();
  };
}

export const CONFIG: AppConfig = {
  environment: 'test',
  port: 4010,
  apiSecret: API_SECRET,
  corsOrigins: ['http://localhost:5173'],
  logging: { level: 'error', format: 'json' },
  crm: {
    salesforce: { instanceUrl: 'https://sf.test', clientId: 'sf-client', clientSecret: 'test-secret' },
    hubspot: { baseUrl: 'https://hubspot.test', clientId: 'hs-client', clientSecret: 'test-secret' },
    creatio: {
      baseUrl: 'https://creatio.test',
      identityUrl: 'https://identity.creatio.test',
      clientId: 'creatio-client',
      clientSecret: 'test-secret',
    },
    sap_c4c: { baseUrl: 'https://c4c.test', clientId: 'c4c-client', clientSecret: 'test-secret' },
  },
  cacheTtlSeconds: 3600,
};

export interface ApiTestContext {
  app: SyncApiApp;
  services: SyncServices;
  clock: VirtualClock;
  crm: CRMStub;
}

export function createApiTestContext(options: Partial<AppOptions> = {}): ApiTestContext {
  const clock = new VirtualClock(NOW_ISO);
  const crm = new CRMStub();
  const services = createSyncServices(CONFIG, {
    cache: new MemoryCacheStore(clock),
    clock,
    fetchFn: crm.fetch,
    logger: createLogger({ level: 'error' }),
  });
  const app = createApp(services, { ...CONFIG, ...options });

  return { app, services, clock, crm };
}

export function sessionBody(overrides: Partial<ValidationSessionInput> = {}): ValidationSessionInput {
  return {
    id: 'vs-1',
    meeting: {
      id: 'mtg-1',
      title: 'Acme discovery call',
      start_time: '2024-01-15T08:00:00.000Z',
      end_time: '2024-01-15T08:45:00.000Z',
      lead: { crm_id: 'lead-001', name: 'Dana Buyer', email: 'buyer@acme.test', company: 'Acme' },
      updated_at: '2024-01-15T08:50:00.000Z',
    },
    sales_rep_email: 'rep@example.com',
    validated_summary: 'Acme wants a pilot in Q2.',
    rep_responses: { meeting_outcome: 'positive', next_steps: 'Send proposal by Friday' },
    approved_crm_updates: { stage: 'Proposal' },
    validation_status: 'completed',
    started_at: '2024-01-15T08:50:00.000Z',
    completed_at: '2024-01-15T08:59:00.000Z',
    ...overrides,
  };
}

/** JSON request with the API secret */
export function authed(method: string, body?: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json', 'X-Api-Secret': API_SECRET, ...headers },
    body: body === undefined ? undefined : JSON.stringify(body),
  };
}
