/**
 * Sync API Tests
 *
 * Requests go through `app.request()` against in-memory services.
 *
 * @module __tests__/app
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import {
  API_SECRET,
  NOW_ISO,
  authed,
  createApiTestContext,
  jsonResponse,
  sessionBody,
  type ApiTestContext,
} from '../fixtures';

// ===========================================
// Test Fixtures
// ===========================================

const failing = () => jsonResponse({ error: 'down' }, 503);

const RecordListSchema = z.object({
  data: z.object({ sync_records: z.array(z.object({ id: z.string() })) }),
});

const FailedOperationsSchema = z.object({
  data: z.array(z.object({ tracking_id: z.string() })),
});

describe('sync API', () => {
  let ctx: ApiTestContext;

  async function request(path: string, init?: RequestInit): Promise<Response> {
    return ctx.app.request(path, init);
  }

  async function registerSession(overrides: Parameters<typeof sessionBody>[0] = {}): Promise<void> {
    const res = await request('/api/validation-sessions', authed('POST', sessionBody(overrides)));
    expect(res.status).toBe(201);
  }

  async function approve(systems: string[], dispatch = false): Promise<string[]> {
    const res = await request(
      '/api/validation-sessions/vs-1/approve-crm',
      authed('POST', { approved_systems: systems, dispatch })
    );
    expect(res.status).toBe(200);
    return RecordListSchema.parse(await res.json()).data.sync_records.map((record) => record.id);
  }

  beforeEach(() => {
    ctx = createApiTestContext();
  });

  // ===========================================
  // Public routes & middleware
  // ===========================================

  describe('health', () => {
    test('reports status without authentication', async () => {
      const res = await request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'healthy',
        version: '0.1.0',
        timestamp: NOW_ISO,
        services: { store: 'memory', auth: 'enabled' },
      });
    });

    test('echoes the request id', async () => {
      const res = await request('/health', { headers: { 'x-request-id': 'req-42' } });

      expect(res.headers.get('x-request-id')).toBe('req-42');
    });
  });

  describe('authentication', () => {
    test('requires the secret header on /api routes', async () => {
      const res = await request('/api/sync/health');

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        success: false,
        error: 'Missing X-Api-Secret header',
        code: 'AUTH_MISSING',
      });
    });

    test('rejects a wrong secret', async () => {
      const res = await request('/api/sync/health', { headers: { 'X-Api-Secret': 'wrong-secret' } });

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({ code: 'AUTH_INVALID' });
    });

    test('accepts the configured secret', async () => {
      const res = await request('/api/sync/health', { headers: { 'X-Api-Secret': API_SECRET } });

      expect(res.status).toBe(200);
    });

    test('fails closed without a secret outside development', async () => {
      ctx = createApiTestContext({ apiSecret: undefined, environment: 'production' });

      const res = await request('/api/sync/health');

      expect(res.status).toBe(500);
      expect(await res.json()).toMatchObject({ code: 'AUTH_CONFIG_ERROR' });
    });

    test('is disabled without a secret in development', async () => {
      ctx = createApiTestContext({ apiSecret: undefined, environment: 'development' });

      const res = await request('/api/sync/health');

      expect(res.status).toBe(200);
    });
  });

  describe('errors', () => {
    test('unknown routes answer 404 in the error envelope', async () => {
      const res = await request('/api/nowhere', authed('GET', undefined, { 'x-request-id': 'req-9' }));

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        success: false,
        error: 'Not found',
        code: 'NOT_FOUND',
        timestamp: NOW_ISO,
        requestId: 'req-9',
      });
    });
  });

  // ===========================================
  // Validation sessions
  // ===========================================

  describe('validation sessions', () => {
    test('registers and fetches a session with defaults applied', async () => {
      await registerSession();

      const res = await request('/api/validation-sessions/vs-1', authed('GET'));

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        success: true,
        data: { id: 'vs-1', bot_join_time: null, ai_generated_summary: '', changes_made: [] },
      });
    });

    test('rejects a malformed session', async () => {
      const res = await request('/api/validation-sessions', authed('POST', { sales_rep_email: 'rep@example.com' }));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        success: false,
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        details: { fields: { id: ['Required'] } },
      });
    });

    test('answers 404 for unknown sessions', async () => {
      const res = await request('/api/validation-sessions/nope', authed('GET', undefined, { 'x-request-id': 'req-7' }));

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        success: false,
        error: 'Validation session nope not found',
        code: 'NOT_FOUND',
        timestamp: NOW_ISO,
        requestId: 'req-7',
      });
    });
  });

  describe('approve-crm', () => {
    beforeEach(async () => {
      await registerSession();
    });

    test('creates pending records without touching the CRM', async () => {
      const res = await request(
        '/api/validation-sessions/vs-1/approve-crm',
        authed('POST', { approved_systems: ['hubspot'] })
      );

      expect(await res.json()).toMatchObject({
        success: true,
        data: { dispatched: false, sync_records: [{ crm_system: 'hubspot', sync_status: 'pending' }] },
      });
      expect(ctx.crm.apiCalls).toEqual([]);
    });

    test('dispatches the approved records on request', async () => {
      const res = await request(
        '/api/validation-sessions/vs-1/approve-crm',
        authed('POST', { approved_systems: ['hubspot'], dispatch: true })
      );

      expect(await res.json()).toMatchObject({
        data: {
          dispatched: true,
          sync_records: [{ crm_system: 'hubspot', sync_status: 'completed', crm_record_id: 'crm-rec-1' }],
        },
      });
      expect(ctx.crm.apiCalls).toEqual(['PATCH https://hubspot.test/crm/v3/objects/contacts/lead-001']);
    });

    test('requires at least one system', async () => {
      const res = await request('/api/validation-sessions/vs-1/approve-crm', authed('POST', { approved_systems: [] }));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        details: { fields: { approved_systems: ['Array must contain at least 1 element(s)'] } },
      });
    });

    test('maps unknown systems to 400', async () => {
      const res = await request(
        '/api/validation-sessions/vs-1/approve-crm',
        authed('POST', { approved_systems: ['pipedrive'] })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: 'Invalid CRM systems: pipedrive',
        code: 'VALIDATION_ERROR',
        details: { valid_systems: ['salesforce', 'hubspot', 'creatio', 'sap_c4c'] },
      });
    });

    test('maps lifecycle conflicts to 409', async () => {
      await registerSession({ validation_status: 'in_progress', completed_at: null });

      const res = await request(
        '/api/validation-sessions/vs-1/approve-crm',
        authed('POST', { approved_systems: ['salesforce'] })
      );

      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({
        error: 'Can only approve CRM updates for completed validation sessions',
        code: 'CONFLICT',
      });
    });
  });

  // ===========================================
  // Sync records
  // ===========================================

  describe('sync records', () => {
    beforeEach(async () => {
      await registerSession();
    });

    test('external processes report status through the open hook', async () => {
      const [recordId] = await approve(['salesforce']);

      const res = await request(`/hooks/crm-sync-records/${recordId}/status`, {
        method: 'PUT',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ status: 'completed', crm_record_id: 'EXT-9' }),
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { sync_status: 'completed', crm_record_id: 'EXT-9', synced_at: NOW_ISO },
      });
    });

    test('the hook answers 404 for unknown records', async () => {
      const res = await request('/hooks/crm-sync-records/nope/status', {
        method: 'PUT',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ status: 'failed', error_message: 'Quota exceeded' }),
      });

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: 'CRM sync record nope not found' });
    });

    test('retries a failed record and dispatches it again', async () => {
      ctx.crm.respond = failing;
      const [recordId] = await approve(['salesforce'], true);
      ctx.crm.respond = () => jsonResponse({ id: 'ok' });

      const res = await request(`/api/crm-sync-records/${recordId}/retry`, authed('POST'));

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { id: recordId, sync_status: 'completed', error_message: '', retry_count: 1 },
      });
    });

    test('refuses to retry a record that did not fail', async () => {
      const [recordId] = await approve(['salesforce']);

      const res = await request(`/api/crm-sync-records/${recordId}/retry`, authed('POST'));

      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({ error: 'Can only retry failed synchronizations' });
    });
  });

  // ===========================================
  // Direct sync & tracker
  // ===========================================

  describe('sync operations', () => {
    beforeEach(async () => {
      await registerSession();
    });

    test('a failed sync shows up in failed operations and can be retried', async () => {
      ctx.crm.respond = failing;
      const syncRes = await request('/api/validation-sessions/vs-1/sync', authed('POST', { crm_systems: ['salesforce'] }));
      expect(await syncRes.json()).toMatchObject({ data: { salesforce: { status: 'failed' } } });

      const failedRes = await request('/api/sync/failed-operations', authed('GET'));
      const failedBody: unknown = await failedRes.json();
      expect(failedBody).toMatchObject({
        total: 1,
        data: [{ meeting_id: 'mtg-1', operation: 'meeting_outcome', status: 'failed' }],
      });

      const [operation] = FailedOperationsSchema.parse(failedBody).data;
      ctx.crm.respond = () => jsonResponse({ id: 'ok' });
      const retryRes = await request(`/api/sync/operations/${operation.tracking_id}/retry`, authed('POST'));

      expect(retryRes.status).toBe(200);
      expect(await retryRes.json()).toMatchObject({
        data: {
          tracking_id: operation.tracking_id,
          operation: 'meeting_outcome',
          result: { status: 'success', message: 'Meeting outcome synced successfully' },
        },
      });
    });

    test('answers 404 for unknown tracking ids', async () => {
      const res = await request('/api/sync/operations/nope/retry', authed('POST'));

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: 'Tracked operation nope not found' });
    });

    test('rejects unsupported CRM systems in the body', async () => {
      const res = await request('/api/validation-sessions/vs-1/sync', authed('POST', { crm_systems: ['pipedrive'] }));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: 'VALIDATION_ERROR' });
    });

    test('meeting sync status lists tracked operations', async () => {
      await request('/api/validation-sessions/vs-1/sync', authed('POST', { crm_systems: ['hubspot'] }));

      const res = await request('/api/meetings/mtg-1/sync-status', authed('GET'));

      expect(await res.json()).toMatchObject({
        data: { summary: { total_operations: 1, successful: 1, failed: 0 } },
      });
    });

    test('suggests opportunity stages from the meeting outcome', async () => {
      const res = await request('/api/validation-sessions/vs-1/opportunity-suggestions', authed('GET'));

      expect(await res.json()).toEqual({
        success: true,
        data: {
          suggested_stages: ['Qualification', 'Needs Analysis', 'Proposal/Price Quote'],
          probability_adjustment: 10,
          next_steps: 'Send proposal by Friday',
          follow_up_required: false,
        },
      });
    });

    test('bulk sync requires opportunity id and stage update together', async () => {
      const res = await request(
        '/api/validation-sessions/vs-1/bulk-sync',
        authed('POST', { crm_system: 'salesforce', opportunity_id: 'opp-1' })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        details: { fields: { opportunity_id: ['opportunity_id and stage_update must be given together'] } },
      });
    });
  });

  describe('reports', () => {
    test('defaults to the last seven days', async () => {
      const res = await request('/api/sync/report', authed('GET'));

      expect(await res.json()).toMatchObject({
        data: { report_period: { start_date: '2024-01-08T09:00:00.000Z', end_date: NOW_ISO } },
      });
    });

    test('rejects a reversed range', async () => {
      const res = await request(
        '/api/sync/report?start_date=2024-01-10T00:00:00.000Z&end_date=2024-01-09T00:00:00.000Z',
        authed('GET')
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'start_date must not be after end_date' });
    });
  });

  // ===========================================
  // Opportunities
  // ===========================================

  describe('opportunities', () => {
    test('returns the raw CRM opportunity', async () => {
      const res = await request('/api/opportunities/opp-1?crm_system=salesforce', authed('GET'));

      expect(await res.json()).toEqual({ success: true, data: { id: 'crm-rec-1' } });
      expect(ctx.crm.apiCalls).toEqual(['GET https://sf.test/services/data/v58.0/sobjects/Opportunity/opp-1']);
    });

    test('requires the CRM system', async () => {
      const res = await request('/api/opportunities/opp-1', authed('GET'));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ details: { fields: { crm_system: ['Required'] } } });
    });

    test('maps CRM failures to 502', async () => {
      ctx.crm.respond = () => jsonResponse({ error: 'invalid_token' }, 401);

      const res = await request('/api/opportunities/opp-1?crm_system=salesforce', authed('GET'));

      expect(res.status).toBe(502);
      expect(await res.json()).toMatchObject({ code: 'CRM_ERROR', details: { crm_system: 'salesforce' } });
    });
  });
});
