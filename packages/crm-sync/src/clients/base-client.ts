/**
 * Base CRM Client
 *
 * OAuth2 client-credentials authentication, rate limiting, 429/401 handling
 * and exponential backoff shared by every CRM client. Subclasses supply
 * endpoints and field mappings.
 *
 * @module clients/base-client
 */

import { z } from 'zod';
import { CRM_SYSTEM_LABELS, systemClock, type Clock, type CRMSystem } from '@meetsync/lib';
import type {
  CRMWriteResult,
  MeetingData,
  OAuth2Token,
  StageUpdate,
  TaskData,
} from '../contracts';
import { DEFAULT_RETRY_CONFIG, calculateDelay, parseRetryAfterMs, type RetryConfig } from '../backoff';
import {
  CRMAPIError,
  CRMAuthenticationError,
  CRMRateLimitError,
  getErrorMessage,
} from '../errors';
import { getLogger, type SyncLogger } from '../logger';
import { RateLimiter } from './rate-limiter';

// ===========================================
// Configuration
// ===========================================

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/** Where and how a client authenticates */
export interface CRMConnection {
  /** API root; empty means the system is not configured */
  baseUrl: string;
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  scope?: string;
}

export interface CRMClientOptions {
  requestsPerMinute: number;
  /** Minimum spacing between consecutive requests */
  minIntervalMs: number;
  /** Subtracted from the token lifetime reported by the CRM */
  tokenExpiryBufferMs: number;
  /** Lifetime assumed when the token response omits expires_in */
  defaultTokenTtlSeconds: number;
  retry: RetryConfig;
}

export const DEFAULT_CRM_CLIENT_OPTIONS: CRMClientOptions = {
  requestsPerMinute: 100,
  minIntervalMs: 100,
  tokenExpiryBufferMs: 60000,
  defaultTokenTtlSeconds: 3600,
  retry: DEFAULT_RETRY_CONFIG,
};

export interface CRMClientDependencies {
  fetchFn?: FetchFn;
  clock?: Clock;
  logger?: SyncLogger;
}

/** Meeting and lead fields every approval payload starts from */
export interface ApprovalBasePayload {
  meeting_id: string;
  meeting_title: string;
  meeting_date: string;
  attendees: string[];
  summary: string;
  validation_completed_at: string | null;
  sales_rep_email: string;
  lead_id?: string;
  lead_name?: string;
  lead_email?: string;
  company?: string;
}

export interface FormattedWriteResult extends CRMWriteResult {
  /** Fields as sent to the CRM */
  payload: Record<string, unknown>;
}

export interface ConnectionTestResult {
  system: CRMSystem;
  connected: boolean;
  error?: string;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.coerce.number().positive().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
});

/** Keys of approved updates that never go into an approval payload */
const NON_PAYLOAD_UPDATE_KEYS = new Set(['action_items', 'meeting_summary']);

// ===========================================
// Helpers
// ===========================================

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/** "• a\n• b" */
export function bulletList(items: string[]): string {
  return items.map((item) => `• ${item}`).join('\n');
}

/** Drop undefined and null values */
export function compact(fields: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined && value !== null) {
      result[key] = value;
    }
  }
  return result;
}

export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/\b\w/g, (char) => char.toUpperCase());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First string-ish id found under the given keys */
export function pickId(body: unknown, keys: string[]): string | null {
  if (!isRecord(body)) return null;
  for (const key of keys) {
    const value = body[key];
    if (typeof value === 'string' && value.length > 0) return value;
    if (typeof value === 'number') return String(value);
  }
  return null;
}

export function asRecord(body: unknown): Record<string, unknown> {
  return isRecord(body) ? body : { value: body };
}

// ===========================================
// Base Client
// ===========================================

export abstract class BaseCRMClient {
  readonly system: CRMSystem;
  protected readonly connection: CRMConnection;
  protected readonly options: CRMClientOptions;
  protected readonly fetchFn: FetchFn;
  protected readonly clock: Clock;
  protected readonly logger: SyncLogger;
  protected readonly rateLimiter: RateLimiter;

  private token: OAuth2Token | null = null;
  private pendingAuth: Promise<OAuth2Token> | null = null;

  protected constructor(
    system: CRMSystem,
    connection: CRMConnection,
    deps: CRMClientDependencies = {},
    options: Partial<CRMClientOptions> = {}
  ) {
    this.system = system;
    this.connection = {
      ...connection,
      baseUrl: trimTrailingSlash(connection.baseUrl),
    };
    this.options = { ...DEFAULT_CRM_CLIENT_OPTIONS, ...options };
    this.fetchFn = deps.fetchFn ?? ((input, init) => fetch(input, init));
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? getLogger();
    this.rateLimiter = new RateLimiter(
      {
        requestsPerMinute: this.options.requestsPerMinute,
        minIntervalMs: this.options.minIntervalMs,
      },
      {
        clock: this.clock,
        onWait: (waitMs) =>
          this.logger.rateLimited({ crm_system: this.system, wait_ms: waitMs, source: 'local_quota' }),
      }
    );
  }

  get label(): string {
    return CRM_SYSTEM_LABELS[this.system];
  }

  protected get baseUrl(): string {
    return this.connection.baseUrl;
  }

  // ===========================================
  // CRM Operations
  // ===========================================

  /** Update the record a meeting outcome is written to */
  abstract updateRecord(recordId: string, fields: Record<string, unknown>): Promise<CRMWriteResult>;

  /** Create a task attached to the given record */
  abstract createTask(recordId: string, fields: Record<string, unknown>): Promise<CRMWriteResult>;

  abstract updateOpportunityStage(opportunityId: string, update: StageUpdate): Promise<FormattedWriteResult>;

  abstract getOpportunityDetails(opportunityId: string): Promise<Record<string, unknown>>;

  // ===========================================
  // Field Formatting
  // ===========================================

  abstract formatMeetingData(data: MeetingData): Record<string, unknown>;

  abstract formatTaskData(data: TaskData): Record<string, unknown>;

  /** Approval payload: base fields plus this system's field names */
  abstract formatApprovalPayload(
    base: ApprovalBasePayload,
    updates: Record<string, unknown>
  ): Record<string, unknown>;

  async updateMeetingOutcome(recordId: string, data: MeetingData): Promise<FormattedWriteResult> {
    const payload = this.formatMeetingData(data);
    const result = await this.updateRecord(recordId, payload);
    return { ...result, payload };
  }

  async createFollowUpTask(recordId: string, data: TaskData): Promise<FormattedWriteResult> {
    const payload = this.formatTaskData(data);
    const result = await this.createTask(recordId, payload);
    return { ...result, payload };
  }

  /**
   * Rename approved update keys to CRM field names; other keys pass through.
   */
  protected mapApprovedUpdates(
    updates: Record<string, unknown>,
    fieldMap: Record<string, string>
  ): Record<string, unknown> {
    const mapped: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(updates)) {
      if (NON_PAYLOAD_UPDATE_KEYS.has(key)) continue;
      mapped[fieldMap[key] ?? key] = value;
    }
    return mapped;
  }

  // ===========================================
  // Authentication
  // ===========================================

  /**
   * Return a valid token, exchanging client credentials when the cached
   * one is missing or expired. Concurrent callers share one exchange.
   */
  async ensureAuthenticated(): Promise<OAuth2Token> {
    if (this.token && this.clock.now() < this.token.expires_at) {
      return this.token;
    }

    if (!this.pendingAuth) {
      this.pendingAuth = this.authenticate().finally(() => {
        this.pendingAuth = null;
      });
    }

    this.token = await this.pendingAuth;
    return this.token;
  }

  /** Drop the cached token; the next request re-authenticates */
  invalidateToken(): void {
    this.token = null;
  }

  protected async authenticate(): Promise<OAuth2Token> {
    const { baseUrl, tokenUrl, clientId, clientSecret, scope } = this.connection;
    if (!baseUrl || !tokenUrl || !clientId || !clientSecret) {
      throw new CRMAuthenticationError(`Missing ${this.label} OAuth2 credentials`, this.system);
    }

    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: clientId,
      client_secret: clientSecret,
    });
    if (scope) {
      body.set('scope', scope);
    }

    let response: Response;
    try {
      response = await this.fetchFn(tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: body.toString(),
      });
    } catch (error) {
      throw new CRMAuthenticationError(`Authentication failed: ${getErrorMessage(error)}`, this.system);
    }

    if (!response.ok) {
      const text = await readText(response);
      throw new CRMAuthenticationError(
        `Authentication failed: HTTP ${response.status}${text ? ` ${text.slice(0, 200)}` : ''}`,
        this.system
      );
    }

    const parsed = TokenResponseSchema.safeParse(parseJson(await readText(response)));
    if (!parsed.success) {
      throw new CRMAuthenticationError('Authentication failed: token response missing access_token', this.system);
    }

    const ttlMs = (parsed.data.expires_in ?? this.options.defaultTokenTtlSeconds) * 1000;
    const token: OAuth2Token = {
      access_token: parsed.data.access_token,
      refresh_token: parsed.data.refresh_token,
      expires_at: this.clock.now() + ttlMs - this.options.tokenExpiryBufferMs,
      token_type: parsed.data.token_type ?? 'Bearer',
      scope: parsed.data.scope,
    };

    this.logger.tokenAcquired({
      crm_system: this.system,
      expires_at: new Date(token.expires_at).toISOString(),
    });

    return token;
  }

  // ===========================================
  // HTTP
  // ===========================================

  /** Headers added to every API request */
  protected extraHeaders(): Record<string, string> {
    return {};
  }

  /**
   * Issue an authenticated request.
   *
   * - 429 waits Retry-After (default 60s) and re-issues; does not count
   *   as a failure. More than `maxRateLimitWaits` in a row raise
   *   CRMRateLimitError.
   * - 401 drops the token, re-authenticates once and retries once.
   * - Anything else retries with exponential backoff; the last allowed
   *   failure raises CRMAPIError.
   */
  protected async request(method: HttpMethod, url: string, body?: Record<string, unknown>): Promise<unknown> {
    const retry = this.options.retry;
    let failures = 0;
    let rateLimitWaits = 0;
    let reauthenticated = false;

    for (;;) {
      const token = await this.ensureAuthenticated();
      await this.rateLimiter.acquire();

      let response: Response;
      try {
        response = await this.fetchFn(url, {
          method,
          headers: {
            Authorization: `${token.token_type} ${token.access_token}`,
            'Content-Type': 'application/json',
            Accept: 'application/json',
            ...this.extraHeaders(),
          },
          body: body === undefined ? undefined : JSON.stringify(body),
        });
      } catch (error) {
        failures++;
        const reason = getErrorMessage(error);
        if (failures >= retry.maxAttempts) {
          throw new CRMAPIError(`API request failed: ${reason}`, { system: this.system });
        }
        await this.backoff(failures - 1, method, url, reason);
        continue;
      }

      if (response.status === 429) {
        await discardBody(response);
        rateLimitWaits++;
        const waitMs =
          parseRetryAfterMs(response.headers.get('retry-after'), this.clock.now()) ??
          retry.defaultRetryAfterMs;
        if (rateLimitWaits > retry.maxRateLimitWaits) {
          throw new CRMRateLimitError(
            `Rate limit persisted after ${retry.maxRateLimitWaits} waits`,
            waitMs,
            this.system
          );
        }
        this.logger.rateLimited({ crm_system: this.system, wait_ms: waitMs, source: 'remote_429' });
        await this.clock.sleep(waitMs);
        continue;
      }

      rateLimitWaits = 0;

      if (response.status === 401) {
        await discardBody(response);
        this.invalidateToken();
        if (reauthenticated) {
          throw new CRMAuthenticationError(
            `Authentication failed: ${this.label} rejected a freshly issued token`,
            this.system
          );
        }
        reauthenticated = true;
        continue;
      }

      if (!response.ok) {
        failures++;
        const text = await readText(response);
        const reason = `HTTP ${response.status}${text ? `: ${text.slice(0, 500)}` : ''}`;
        if (failures >= retry.maxAttempts) {
          throw new CRMAPIError(`API request failed: ${reason}`, {
            system: this.system,
            status: response.status,
            responseBody: text,
          });
        }
        await this.backoff(failures - 1, method, url, reason);
        continue;
      }

      return parseJson(await readText(response));
    }
  }

  private async backoff(attempt: number, method: HttpMethod, url: string, reason: string): Promise<void> {
    const delayMs = calculateDelay(attempt, this.options.retry);
    this.logger.requestRetried({
      crm_system: this.system,
      method,
      url,
      attempt: attempt + 1,
      delay_ms: delayMs,
      reason,
    });
    await this.clock.sleep(delayMs);
  }

  // ===========================================
  // Diagnostics
  // ===========================================

  async testConnection(): Promise<ConnectionTestResult> {
    try {
      await this.ensureAuthenticated();
      return { system: this.system, connected: true };
    } catch (error) {
      return { system: this.system, connected: false, error: getErrorMessage(error) };
    }
  }
}

// ===========================================
// Response Parsing
// ===========================================

/** Release a response whose body is not read */
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel();
}

async function readText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `<unreadable body: ${getErrorMessage(error)}>`;
  }
}

/** Parse a JSON body; empty bodies become null, non-JSON stays text */
function parseJson(text: string): unknown {
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}
