/**
 * Service wiring
 *
 * Builds the cache, repositories, one client per CRM system, tracker,
 * notifier and the two services from an `AppConfig`.
 *
 * @module services
 */

import { WebClient } from '@slack/web-api';
import { createCacheStore, systemClock, type CacheStore, type Clock, type CRMSystem } from '@meetsync/lib';
import { createCRMClient, type CRMClientOptions, type FetchFn } from './clients';
import type { AppConfig } from './config';
import { CRMApprovalService } from './approval-service';
import { CRMSyncService, type CRMClientRegistry } from './crm-service';
import { createLogger, type SyncLogger } from './logger';
import { SlackSyncNotifier, type SyncNotifier } from './notifier';
import {
  CacheSyncRecordRepository,
  CacheValidationSessionRepository,
  type SyncRecordRepository,
  type ValidationSessionRepository,
} from './store';
import { SyncTracker } from './sync-tracker';

export interface SyncServices {
  cache: CacheStore;
  sessions: ValidationSessionRepository;
  records: SyncRecordRepository;
  tracker: SyncTracker;
  syncService: CRMSyncService;
  approvalService: CRMApprovalService;
  logger: SyncLogger;
  clock: Clock;
}

export interface SyncServiceOverrides {
  cache?: CacheStore;
  clock?: Clock;
  fetchFn?: FetchFn;
  logger?: SyncLogger;
  notifier?: SyncNotifier;
  clientOptions?: Partial<CRMClientOptions>;
}

export function createSyncServices(config: AppConfig, overrides: SyncServiceOverrides = {}): SyncServices {
  const clock = overrides.clock ?? systemClock;
  const logger = overrides.logger ?? createLogger(config.logging);
  const cache = overrides.cache ?? createCacheStore({ url: config.redis?.url, token: config.redis?.token, clock });

  const sessions = new CacheValidationSessionRepository(cache);
  const records = new CacheSyncRecordRepository(cache, { clock });
  const tracker = new SyncTracker({ cache, meetings: sessions, clock, logger });

  const buildClient = (system: CRMSystem) =>
    createCRMClient(
      system,
      config.crm,
      { fetchFn: overrides.fetchFn, clock, logger: logger.child({ crm_system: system }) },
      overrides.clientOptions
    );
  const clients: CRMClientRegistry = {
    salesforce: buildClient('salesforce'),
    hubspot: buildClient('hubspot'),
    creatio: buildClient('creatio'),
    sap_c4c: buildClient('sap_c4c'),
  };

  const notifier =
    overrides.notifier ??
    (config.slack
      ? new SlackSyncNotifier(
          { slackClient: new WebClient(config.slack.botToken), logger },
          { channel: config.slack.channel }
        )
      : undefined);

  const syncService = new CRMSyncService(
    {
      clients,
      sessions,
      records,
      cache,
      tracker,
      notifier,
      clock,
      logger,
    },
    { cacheTtlSeconds: config.cacheTtlSeconds }
  );

  const approvalService = new CRMApprovalService({ sessions, records, syncService, clock, logger });

  return { cache, sessions, records, tracker, syncService, approvalService, logger, clock };
}
