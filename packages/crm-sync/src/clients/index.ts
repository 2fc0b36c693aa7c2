/**
 * CRM Clients
 *
 * One client per CRM system, selected by an exhaustive switch.
 *
 * @module clients
 */

import type { CRMSystem } from '@meetsync/lib';
import type { BaseCRMClient, CRMClientDependencies, CRMClientOptions } from './base-client';
import { SalesforceClient, type SalesforceConfig } from './salesforce';
import { HubSpotClient, type HubSpotConfig } from './hubspot';
import { CreatioClient, type CreatioConfig } from './creatio';
import { SapC4CClient, type SapC4CConfig } from './sap-c4c';

export interface CRMConnectionsConfig {
  salesforce: SalesforceConfig;
  hubspot: HubSpotConfig;
  creatio: CreatioConfig;
  sap_c4c: SapC4CConfig;
}

/**
 * Create the client for a CRM system.
 */
export function createCRMClient(
  system: CRMSystem,
  config: CRMConnectionsConfig,
  deps: CRMClientDependencies = {},
  options: Partial<CRMClientOptions> = {}
): BaseCRMClient {
  switch (system) {
    case 'salesforce':
      return new SalesforceClient(config.salesforce, deps, options);
    case 'hubspot':
      return new HubSpotClient(config.hubspot, deps, options);
    case 'creatio':
      return new CreatioClient(config.creatio, deps, options);
    case 'sap_c4c':
      return new SapC4CClient(config.sap_c4c, deps, options);
    default: {
      const unreachable: never = system;
      throw new Error(`Unsupported CRM system: ${String(unreachable)}`);
    }
  }
}

export {
  BaseCRMClient,
  DEFAULT_CRM_CLIENT_OPTIONS,
  bulletList,
  compact,
  type ApprovalBasePayload,
  type CRMClientDependencies,
  type CRMClientOptions,
  type CRMConnection,
  type ConnectionTestResult,
  type FetchFn,
  type FormattedWriteResult,
  type HttpMethod,
} from './base-client';
export { RateLimiter, DEFAULT_RATE_LIMITER_CONFIG, type RateLimiterConfig } from './rate-limiter';
export { SalesforceClient, type SalesforceConfig } from './salesforce';
export { HubSpotClient, HUBSPOT_DEFAULT_BASE_URL, type HubSpotConfig } from './hubspot';
export { CreatioClient, type CreatioConfig } from './creatio';
export { SapC4CClient, type SapC4CConfig } from './sap-c4c';
