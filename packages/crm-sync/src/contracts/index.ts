/**
 * CRM Sync Contracts
 *
 * @module contracts
 */

export * from './sync-record';
export * from './validation-session';
export * from './crm-data';
export * from './sync-result';
