/**
 * Shared Types for MeetSync
 *
 * Core type definitions used across all packages.
 */

// ===========================================
// CRM Systems
// ===========================================

/** Supported CRM systems, in the order they are offered for approval */
export const CRM_SYSTEMS = ['salesforce', 'hubspot', 'creatio', 'sap_c4c'] as const;

/** A CRM system the service can push meeting outcomes into */
export type CRMSystem = (typeof CRM_SYSTEMS)[number];

/** Display names used in logs, notifications and summaries */
export const CRM_SYSTEM_LABELS: Record<CRMSystem, string> = {
  salesforce: 'Salesforce',
  hubspot: 'HubSpot',
  creatio: 'Creatio',
  sap_c4c: 'SAP C4C',
};

/**
 * Narrow an arbitrary string to a CRM system.
 */
export function isCRMSystem(value: string): value is CRMSystem {
  return CRM_SYSTEMS.some((system) => system === value);
}

// ===========================================
// Utilities
// ===========================================

/** Round to two decimals, as used for rates and percentages */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
