/**
 * Sync API contracts
 */
export * from './requests';
