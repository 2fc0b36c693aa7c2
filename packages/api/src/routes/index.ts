export { validationSessionRoutes } from './validation-sessions';
export { crmSyncRecordRoutes } from './crm-sync-records';
export { hookRoutes } from './hooks';
export { opportunityRoutes } from './opportunities';
export { meetingRoutes } from './meetings';
export { syncRoutes } from './sync';
