// Export all services

export * from './config/config-service.js';
export * from './exec/process-runner.js';
export * from './hook-manager/hook-manager-service.js';
export * from './utility/utility-guard.js';
