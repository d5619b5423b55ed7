export { logger, setupStructuredLogging } from './logger.js';
export { RateLimiter, sleep } from './rate-limiter.js';
export type { Sleeper } from './rate-limiter.js';
export { createMaintenanceScheduler, MaintenanceScheduler } from './maintenance.js';
