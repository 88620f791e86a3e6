export {
  DAY_MS,
  DEFAULT_EXPIRY_WARNING_MS,
  daysUntilExpiry,
  expiryStatus,
  warnOnExpiry,
  type ExpiryStatus,
} from './expiry.js';
export { NoOpRotationHandler, type RotationHandler } from './handler.js';
export {
  ExpiryMonitor,
  type ExpiryCheckResult,
  type ExpiryMonitorConfig,
  type ExpiryMonitorDeps,
} from './monitor.js';
