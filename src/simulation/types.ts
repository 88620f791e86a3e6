/**
 * Simulation Types
 */

export type AccessResult = 'success' | 'not_found' | 'access_denied' | 'error' | 'cancelled';

export type StoreOperation = 'fetch' | 'list' | 'listVersions' | 'put';

/**
 * Access log entry - records one operation against the mock store
 */
export interface AccessLogEntry {
  timestamp: Date;
  operation: StoreOperation;
  /** Secret name (absent for list) */
  name?: string;
  /** Requested or produced version */
  version?: string;
  result: AccessResult;
  /** Error message (if result is not success) */
  error?: string;
}
