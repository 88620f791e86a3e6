export { MockSecretStore } from './mockStore.js';
export type { AccessLogEntry, AccessResult, StoreOperation } from './types.js';
