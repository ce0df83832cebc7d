export { sha256, featureHash, hashesEqual, HashChain, FEATURE_HASH_VERSION } from './hasher.js';
export { SessionAuditLog } from './audit-log.js';
