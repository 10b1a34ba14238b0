export { AuditLogger } from './logger.js'
export type { AuditEvent } from './logger.js'
export { verifyAuditChain } from './verifier.js'
export type { VerificationResult, VerificationIssue } from './verifier.js'
export { canonicalize, hashEntry, GENESIS_HASH } from './hash.js'
