/**
 * Document mediation: public surface.
 *
 * Chain layout, outermost first:
 * 1. Audit proxy → Records every attempt that reaches it
 * 2. Authorization proxy → Enforces the role/operation matrix
 * 3. Lazy proxy → Defers the expensive load until first content access
 * 4. Real document → Holds the content
 *
 * Audit and Authorization may be swapped; the terminal is always last.
 */

// Resource contract
export type { Resource, ResourceOperation, OperationResult } from '../document/resource.js';
export { RESOURCE_OPERATIONS } from '../document/resource.js';
export type { ResourceFault, ResourceFaultKind, FaultOrigin } from '../errors/faults.js';
export { DocumentLoadError } from '../errors/DocumentLoadError.js';

// Terminal
export type { DocumentLoader, SimulatedLoaderOptions } from '../document/loader.js';
export { SimulatedDocumentLoader } from '../document/loader.js';
export { RealDocument } from '../document/realDocument.js';

// Proxies
export { LazyDocumentProxy } from './lazyProxy.js';
export { AuthorizationProxy } from './authorizationProxy.js';
export { AuditProxy } from './auditProxy.js';

// Permissions
export type { DocumentRole, PermissionDecision, PermissionMatrix } from '../auth/permissions.js';
export {
    DEFAULT_PERMISSION_MATRIX,
    DOCUMENT_ROLES,
    isOperationAllowed,
    parsePermissionMatrix,
    readPermissionMatrixFile
} from '../auth/permissions.js';

// Audit
export type { AuditEntry, AuditOutcome, DocumentAuditRecord } from '../audit/schema.js';
export type { AuditSink } from '../audit/sinks.js';
export type { AuditChainVerification } from '../audit/integrity.js';
export { InMemoryAuditSink, LoggerAuditSink } from '../audit/sinks.js';
export { AuditTrail } from '../audit/trail.js';
export { LogSinkUnavailableError } from '../audit/LogSinkUnavailableError.js';
export { verifyAuditChain } from '../audit/integrity.js';

// Composition
export type { ChainSpec, MediatorSpec, TerminalSpec, OperationCall, StepOutcome } from '../composition/chain.js';
export { buildChain, describeChain, invoke, runSequence, formatOutcome } from '../composition/chain.js';
