/**
 * Document Audit Schema
 *
 * One record per capability attempt, committed after the downstream chain
 * returns. `timestamp` is taken when the attempt starts.
 */

import type { ResourceOperation } from '../document/resource.js';
import type { ResourceFaultKind } from '../errors/faults.js';

export type AuditOutcome =
    | 'SUCCESS'
    | ResourceFaultKind
    | 'UNHANDLED_EXCEPTION'; // Downstream threw instead of returning a fault

export interface AuditEntry {
    actorId: string;
    operation: ResourceOperation;
    outcome: AuditOutcome;
    timestamp: string;      // ISO-8601
    reason?: string;        // Fault or exception message
}

export interface DocumentAuditRecord extends AuditEntry {
    eventId: string;        // UUID
    sequence: number;       // Position in the trail, from 0
    integrity: {
        prevHash: string;   // Hash of the immediately preceding record
        hash: string;       // SHA-256(record_without_integrity_serialized || prevHash)
    };
}

export const GENESIS_HASH = '0'.repeat(64);
