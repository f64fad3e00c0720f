/**
 * Audit Proxy
 *
 * Observes every call and always delegates. Each attempt produces exactly
 * one audit record, whatever the downstream outcome: a DENIED fault raised
 * further down the chain is recorded like any other result.
 *
 * Results and exceptions from downstream pass through untouched. Sink
 * failures are absorbed by the AuditTrail.
 */

import type { Logger } from 'pino';
import { getActorLogger } from '../logging/logger.js';
import { errorMessageOf } from '../errors/sanitizer.js';
import { AuditTrail } from '../audit/trail.js';
import { AuditOutcome } from '../audit/schema.js';
import {
    OperationResult,
    Resource,
    ResourceOperation
} from '../document/resource.js';

export class AuditProxy implements Resource {
    private readonly log: Logger;

    constructor(
        private readonly next: Resource,
        public readonly actorId: string,
        private readonly trail: AuditTrail
    ) {
        this.log = getActorLogger(actorId, 'audit-proxy');
    }

    public view(): OperationResult<string> {
        return this.observe('view', () => this.next.view());
    }

    public mutate(newContent: string): OperationResult<void> {
        return this.observe('mutate', () => this.next.mutate(newContent));
    }

    public remove(): OperationResult<void> {
        return this.observe('remove', () => this.next.remove());
    }

    public describe(): OperationResult<string> {
        return this.observe('describe', () => this.next.describe());
    }

    private observe<T>(operation: ResourceOperation, delegate: () => OperationResult<T>): OperationResult<T> {
        const timestamp = new Date().toISOString();
        this.log.debug({ operation, timestamp }, 'Document operation attempted');

        let result: OperationResult<T>;
        try {
            result = delegate();
        } catch (err: unknown) {
            this.record(operation, timestamp, 'UNHANDLED_EXCEPTION', errorMessageOf(err));
            throw err;
        }

        if (result.ok) {
            this.record(operation, timestamp, 'SUCCESS');
        } else {
            this.record(operation, timestamp, result.fault.kind, result.fault.message);
        }

        return result;
    }

    private record(operation: ResourceOperation, timestamp: string, outcome: AuditOutcome, reason?: string): void {
        this.trail.commit({
            actorId: this.actorId,
            operation,
            outcome,
            timestamp,
            ...(reason !== undefined ? { reason } : {})
        });
    }
}
