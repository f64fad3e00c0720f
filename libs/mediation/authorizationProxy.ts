/**
 * Authorization Proxy
 *
 * Checks every call against the permission matrix before delegating.
 * A denied call returns DENIED and is never forwarded: the wrapped resource
 * does not observe it. Allowed calls pass through unchanged, and whatever
 * the downstream chain returns is returned verbatim.
 */

import { logger } from '../logging/logger.js';
import { denied } from '../errors/faults.js';
import {
    DEFAULT_PERMISSION_MATRIX,
    DocumentRole,
    PermissionMatrix,
    isOperationAllowed
} from '../auth/permissions.js';
import {
    OperationResult,
    Resource,
    ResourceOperation,
    failure
} from '../document/resource.js';

export class AuthorizationProxy implements Resource {
    constructor(
        private readonly next: Resource,
        public readonly role: DocumentRole,
        private readonly matrix: PermissionMatrix = DEFAULT_PERMISSION_MATRIX
    ) { }

    public view(): OperationResult<string> {
        return this.guard('view', () => this.next.view());
    }

    public mutate(newContent: string): OperationResult<void> {
        return this.guard('mutate', () => this.next.mutate(newContent));
    }

    public remove(): OperationResult<void> {
        return this.guard('remove', () => this.next.remove());
    }

    public describe(): OperationResult<string> {
        return this.guard('describe', () => this.next.describe());
    }

    private guard<T>(operation: ResourceOperation, delegate: () => OperationResult<T>): OperationResult<T> {
        if (!isOperationAllowed(this.matrix, this.role, operation)) {
            logger.warn({ role: this.role, operation }, 'Authorization proxy denied request');
            return failure(denied(operation, this.role));
        }

        return delegate();
    }
}
