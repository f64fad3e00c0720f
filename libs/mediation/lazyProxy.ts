/**
 * Lazy Document Proxy
 *
 * Defers RealDocument construction to the first view, mutate or remove.
 * This is the one link that holds the concrete RealDocument type, since it
 * alone constructs it.
 *
 * INVARIANTS:
 * - describe() never loads.
 * - UNINITIALIZED -> INITIALIZED only; there is no way back.
 * - A failed load leaves the proxy UNINITIALIZED, so the next call retries.
 */

import { logger } from '../logging/logger.js';
import { DocumentLoader } from '../document/loader.js';
import { RealDocument } from '../document/realDocument.js';
import {
    OperationResult,
    Resource,
    ResourceOperation,
    failure,
    formatMetadata,
    success
} from '../document/resource.js';

type LazyState =
    | { readonly status: 'UNINITIALIZED' }
    | { readonly status: 'INITIALIZED'; readonly document: RealDocument };

export class LazyDocumentProxy implements Resource {
    private state: LazyState = { status: 'UNINITIALIZED' };

    constructor(
        public readonly identifier: string,
        private readonly loader: DocumentLoader
    ) { }

    public view(): OperationResult<string> {
        const resolved = this.resolve('view');
        return resolved.ok ? resolved.value.view() : failure(resolved.fault);
    }

    public mutate(newContent: string): OperationResult<void> {
        const resolved = this.resolve('mutate');
        return resolved.ok ? resolved.value.mutate(newContent) : failure(resolved.fault);
    }

    public remove(): OperationResult<void> {
        const resolved = this.resolve('remove');
        return resolved.ok ? resolved.value.remove() : failure(resolved.fault);
    }

    public describe(): OperationResult<string> {
        return success(formatMetadata(this.identifier));
    }

    public isInitialized(): boolean {
        return this.state.status === 'INITIALIZED';
    }

    private resolve(operation: ResourceOperation): OperationResult<RealDocument> {
        switch (this.state.status) {
            case 'INITIALIZED':
                return success(this.state.document);

            case 'UNINITIALIZED': {
                logger.debug({ identifier: this.identifier, operation }, 'First access, loading document');

                const opened = RealDocument.open(this.identifier, this.loader, operation);
                if (opened.ok) {
                    this.state = { status: 'INITIALIZED', document: opened.value };
                }
                return opened;
            }
        }
    }
}
