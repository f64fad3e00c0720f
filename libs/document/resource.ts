/**
 * Document Resource Contract
 *
 * The capability set shared by the real document and every proxy stacked
 * around it. Proxies hold a `Resource`, never a concrete type, so any link
 * can wrap any other.
 *
 * Outcomes are values: a denied or missing document is a `ResourceFault`
 * returned to the caller, not an exception.
 */

import type { ResourceFault } from '../errors/faults.js';

export type ResourceOperation = 'view' | 'mutate' | 'remove' | 'describe';

export const RESOURCE_OPERATIONS: readonly ResourceOperation[] = Object.freeze([
    'view',
    'mutate',
    'remove',
    'describe'
]);

export type OperationResult<T> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly fault: ResourceFault };

export interface Resource {
    /** Current content. NOT_FOUND once removed. */
    view(): OperationResult<string>;

    /** Replace the content. NOT_FOUND once removed. */
    mutate(newContent: string): OperationResult<void>;

    /** Drop the content. Removing twice is not an error. */
    remove(): OperationResult<void>;

    /** Identifier-derived metadata; never requires the content to be loaded. */
    describe(): OperationResult<string>;
}

export function success<T>(value: T): OperationResult<T> {
    return { ok: true, value };
}

export function completed(): OperationResult<void> {
    return { ok: true, value: undefined };
}

export function failure<T>(fault: ResourceFault): OperationResult<T> {
    return { ok: false, fault };
}

export function formatMetadata(identifier: string): string {
    return `Metadata: ${identifier}`;
}
