/**
 * Resource Fault Taxonomy
 *
 * Faults travel up the chain unchanged: no proxy rewraps or swallows one
 * raised below it.
 */

import type { ResourceOperation } from '../document/resource.js';

export type ResourceFaultKind =
    | 'NOT_FOUND'            // Content has been removed
    | 'DENIED'               // Role lacks the capability
    | 'CONSTRUCTION_FAILED'; // Deferred load of the real document failed

/** 'open' marks a load not triggered by a capability call (eager chains). */
export type FaultOrigin = ResourceOperation | 'open';

export interface ResourceFault {
    readonly kind: ResourceFaultKind;
    readonly operation: FaultOrigin;
    readonly message: string;
}

export function notFound(operation: ResourceOperation, identifier: string): ResourceFault {
    return {
        kind: 'NOT_FOUND',
        operation,
        message: `Document ${identifier} has been removed`
    };
}

export function denied(operation: ResourceOperation, role: string): ResourceFault {
    return {
        kind: 'DENIED',
        operation,
        message: `Role ${role} is not permitted to ${operation}`
    };
}

export function constructionFailed(
    operation: FaultOrigin,
    identifier: string,
    cause: string
): ResourceFault {
    return {
        kind: 'CONSTRUCTION_FAILED',
        operation,
        message: `Document ${identifier} could not be loaded: ${cause}`
    };
}
