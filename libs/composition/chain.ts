/**
 * Proxy Chain Composition
 *
 * Builds a linear chain of proxies around a document from a declarative
 * description, then drives capability calls through the outermost link.
 *
 * Ordering changes what gets observed, not whether the chain is correct:
 *   Audit -> Authorization -> ...   records denied attempts
 *   Authorization -> Audit -> ...   records only attempts that passed
 */

import { AuditTrail } from '../audit/trail.js';
import { DocumentRole, PermissionMatrix } from '../auth/permissions.js';
import { DocumentLoader } from '../document/loader.js';
import { RealDocument } from '../document/realDocument.js';
import {
    OperationResult,
    Resource,
    ResourceOperation,
    success
} from '../document/resource.js';
import { ResourceFaultKind } from '../errors/faults.js';
import { AuditProxy } from '../mediation/auditProxy.js';
import { AuthorizationProxy } from '../mediation/authorizationProxy.js';
import { LazyDocumentProxy } from '../mediation/lazyProxy.js';
import { logger } from '../logging/logger.js';

export type MediatorSpec =
    | { readonly kind: 'audit'; readonly actorId: string; readonly trail: AuditTrail }
    | { readonly kind: 'authorization'; readonly role: DocumentRole; readonly matrix?: PermissionMatrix };

export interface TerminalSpec {
    /** lazy: defer the load behind a LazyDocumentProxy. eager: load while building. */
    readonly kind: 'lazy' | 'eager';
    readonly identifier: string;
    readonly loader: DocumentLoader;
}

export interface ChainSpec {
    /** Outermost first. */
    readonly mediators: readonly MediatorSpec[];
    readonly terminal: TerminalSpec;
}

export type OperationCall =
    | { readonly operation: 'mutate'; readonly content: string }
    | { readonly operation: Exclude<ResourceOperation, 'mutate'> };

export type StepOutcome =
    | { readonly operation: ResourceOperation; readonly ok: true; readonly value?: string }
    | { readonly operation: ResourceOperation; readonly ok: false; readonly kind: ResourceFaultKind; readonly message: string };

/**
 * Builds the chain from the terminal outwards. Fails only when an eager
 * terminal cannot load its document.
 */
export function buildChain(spec: ChainSpec): OperationResult<Resource> {
    const terminal = buildTerminal(spec.terminal);
    if (!terminal.ok) {
        return terminal;
    }

    let link: Resource = terminal.value;
    for (const mediator of [...spec.mediators].reverse()) {
        link = wrap(link, mediator);
    }

    logger.debug({ chain: describeChain(spec) }, 'Proxy chain assembled');
    return success(link);
}

function buildTerminal(terminal: TerminalSpec): OperationResult<Resource> {
    switch (terminal.kind) {
        case 'lazy':
            return success(new LazyDocumentProxy(terminal.identifier, terminal.loader));
        case 'eager':
            return RealDocument.open(terminal.identifier, terminal.loader, 'open');
    }
}

function wrap(next: Resource, mediator: MediatorSpec): Resource {
    switch (mediator.kind) {
        case 'audit':
            return new AuditProxy(next, mediator.actorId, mediator.trail);
        case 'authorization':
            return new AuthorizationProxy(next, mediator.role, mediator.matrix);
    }
}

/**
 * Renders the ordering, e.g. `Audit(alice) -> Authorization(EDITOR) -> Lazy(doc-1)`.
 */
export function describeChain(spec: ChainSpec): string {
    const links = spec.mediators.map(mediator =>
        mediator.kind === 'audit'
            ? `Audit(${mediator.actorId})`
            : `Authorization(${mediator.role})`
    );

    links.push(spec.terminal.kind === 'lazy'
        ? `Lazy(${spec.terminal.identifier})`
        : `Real(${spec.terminal.identifier})`);

    return links.join(' -> ');
}

export function invoke(resource: Resource, call: OperationCall): OperationResult<string | void> {
    switch (call.operation) {
        case 'view':
            return resource.view();
        case 'mutate':
            return resource.mutate(call.content);
        case 'remove':
            return resource.remove();
        case 'describe':
            return resource.describe();
    }
}

/**
 * Invokes calls in order. A fault does not stop the sequence; retrying is
 * left to the caller.
 */
export function runSequence(resource: Resource, calls: readonly OperationCall[]): StepOutcome[] {
    return calls.map((call): StepOutcome => {
        const result = invoke(resource, call);

        if (!result.ok) {
            return {
                operation: call.operation,
                ok: false,
                kind: result.fault.kind,
                message: result.fault.message
            };
        }

        return typeof result.value === 'string'
            ? { operation: call.operation, ok: true, value: result.value }
            : { operation: call.operation, ok: true };
    });
}

export function formatOutcome(step: StepOutcome): string {
    if (!step.ok) {
        return `${step.operation} -> ${step.kind}: ${step.message}`;
    }
    return step.value === undefined
        ? `${step.operation} -> OK`
        : `${step.operation} -> OK ${step.value}`;
}
