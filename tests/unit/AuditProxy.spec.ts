/**
 * Unit Tests: Audit Proxy
 *
 * One record per attempt, whatever the outcome. Sink failures never change
 * the operation's result.
 *
 * @see libs/mediation/auditProxy.ts
 * @see libs/audit/trail.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { AuditProxy } from '../../libs/mediation/auditProxy.js';
import { AuthorizationProxy } from '../../libs/mediation/authorizationProxy.js';
import { AuditTrail } from '../../libs/audit/trail.js';
import { AuditSink, InMemoryAuditSink } from '../../libs/audit/sinks.js';
import { LogSinkUnavailableError } from '../../libs/audit/LogSinkUnavailableError.js';
import { DocumentAuditRecord } from '../../libs/audit/schema.js';
import { RealDocument } from '../../libs/document/realDocument.js';
import { SimulatedDocumentLoader } from '../../libs/document/loader.js';
import { OperationResult, Resource } from '../../libs/document/resource.js';
import { RecordingResource } from '../helpers/fakes.js';

class UnavailableSink implements AuditSink {
    readonly name = 'unavailable';
    public attempts = 0;

    public append(_record: DocumentAuditRecord): void {
        this.attempts++;
        throw new LogSinkUnavailableError(this.name);
    }
}

class ThrowingResource extends RecordingResource {
    public override view(): OperationResult<string> {
        throw new Error('storage exploded');
    }
}

describe('AuditProxy', () => {
    let sink: InMemoryAuditSink;
    let trail: AuditTrail;

    beforeEach(() => {
        sink = new InMemoryAuditSink();
        trail = new AuditTrail(sink);
    });

    describe('Recording', () => {
        it('should record one entry per call with actor, operation and outcome', () => {
            const proxy = new AuditProxy(new RecordingResource(), 'alice', trail);

            proxy.describe();
            proxy.view();
            proxy.mutate('x');
            proxy.remove();

            const records = sink.records();
            assert.deepStrictEqual(
                records.map(r => [r.actorId, r.operation, r.outcome, r.sequence]),
                [
                    ['alice', 'describe', 'SUCCESS', 0],
                    ['alice', 'view', 'SUCCESS', 1],
                    ['alice', 'mutate', 'SUCCESS', 2],
                    ['alice', 'remove', 'SUCCESS', 3]
                ]
            );
            assert.ok(records.every(r => !Number.isNaN(Date.parse(r.timestamp))));
        });

        it('should always delegate', () => {
            const target = new RecordingResource();
            const proxy = new AuditProxy(target, 'alice', trail);

            proxy.view();
            proxy.remove();

            assert.deepStrictEqual(target.calls.map(c => c.operation), ['view', 'remove']);
        });

        it('should record a denial raised below it exactly once', () => {
            const loader = new SimulatedDocumentLoader({ delayMs: 0 });
            const chain = new AuditProxy(
                new AuthorizationProxy(new RealDocument('doc-1', loader), 'VIEWER'),
                'bob',
                trail
            );

            const result = chain.remove();

            assert.strictEqual(result.ok, false);
            const records = sink.records();
            assert.strictEqual(records.length, 1);
            assert.strictEqual(records[0]?.outcome, 'DENIED');
            assert.strictEqual(records[0]?.operation, 'remove');
            assert.strictEqual(records[0]?.reason, 'Role VIEWER is not permitted to remove');
        });

        it('should record NOT_FOUND from the real document', () => {
            const doc = new RealDocument('doc-1', new SimulatedDocumentLoader({ delayMs: 0 }));
            const proxy = new AuditProxy(doc, 'alice', trail);

            proxy.remove();
            proxy.view();

            assert.deepStrictEqual(sink.records().map(r => r.outcome), ['SUCCESS', 'NOT_FOUND']);
        });
    });

    describe('Transparency', () => {
        it('should return downstream results unchanged', () => {
            const doc = new RealDocument('doc-1', new SimulatedDocumentLoader({ delayMs: 0 }));
            const proxy: Resource = new AuditProxy(doc, 'alice', trail);

            assert.deepStrictEqual(proxy.view(), doc.view());
            assert.deepStrictEqual(proxy.describe(), { ok: true, value: 'Metadata: doc-1' });
        });

        it('should record and rethrow an unexpected exception', () => {
            const proxy = new AuditProxy(new ThrowingResource(), 'alice', trail);

            assert.throws(() => proxy.view(), /storage exploded/);

            const records = sink.records();
            assert.strictEqual(records.length, 1);
            assert.strictEqual(records[0]?.outcome, 'UNHANDLED_EXCEPTION');
            assert.strictEqual(records[0]?.reason, 'storage exploded');
        });
    });

    describe('Sink failures', () => {
        it('should not surface LogSinkUnavailable as the operation result', () => {
            const unavailable = new UnavailableSink();
            const failingTrail = new AuditTrail(unavailable);
            const doc = new RealDocument('doc-1', new SimulatedDocumentLoader({ delayMs: 0 }));
            const proxy = new AuditProxy(doc, 'alice', failingTrail);

            assert.deepStrictEqual(proxy.view(), { ok: true, value: 'Content of doc-1' });
            assert.deepStrictEqual(proxy.mutate('still applied'), { ok: true, value: undefined });
            assert.deepStrictEqual(doc.view(), { ok: true, value: 'still applied' });

            assert.strictEqual(unavailable.attempts, 2);
            assert.strictEqual(failingTrail.failedWrites, 2);
        });

        it('should absorb arbitrary sink errors', () => {
            const brokenTrail = new AuditTrail({
                name: 'broken',
                append: () => { throw new TypeError('sink bug'); }
            });
            const proxy = new AuditProxy(new RecordingResource(), 'alice', brokenTrail);

            assert.strictEqual(proxy.remove().ok, true);
            assert.strictEqual(brokenTrail.failedWrites, 1);
        });
    });
});
