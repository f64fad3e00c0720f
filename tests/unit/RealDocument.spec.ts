/**
 * Unit Tests: RealDocument
 *
 * @see libs/document/realDocument.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { RealDocument } from '../../libs/document/realDocument.js';
import { SimulatedDocumentLoader } from '../../libs/document/loader.js';
import { DocumentLoadError } from '../../libs/errors/DocumentLoadError.js';
import { FlakyLoader } from '../helpers/fakes.js';

describe('RealDocument', () => {
    describe('Construction', () => {
        it('should load initial content exactly once', () => {
            const loader = new SimulatedDocumentLoader({ delayMs: 0 });
            const doc = new RealDocument('doc-1', loader);

            assert.strictEqual(loader.loadCount, 1);
            assert.deepStrictEqual(doc.view(), { ok: true, value: 'Content of doc-1' });
        });

        it('should throw DocumentLoadError when the loader fails', () => {
            assert.throws(
                () => new RealDocument('doc-1', new FlakyLoader(1)),
                (err: unknown) => {
                    assert.ok(err instanceof DocumentLoadError);
                    assert.strictEqual(err.code, 'DOCUMENT_LOAD_FAILED');
                    assert.strictEqual(err.identifier, 'doc-1');
                    assert.strictEqual(err.message, 'disk offline');
                    return true;
                }
            );
        });

        it('should convert a failed load into CONSTRUCTION_FAILED via open()', () => {
            const result = RealDocument.open('doc-1', new FlakyLoader(1), 'view');

            assert.deepStrictEqual(result, {
                ok: false,
                fault: {
                    kind: 'CONSTRUCTION_FAILED',
                    operation: 'view',
                    message: 'Document doc-1 could not be loaded: disk offline'
                }
            });
        });

        it('should block for the configured delay', () => {
            const loader = new SimulatedDocumentLoader({ delayMs: 30 });
            const started = Date.now();
            new RealDocument('slow.pdf', loader);

            assert.ok(Date.now() - started >= 25, 'load should take roughly the configured delay');
        });

        it('should reject a negative delay', () => {
            assert.throws(() => new SimulatedDocumentLoader({ delayMs: -1 }), /non-negative integer/);
        });
    });

    describe('Operations', () => {
        const load = () => new RealDocument('doc-1', new SimulatedDocumentLoader({ delayMs: 0 }));

        it('should replace content on mutate', () => {
            const doc = load();

            assert.deepStrictEqual(doc.mutate('new text'), { ok: true, value: undefined });
            assert.deepStrictEqual(doc.view(), { ok: true, value: 'new text' });
        });

        it('should report NOT_FOUND for view and mutate after removal', () => {
            const doc = load();
            doc.remove();

            assert.deepStrictEqual(doc.view(), {
                ok: false,
                fault: { kind: 'NOT_FOUND', operation: 'view', message: 'Document doc-1 has been removed' }
            });
            assert.deepStrictEqual(doc.mutate('x'), {
                ok: false,
                fault: { kind: 'NOT_FOUND', operation: 'mutate', message: 'Document doc-1 has been removed' }
            });
        });

        it('should treat repeated removal as success', () => {
            const doc = load();

            assert.strictEqual(doc.remove().ok, true);
            assert.strictEqual(doc.remove().ok, true);
            assert.strictEqual(doc.isRemoved(), true);
        });

        it('should describe from the identifier even after removal', () => {
            const doc = load();
            doc.remove();

            assert.deepStrictEqual(doc.describe(), { ok: true, value: 'Metadata: doc-1' });
        });

        it('should not share state between instances', () => {
            const loader = new SimulatedDocumentLoader({ delayMs: 0 });
            const a = new RealDocument('a', loader);
            const b = new RealDocument('b', loader);

            a.mutate('changed');
            b.remove();

            assert.deepStrictEqual(a.view(), { ok: true, value: 'changed' });
            assert.strictEqual(b.view().ok, false);
        });
    });
});
