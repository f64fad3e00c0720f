/* eslint-disable no-console */

import { loadConfig } from "../../../libs/bootstrap/config.js";
import { logger } from "../../../libs/logging/logger.js";
import {
    AuditTrail,
    ChainSpec,
    DocumentLoader,
    InMemoryAuditSink,
    OperationCall,
    SimulatedDocumentLoader,
    buildChain,
    describeChain,
    formatOutcome,
    runSequence,
    verifyAuditChain
} from "../../../libs/mediation/index.js";

const CALLS: readonly OperationCall[] = [
    { operation: 'describe' },
    { operation: 'view' },
    { operation: 'mutate', content: 'New content' },
    { operation: 'remove' },
    { operation: 'view' }
];

type SpecFactory = (trail: AuditTrail, loader: DocumentLoader) => ChainSpec;

function runScenario(title: string, makeSpec: SpecFactory, delayMs: number): void {
    const sink = new InMemoryAuditSink();
    const trail = new AuditTrail(sink);
    const loader = new SimulatedDocumentLoader({ delayMs });
    const spec = makeSpec(trail, loader);

    console.log(`\n=== ${title} ===`);
    console.log(`Chain: ${describeChain(spec)}`);

    const chain = buildChain(spec);
    if (!chain.ok) {
        console.log(`build -> ${chain.fault.kind}: ${chain.fault.message}`);
        return;
    }

    for (const step of runSequence(chain.value, CALLS)) {
        console.log(formatOutcome(step));
    }

    console.log(`Loads: ${loader.loadCount}`);
    console.log('Audit trail:');
    for (const record of sink.records()) {
        console.log(`  [${record.timestamp}] #${record.sequence} ${record.actorId} ${record.operation} ${record.outcome}`);
    }

    const verification = verifyAuditChain(sink.records());
    console.log(`Audit chain: ${verification.valid ? 'valid' : verification.reason}`);
}

function main(): void {
    const config = loadConfig();
    const delayMs = config.DOCUMENT_LOAD_DELAY_MS;
    logger.info({ nodeEnv: config.NODE_ENV, loadDelayMs: delayMs }, "Document mediation demo starting");

    // Denied attempts reach the audit trail
    runScenario('Audit -> Authorization -> Lazy', (trail, loader) => ({
        mediators: [
            { kind: 'audit', actorId: 'user456', trail },
            { kind: 'authorization', role: 'EDITOR' }
        ],
        terminal: { kind: 'lazy', identifier: 'secret.pdf', loader }
    }), delayMs);

    // Denied attempts stop before the audit proxy
    runScenario('Authorization -> Audit -> Lazy', (trail, loader) => ({
        mediators: [
            { kind: 'authorization', role: 'VIEWER' },
            { kind: 'audit', actorId: 'user123', trail }
        ],
        terminal: { kind: 'lazy', identifier: 'report.pdf', loader }
    }), delayMs);

    runScenario('Audit -> Authorization -> Real', (trail, loader) => ({
        mediators: [
            { kind: 'audit', actorId: 'admin1', trail },
            { kind: 'authorization', role: 'ADMIN' }
        ],
        terminal: { kind: 'eager', identifier: 'document1.pdf', loader }
    }), delayMs);

    logger.info("Document mediation demo finished");
}

try {
    main();
} catch (err: unknown) {
    logger.fatal({ err }, "Document mediation demo failed");
    process.exit(1);
}
