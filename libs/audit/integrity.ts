import { DocumentAuditRecord, GENESIS_HASH } from "./schema.js";
import crypto from "crypto";

export type AuditChainVerification =
    | { valid: true }
    | { valid: false; violationIndex: number; reason: string };

/**
 * Audit Integrity Verifier
 * Validates the cryptographic chain of committed audit records.
 */
export function verifyAuditChain(records: readonly DocumentAuditRecord[]): AuditChainVerification {
    let lastHash = GENESIS_HASH;

    for (let i = 0; i < records.length; i++) {
        const record = records[i];
        if (!record) continue;

        // Verify prevHash link
        if (record.integrity.prevHash !== lastHash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Chain broken at record ${i}: prevHash mismatch. Expected ${lastHash}, found ${record.integrity.prevHash}`
            };
        }

        // Remove integrity field to reconstruct the content that was hashed
        const { integrity: _integrity, ...contentsOnly } = record;
        const computedHash = crypto.createHash("sha256")
            .update(JSON.stringify(contentsOnly) + record.integrity.prevHash)
            .digest("hex");

        if (computedHash !== record.integrity.hash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Integrity violation at record ${i}: hash mismatch. Computed ${computedHash}, found ${record.integrity.hash}`
            };
        }

        lastHash = record.integrity.hash;
    }

    return { valid: true };
}
