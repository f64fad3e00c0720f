/**
 * Document Permission Matrix
 *
 * Principles:
 * - Roles are a closed set; the matrix is total over role x operation
 * - No operation passes unchecked, describe included
 * - Tables are injected, never read from a module-level singleton at call time
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { RESOURCE_OPERATIONS, ResourceOperation } from '../document/resource.js';
import { validate } from '../validation/zod-middleware.js';

export type DocumentRole = 'ADMIN' | 'EDITOR' | 'VIEWER';

export const DOCUMENT_ROLES: readonly DocumentRole[] = Object.freeze(['ADMIN', 'EDITOR', 'VIEWER']);

export type PermissionDecision = 'ALLOW' | 'DENY';

export type PermissionMatrix = Readonly<Record<DocumentRole, Readonly<Record<ResourceOperation, PermissionDecision>>>>;

export const DEFAULT_PERMISSION_MATRIX: PermissionMatrix = Object.freeze({
    ADMIN: Object.freeze({ view: 'ALLOW', mutate: 'ALLOW', remove: 'ALLOW', describe: 'ALLOW' }),
    EDITOR: Object.freeze({ view: 'ALLOW', mutate: 'ALLOW', remove: 'DENY', describe: 'ALLOW' }),
    VIEWER: Object.freeze({ view: 'ALLOW', mutate: 'DENY', remove: 'DENY', describe: 'ALLOW' })
});

const DecisionSchema = z.enum(['ALLOW', 'DENY']);

const RoleRowSchema = z.object({
    view: DecisionSchema,
    mutate: DecisionSchema,
    remove: DecisionSchema,
    describe: DecisionSchema
}).strict();

// strict(): a misspelled role or operation must fail, not silently fall back.
export const PermissionMatrixSchema = z.object({
    ADMIN: RoleRowSchema,
    EDITOR: RoleRowSchema,
    VIEWER: RoleRowSchema
}).strict();

export function isOperationAllowed(
    matrix: PermissionMatrix,
    role: DocumentRole,
    operation: ResourceOperation
): boolean {
    return matrix[role][operation] === 'ALLOW';
}

/**
 * Validates an arbitrary value as a total permission matrix and returns a
 * frozen copy.
 */
export function parsePermissionMatrix(data: unknown, contextLabel: string): PermissionMatrix {
    const parsed = validate(PermissionMatrixSchema, data, contextLabel);

    return Object.freeze({
        ADMIN: Object.freeze({ ...parsed.ADMIN }),
        EDITOR: Object.freeze({ ...parsed.EDITOR }),
        VIEWER: Object.freeze({ ...parsed.VIEWER })
    });
}

/**
 * Loads a permission matrix from a JSON file.
 */
export function readPermissionMatrixFile(matrixPath: string): PermissionMatrix {
    const absolutePath = path.resolve(process.cwd(), matrixPath);
    if (!fs.existsSync(absolutePath)) {
        throw new Error(`Permission matrix missing at ${matrixPath}`);
    }

    const raw: unknown = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
    return parsePermissionMatrix(raw, `PermissionMatrix:${path.basename(matrixPath)}`);
}

/**
 * Lists every (role, operation) pair with its decision, in role then
 * operation order.
 */
export function listPermissions(
    matrix: PermissionMatrix
): Array<{ role: DocumentRole; operation: ResourceOperation; decision: PermissionDecision }> {
    return DOCUMENT_ROLES.flatMap(role =>
        RESOURCE_OPERATIONS.map(operation => ({ role, operation, decision: matrix[role][operation] }))
    );
}
