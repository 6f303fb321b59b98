/**
 * Matrix UUIDs - content-addressed matrix identifiers
 *
 * Same metadata content → same UUID, whatever order the keys were set in.
 */

import { createHash } from 'crypto';
import { canonicalStringify } from '../canonical-json.js';

export const MATRIX_UUID_LENGTH = 32;

/**
 * Generate the UUID of a matrix from its metadata record
 *
 * @returns SHA-256 of the canonical JSON (hex, truncated to 32 chars)
 */
export function generateMatrixUuid(metadata: Readonly<Record<string, unknown>>): string {
  return createHash('sha256')
    .update(canonicalStringify(metadata), 'utf-8')
    .digest('hex')
    .substring(0, MATRIX_UUID_LENGTH);
}

/**
 * Signature of a matrix identifier function, so callers can swap hashing
 */
export type MatrixUuidFn = (metadata: Readonly<Record<string, unknown>>) => string;
