// src/kernel-core/L0/Crypto.ts
import { createHash, randomBytes } from 'crypto';

export const GENESIS_HASH = '0000000000000000000000000000000000000000000000000000000000000000';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical Encoding
// Deterministic JSON: object keys sorted, undefined members dropped, non-finite numbers rejected.
export function canonicalize(value: unknown): string {
    if (value === null || value === undefined) return 'null';

    switch (typeof value) {
        case 'number':
            if (!Number.isFinite(value)) throw new Error(`Canonicalization Error: non-finite number ${value}`);
            return JSON.stringify(value);
        case 'string':
        case 'boolean':
            return JSON.stringify(value);
        case 'bigint':
            return JSON.stringify(value.toString());
        case 'object':
            break;
        default:
            throw new Error(`Canonicalization Error: unsupported type ${typeof value}`);
    }

    if (Array.isArray(value)) {
        return `[${value.map(v => canonicalize(v === undefined ? null : v)).join(',')}]`;
    }

    const members: Array<[string, unknown]> = Object.entries(value);
    const encoded = members
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`);
    return `{${encoded.join(',')}}`;
}

export function digest(value: unknown): string {
    return hash(canonicalize(value));
}

// 1.3 Randomness
export function randomId(prefix: string, bytes: number = 8): string {
    return `${prefix}_${randomBytes(bytes).toString('hex')}`;
}
