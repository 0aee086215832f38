import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import { GENESIS_HASH, canonicalize, digest, hash, randomId } from '../Crypto.js';

describe('Crypto primitives', () => {
    test('genesis hash is 64 zeros', () => {
        expect(GENESIS_HASH).toBe('0'.repeat(64));
    });

    test('hash is hex sha256', () => {
        expect(hash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });

    test('canonical encoding sorts keys and drops undefined members', () => {
        expect(canonicalize({ b: 1, a: [1, undefined, 'x'], c: undefined, d: { z: null, y: true } }))
            .toBe('{"a":[1,null,"x"],"b":1,"d":{"y":true,"z":null}}');
    });

    test('canonical encoding rejects non-finite numbers', () => {
        expect(() => canonicalize({ amount: Number.NaN })).toThrow('non-finite');
        expect(() => canonicalize([Infinity])).toThrow('non-finite');
    });

    test('digest ignores key order', () => {
        fc.assert(
            fc.property(fc.dictionary(fc.string(), fc.oneof(fc.integer(), fc.string(), fc.boolean())), (record) => {
                const reversed = Object.fromEntries(Object.entries(record).reverse());
                expect(digest(reversed)).toBe(digest(record));
            })
        );
    });

    test('random ids carry their prefix', () => {
        expect(randomId('ckpt')).toMatch(/^ckpt_[0-9a-f]{16}$/);
        expect(randomId('rev', 4)).toMatch(/^rev_[0-9a-f]{8}$/);
    });
});
