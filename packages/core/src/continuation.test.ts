import { describe, it, expect } from 'vitest';
import { decodeContinuation, encodeContinuation, fitsCallbackLimit } from './continuation.js';

const NIBIRU = 'nibiru1qpzry9x8gf2tvdw0s3jn54khce6mua7lqpzry9';
const EVM = '0xa1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1';

describe('encodeContinuation', () => {
    it('encodes the price page', () => {
        expect(encodeContinuation({ kind: 'prices', page: 3 })).toBe('p:3');
    });

    it('encodes trades with and without a symbol', () => {
        expect(encodeContinuation({
            kind: 'trades',
            address: { kind: 'cosmos', value: NIBIRU },
            status: 'open',
            fetched: 'open',
            symbol: 'BTC',
            page: 1,
        })).toBe(`t:o:f:1:${NIBIRU}:BTC`);

        expect(encodeContinuation({
            kind: 'trades',
            address: { kind: 'evm', value: EVM },
            status: 'closed',
            fetched: 'any',
            symbol: null,
            page: 2,
        })).toBe(`t:c:a:2:${EVM}`);
    });
});

describe('decodeContinuation', () => {
    it('reads back price and trade payloads', () => {
        expect(decodeContinuation('p:12')).toEqual({ kind: 'prices', page: 12 });
        expect(decodeContinuation(`t:o:f:1:${NIBIRU}:BTC`)).toEqual({
            kind: 'trades',
            address: { kind: 'cosmos', value: NIBIRU },
            status: 'open',
            fetched: 'open',
            symbol: 'BTC',
            page: 1,
        });
        expect(decodeContinuation(`t:c:a:2:${EVM}`)).toEqual({
            kind: 'trades',
            address: { kind: 'evm', value: EVM },
            status: 'closed',
            fetched: 'any',
            symbol: null,
            page: 2,
        });
    });

    it.each([
        ['unknown tag', 'x:1'],
        ['legacy prices payload', 'prices_next'],
        ['negative page', 'p:-1'],
        ['non-numeric page', 'p:two'],
        ['extra parts', 'p:1:2'],
        ['bad status', `t:x:a:1:${EVM}`],
        ['bad fetch filter', `t:o:x:1:${EVM}`],
        ['payload without a fetch filter', `t:o:1:${EVM}`],
        ['bad address', 't:o:a:1:0x1234'],
        ['missing address', 't:o:a:1'],
        ['empty', ''],
    ])('rejects %s', (_label, payload) => {
        expect(decodeContinuation(payload)).toBeNull();
    });
});

describe('fitsCallbackLimit', () => {
    it('allows payloads up to 64 bytes', () => {
        expect(fitsCallbackLimit(`t:o:a:1:${NIBIRU}:BTC`)).toBe(true);
        expect(fitsCallbackLimit('p:' + '1'.repeat(62))).toBe(true);
        expect(fitsCallbackLimit('p:' + '1'.repeat(63))).toBe(false);
    });
});
