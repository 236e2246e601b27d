import { describe, it, expect } from 'vitest';
import { NEXT_BUTTON_LABEL, keyboardFor, parseContextFrom, splitArgs } from './telegram.js';

describe('keyboardFor', () => {
    it('attaches a Next button carrying the continuation', () => {
        const keyboard = keyboardFor({ text: 'prices', next: { kind: 'prices', page: 1 } });
        expect(keyboard?.inline_keyboard).toEqual([[{ text: NEXT_BUTTON_LABEL, callback_data: 'p:1' }]]);
    });

    it('attaches nothing to a complete listing', () => {
        expect(keyboardFor({ text: 'done', next: null })).toBeUndefined();
    });

    it('drops a continuation that does not fit in a button', () => {
        const keyboard = keyboardFor({
            text: 'trades',
            next: {
                kind: 'trades',
                address: { kind: 'cosmos', value: 'nibiru1qpzry9x8gf2tvdw0s3jn54khce6mua7lqpzry9' },
                status: 'open',
                fetched: 'any',
                symbol: 'AVERYLONGTOKENSYMBOLNAME',
                page: 1,
            },
        });
        expect(keyboard).toBeUndefined();
    });
});

describe('parseContextFrom', () => {
    it('reads the current price page from the replied-to listing', () => {
        const listing = keyboardFor({ text: 'prices', next: { kind: 'prices', page: 2 } });
        expect(parseContextFrom({ reply_markup: listing })).toEqual({ pricesPage: 1 });
    });

    it('ignores url buttons and unreadable payloads', () => {
        expect(parseContextFrom({
            reply_markup: {
                inline_keyboard: [[
                    { text: 'Docs', url: 'https://example.com' },
                    { text: NEXT_BUTTON_LABEL, callback_data: 'p:oops' },
                ]],
            },
        })).toEqual({});
    });

    it('is empty without a replied-to message', () => {
        expect(parseContextFrom(undefined)).toEqual({});
        expect(parseContextFrom({})).toEqual({});
    });
});

describe('splitArgs', () => {
    it('splits command arguments on whitespace', () => {
        expect(splitArgs('  0xabc   open\tbtc ')).toEqual(['0xabc', 'open', 'btc']);
        expect(splitArgs('')).toEqual([]);
    });
});
