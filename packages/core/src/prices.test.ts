import { describe, it, expect } from 'vitest';
import { findPrice, sortByPopularity } from './prices.js';
import type { PriceRecord } from './types.js';

function price(symbol: string, value = 1): PriceRecord {
    return { tokenId: null, symbol, value, updatedAt: null };
}

const symbols = (prices: PriceRecord[]): string[] => prices.map((p) => p.symbol);

describe('sortByPopularity', () => {
    it('puts popular symbols first in priority order and keeps the rest in source order', () => {
        const sorted = sortByPopularity([price('ZZZ'), price('ETH'), price('AAA'), price('BTC')]);
        expect(symbols(sorted)).toEqual(['BTC', 'ETH', 'ZZZ', 'AAA']);
    });

    it('matches popular symbols case-insensitively', () => {
        expect(symbols(sortByPopularity([price('foo'), price('usdc'), price('nibi')]))).toEqual(['usdc', 'nibi', 'foo']);
    });

    it('does not mutate its input', () => {
        const input = [price('AAA'), price('BTC')];
        sortByPopularity(input);
        expect(symbols(input)).toEqual(['AAA', 'BTC']);
    });
});

describe('findPrice', () => {
    it('matches the symbol exactly, ignoring case', () => {
        const prices = [price('BTCB', 2), price('btc', 3)];
        expect(findPrice(prices, 'BTC')).toEqual(price('btc', 3));
        expect(findPrice(prices, 'XYZ')).toBeNull();
    });
});
