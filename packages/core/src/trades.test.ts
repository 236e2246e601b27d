import { describe, it, expect } from 'vitest';
import { filterTradesBySymbol, filterTradesByStatus } from './trades.js';
import type { TradeRecord } from './types.js';

function trade(id: string, symbol: string, status: 'open' | 'closed'): TradeRecord {
    const common = {
        id,
        isLong: true,
        leverage: 2,
        market: { base: symbol, quote: 'USD', marketId: null },
        symbol: symbol.toUpperCase(),
        entryPrice: 1,
        collateral: 1,
        openedAt: null,
    };
    return status === 'open'
        ? { ...common, status, positionValue: null, pnl: null, pnlPercent: null, liquidationPrice: null, currentCollateral: null }
        : { ...common, status, exitPrice: null, closedAt: null };
}

const trades = [
    trade('1', 'BTC', 'open'),
    trade('2', 'ETH', 'open'),
    trade('3', 'btc', 'closed'),
    trade('4', 'SOL', 'closed'),
];

describe('filterTradesBySymbol', () => {
    it('keeps every matching trade, in order, ignoring case', () => {
        expect(filterTradesBySymbol(trades, 'Btc').map((t) => t.id)).toEqual(['1', '3']);
    });

    it('returns a copy of everything without a symbol', () => {
        const result = filterTradesBySymbol(trades, null);
        expect(result).toEqual(trades);
        expect(result).not.toBe(trades);
    });

    it('returns nothing for an unknown symbol', () => {
        expect(filterTradesBySymbol(trades, 'DOGE')).toEqual([]);
    });
});

describe('filterTradesByStatus', () => {
    it('splits open from closed', () => {
        expect(filterTradesByStatus(trades, 'open').map((t) => t.id)).toEqual(['1', '2']);
        expect(filterTradesByStatus(trades, 'closed').map((t) => t.id)).toEqual(['3', '4']);
    });
});
