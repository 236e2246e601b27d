// Post-fetch trade filtering

import type { TradeRecord, TradeStatus } from './types.js';

/**
 * Keep trades whose base symbol matches, case-insensitively. Order is preserved.
 */
export function filterTradesBySymbol(trades: readonly TradeRecord[], symbol: string | null): TradeRecord[] {
    if (!symbol) return [...trades];
    const wanted = symbol.toUpperCase();
    return trades.filter((trade) => trade.symbol.toUpperCase() === wanted);
}

export function filterTradesByStatus(trades: readonly TradeRecord[], status: TradeStatus): TradeRecord[] {
    return trades.filter((trade) => trade.status === status);
}
