// Price list ordering and lookup

import type { PriceRecord } from './types.js';

// Shown before every other token, in this order
export const POPULAR_SYMBOLS = ['BTC', 'ETH', 'USDT', 'USDC', 'NIBI', 'ATOM', 'SOL', 'BNB', 'AVAX', 'MATIC'] as const;

function popularityRank(symbol: string): number {
    const index = POPULAR_SYMBOLS.findIndex((popular) => popular === symbol.toUpperCase());
    return index === -1 ? POPULAR_SYMBOLS.length : index;
}

/**
 * Popular symbols first, in priority order. Everything else keeps its source order.
 */
export function sortByPopularity(prices: readonly PriceRecord[]): PriceRecord[] {
    // Array.prototype.sort is stable
    return [...prices].sort((a, b) => popularityRank(a.symbol) - popularityRank(b.symbol));
}

/**
 * Exact, case-insensitive symbol match. First match wins.
 */
export function findPrice(prices: readonly PriceRecord[], symbol: string): PriceRecord | null {
    const wanted = symbol.toUpperCase();
    return prices.find((price) => price.symbol.toUpperCase() === wanted) ?? null;
}
