// Maps validated indexer rows to the normalized trade and price records

import type { RawBlock, RawPrice, RawToken, RawTrade } from './validation.js';
import type { ClosedTrade, OpenTrade, PriceRecord, TradeRecord } from './types.js';

// Collateral, position value and PnL come in integer base units (6 decimals)
export const BASE_UNIT_SCALE = 1_000_000;

export function toMacroUnits(value: number | null | undefined): number | null {
    return value === null || value === undefined ? null : value / BASE_UNIT_SCALE;
}

/**
 * Block timestamps come either as unix seconds or as an ISO date string
 */
export function parseBlockTimestamp(block: RawBlock | null | undefined): Date | null {
    const raw = block?.block_ts;
    if (raw === null || raw === undefined || raw === '') return null;

    const date = typeof raw === 'number' || /^\d+$/.test(raw)
        ? new Date(Number(raw) * 1000)
        : new Date(raw);

    return Number.isNaN(date.getTime()) ? null : date;
}

function tokenLabel(token: RawToken | null | undefined): string {
    return token?.symbol || token?.name || '?';
}

export function toTradeRecord(raw: RawTrade): TradeRecord {
    const market = raw.perpBorrowing;
    const base = tokenLabel(market?.baseToken);

    const common = {
        id: raw.id,
        isLong: raw.isLong ?? false,
        leverage: raw.leverage ?? null,
        market: {
            base,
            quote: tokenLabel(market?.quoteToken),
            marketId: market?.marketId ?? null,
        },
        symbol: base.toUpperCase(),
        entryPrice: raw.openPrice ?? null,
        collateral: toMacroUnits(raw.openCollateralAmount),
        openedAt: parseBlockTimestamp(raw.openBlock),
    };

    if (raw.isOpen) {
        const open: OpenTrade = {
            ...common,
            status: 'open',
            positionValue: toMacroUnits(raw.state?.positionValue),
            pnl: toMacroUnits(raw.state?.pnlCollateral),
            pnlPercent: raw.state?.pnlPct ?? null,
            liquidationPrice: raw.state?.liquidationPrice ?? null,
            currentCollateral: toMacroUnits(raw.collateralAmount),
        };
        return open;
    }

    const closed: ClosedTrade = {
        ...common,
        status: 'closed',
        exitPrice: raw.closePrice ?? null,
        closedAt: parseBlockTimestamp(raw.closeBlock),
    };
    return closed;
}

/**
 * Rows without a price are dropped
 */
export function toPriceRecord(raw: RawPrice): PriceRecord | null {
    if (raw.priceUsd === null || raw.priceUsd === undefined) return null;

    const tokenId = raw.token?.id ?? null;
    return {
        tokenId,
        symbol: raw.token?.symbol || raw.token?.name || `Token ${tokenId ?? '?'}`,
        value: raw.priceUsd,
        updatedAt: parseBlockTimestamp(raw.lastUpdatedBlock),
    };
}
