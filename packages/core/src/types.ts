// Normalized types for the SAI trades and prices bot

export type ChainKind = 'cosmos' | 'evm';

export interface WalletAddress {
    kind: ChainKind;
    value: string;
}

export type TradeStatus = 'open' | 'closed';
export type TradeStatusFilter = TradeStatus | 'any';

export interface TradesCommand {
    kind: 'trades';
    address: WalletAddress;
    status: TradeStatusFilter;
    symbol: string | null; // upper-cased base symbol, null means all markets
}

export interface PricesCommand {
    kind: 'prices';
    page: number;
}

export interface PriceCommand {
    kind: 'price';
    symbol: string;
}

export interface HelpCommand {
    kind: 'help';
}

export type Command = TradesCommand | PricesCommand | PriceCommand | HelpCommand;

export interface Market {
    base: string;
    quote: string;
    marketId: string | null;
}

interface TradeBase {
    id: string;
    isLong: boolean;
    leverage: number | null;
    market: Market;
    symbol: string; // base token symbol, upper-cased
    entryPrice: number | null;
    collateral: number | null; // macro units
    openedAt: Date | null;
}

export interface OpenTrade extends TradeBase {
    status: 'open';
    positionValue: number | null;
    pnl: number | null;
    pnlPercent: number | null;
    liquidationPrice: number | null;
    currentCollateral: number | null;
}

export interface ClosedTrade extends TradeBase {
    status: 'closed';
    exitPrice: number | null;
    closedAt: Date | null;
}

export type TradeRecord = OpenTrade | ClosedTrade;

export interface PriceRecord {
    tokenId: string | null;
    symbol: string;
    value: number;
    updatedAt: Date | null;
}
