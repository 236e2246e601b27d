// Display formatting for trades and prices
// Pure functions only - the bot decides where the text goes

import { shortenAddress } from './address.js';
import type { Page } from './pagination.js';
import type {
    ClosedTrade,
    OpenTrade,
    PriceRecord,
    TradeRecord,
    TradeStatus,
    TradeStatusFilter,
    WalletAddress,
} from './types.js';

export const TRADE_DIVIDER = '━━━━━━━━━━━━━━━━━━━━';

const TWO_DECIMALS = new Intl.NumberFormat('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
});

/**
 * Monetary value with precision picked by magnitude:
 * |v| >= 1 (or zero) -> 2 decimals with separators, |v| >= 0.0001 -> 4 decimals, else 8.
 */
export function formatUsd(value: number): string {
    const abs = Math.abs(value);
    const sign = value < 0 ? '-' : '';

    let digits: string;
    if (abs >= 1 || abs === 0) {
        digits = TWO_DECIMALS.format(abs);
    } else if (abs >= 0.0001) {
        digits = abs.toFixed(4);
    } else {
        digits = abs.toFixed(8);
    }

    return `${sign}$${digits}`;
}

export function formatSignedUsd(value: number): string {
    return value >= 0 ? `+${formatUsd(value)}` : formatUsd(value);
}

export function formatPercent(value: number): string {
    return `${value >= 0 ? '+' : ''}${value.toFixed(2)}%`;
}

/**
 * 2024-03-01 14:05 UTC
 */
export function formatTimestamp(date: Date): string {
    return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

function formatHeader(trade: TradeRecord): string[] {
    const badge = trade.status === 'open' ? '✅ OPEN' : '❌ CLOSED';
    const side = trade.isLong ? '🟢 Long' : '🔴 Short';
    const leverage = trade.leverage === null ? '?' : `${trade.leverage}x`;
    const marketId = trade.market.marketId === null ? '' : ` (ID: ${trade.market.marketId})`;

    return [
        TRADE_DIVIDER,
        `Trade #${trade.id} | ${badge}`,
        `Market: ${trade.market.base}/${trade.market.quote}${marketId}`,
        `Side: ${side} | Leverage: ${leverage}`,
    ];
}

function pushMoney(lines: string[], label: string, value: number | null): void {
    if (value !== null) lines.push(`${label}: ${formatUsd(value)}`);
}

function pushTime(lines: string[], label: string, value: Date | null): void {
    if (value !== null) lines.push(`${label}: ${formatTimestamp(value)}`);
}

export function formatOpenTrade(trade: OpenTrade): string {
    const lines = formatHeader(trade);

    pushMoney(lines, 'Entry Price', trade.entryPrice);
    pushMoney(lines, 'Liquidation Price', trade.liquidationPrice);
    pushMoney(lines, 'Position Value', trade.positionValue);

    if (trade.pnl !== null) {
        const glyph = trade.pnl >= 0 ? '📈' : '📉';
        const percent = trade.pnlPercent === null ? '' : ` (${formatPercent(trade.pnlPercent)})`;
        lines.push(`PnL: ${glyph} ${formatSignedUsd(trade.pnl)}${percent}`);
    } else if (trade.pnlPercent !== null) {
        const glyph = trade.pnlPercent >= 0 ? '📈' : '📉';
        lines.push(`PnL: ${glyph} ${formatPercent(trade.pnlPercent)}`);
    }

    pushMoney(lines, 'Collateral', trade.collateral);
    if (trade.currentCollateral !== trade.collateral) {
        pushMoney(lines, 'Current Collateral', trade.currentCollateral);
    }
    pushTime(lines, 'Opened', trade.openedAt);

    return lines.join('\n');
}

export function formatClosedTrade(trade: ClosedTrade): string {
    const lines = formatHeader(trade);

    pushMoney(lines, 'Entry Price', trade.entryPrice);
    pushMoney(lines, 'Exit Price', trade.exitPrice);
    pushMoney(lines, 'Collateral', trade.collateral);
    pushTime(lines, 'Opened', trade.openedAt);
    pushTime(lines, 'Closed', trade.closedAt);

    return lines.join('\n');
}

export function formatTrade(trade: TradeRecord): string {
    return trade.status === 'open' ? formatOpenTrade(trade) : formatClosedTrade(trade);
}

function formatRange(page: Page<unknown>): string {
    return `${page.start + 1}-${page.end} of ${page.total}`;
}

/**
 * One listing per status: count summary, visible range, then the trade blocks
 */
export function formatTradeListing(address: WalletAddress, status: TradeStatus, page: Page<TradeRecord>): string {
    const badge = status === 'open' ? '✅' : '❌';
    const noun = page.total === 1 ? 'trade' : 'trades';
    const header = `${badge} ${page.total} ${status} ${noun} found for ${shortenAddress(address)}`;

    return [
        header,
        `Showing ${formatRange(page)}`,
        '',
        page.visible.map(formatTrade).join('\n\n'),
    ].join('\n');
}

export function formatNoTrades(address: WalletAddress, status: TradeStatusFilter, symbol: string | null): string {
    const parts = ['No'];
    if (status !== 'any') parts.push(status);
    parts.push('trades');
    if (symbol) parts.push(`for ${symbol}`);
    return `${parts.join(' ')} found for address: ${address.value}`;
}

export function formatPriceListing(page: Page<PriceRecord>): string {
    const rows = page.visible.map((price) => `• ${price.symbol}: ${formatUsd(price.value)}`);
    return [`💰 Oracle Prices (${formatRange(page)})`, '', ...rows].join('\n');
}

export function formatSinglePrice(price: PriceRecord): string {
    return `💰 ${price.symbol}: ${formatUsd(price.value)}`;
}

export const NO_PRICES_MESSAGE = 'No prices found.';

export function formatPriceNotFound(symbol: string): string {
    return `Token '${symbol}' not found.`;
}

export const HELP_TEXT = [
    'Welcome to SAI Bot!',
    '',
    'Commands:',
    '/trades <address> [open|closed] [symbol] – View trades',
    '/prices [next] – Show oracle prices, 10 at a time',
    '/price <symbol> – Get price for a specific token',
    '/help – Show this help message',
    '',
    'Supported addresses:',
    '• Nibiru: nibiru1...',
    '• Ethereum: 0x...',
].join('\n');
