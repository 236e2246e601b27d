// Continuation tokens for "Next" buttons
// The page to show travels in the button payload, nothing is kept server-side
//
// Format:
//   p:<page>
//   t:<o|c>:<a|f>:<page>:<address>[:<symbol>]
//
// a/f records whether the listing came from an unfiltered fetch or one
// filtered to its own status, so later pages re-fetch the same rows

import { tryClassifyAddress } from './address.js';
import type { TradeStatus, TradeStatusFilter, WalletAddress } from './types.js';

// Telegram rejects callback_data longer than this
export const MAX_CONTINUATION_BYTES = 64;

export interface PricesContinuation {
    kind: 'prices';
    page: number;
}

export interface TradesContinuation {
    kind: 'trades';
    address: WalletAddress;
    status: TradeStatus;
    /** Status filter the rows were fetched with */
    fetched: TradeStatusFilter;
    symbol: string | null;
    page: number;
}

export type Continuation = PricesContinuation | TradesContinuation;

const STATUS_CODES: Record<TradeStatus, string> = { open: 'o', closed: 'c' };

export function encodeContinuation(continuation: Continuation): string {
    switch (continuation.kind) {
        case 'prices':
            return `p:${continuation.page}`;
        case 'trades': {
            const parts = [
                't',
                STATUS_CODES[continuation.status],
                continuation.fetched === 'any' ? 'a' : 'f',
                String(continuation.page),
                continuation.address.value,
            ];
            if (continuation.symbol) parts.push(continuation.symbol);
            return parts.join(':');
        }
    }
}

/**
 * Decode a button payload. Returns null for anything malformed or stale.
 */
export function decodeContinuation(payload: string): Continuation | null {
    const [tag, ...rest] = payload.split(':');

    if (tag === 'p' && rest.length === 1) {
        const page = parsePage(rest[0]);
        return page === null ? null : { kind: 'prices', page };
    }

    if (tag === 't' && rest.length >= 4) {
        const [statusCode, fetchCode, rawPage, rawAddress, ...symbolParts] = rest;
        const status = statusCode === 'o' ? 'open' : statusCode === 'c' ? 'closed' : null;
        const page = parsePage(rawPage);
        const address = tryClassifyAddress(rawAddress);
        if (status === null || page === null || address === null) return null;
        if (fetchCode !== 'a' && fetchCode !== 'f') return null;

        const symbol = symbolParts.join(':');
        return {
            kind: 'trades',
            address,
            status,
            fetched: fetchCode === 'a' ? 'any' : status,
            symbol: symbol || null,
            page,
        };
    }

    return null;
}

export function fitsCallbackLimit(payload: string): boolean {
    return Buffer.byteLength(payload, 'utf8') <= MAX_CONTINUATION_BYTES;
}

function parsePage(raw: string): number | null {
    if (!/^\d{1,6}$/.test(raw)) return null;
    return parseInt(raw, 10);
}
