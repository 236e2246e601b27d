/**
 * DataGateway interface - read-only access to the trading data backend
 *
 * The dispatcher only talks to this port, so tests can swap in an
 * in-memory gateway and the GraphQL transport stays replaceable.
 */

import type { PriceRecord, TradeRecord, TradeStatusFilter, WalletAddress } from '@sai-bot/core';

export interface DataGateway {
    /**
     * Trades for a wallet, newest first.
     * An empty array means the wallet has no matching trades.
     * Throws DataUnavailableError when the backend cannot answer.
     */
    fetchTrades(address: WalletAddress, status: TradeStatusFilter, limit?: number): Promise<TradeRecord[]>;

    /**
     * Full oracle price list in backend order (by token id).
     * Throws DataUnavailableError when the backend cannot answer.
     */
    fetchPrices(limit?: number): Promise<PriceRecord[]>;
}
