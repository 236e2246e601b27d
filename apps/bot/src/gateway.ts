// SAI indexer GraphQL client - trades and oracle prices
import axios from 'axios';
import type { AxiosRequestConfig } from 'axios';
import pino from 'pino';
import {
    DataUnavailableError,
    GraphqlEnvelopeSchema,
    PricesResponseSchema,
    TradesResponseSchema,
    toPriceRecord,
    toTradeRecord,
} from '@sai-bot/core';
import type { PriceRecord, TradeRecord, TradeStatusFilter, WalletAddress } from '@sai-bot/core';
import type { DataGateway } from './ports/index.js';
import { retryTransient } from './retry.js';

const logger = pino({ name: 'sai-graphql', level: process.env.LOG_LEVEL || 'info' });

const TRADES_QUERY = `
query Trades($trader: String!, $isOpen: Boolean, $limit: Int!) {
  perp {
    trades(
      where: { trader: $trader, isOpen: $isOpen }
      limit: $limit
      order_by: sequence
      order_desc: true
    ) {
      id
      trader
      isOpen
      isLong
      leverage
      openPrice
      closePrice
      openCollateralAmount
      collateralAmount
      openBlock { block block_ts }
      closeBlock { block block_ts }
      state {
        positionValue
        liquidationPrice
        pnlCollateral
        pnlPct
      }
      perpBorrowing {
        marketId
        baseToken { id name symbol }
        quoteToken { id name symbol }
      }
    }
  }
}`;

const PRICES_QUERY = `
query Prices($limit: Int!) {
  oracle {
    tokenPricesUsd(limit: $limit, order_by: token_id) {
      priceUsd
      token { id name symbol }
      lastUpdatedBlock { block block_ts }
    }
  }
}`;

/**
 * The slice of axios the gateway uses
 */
export interface HttpClient {
    post(url: string, data: unknown, config: AxiosRequestConfig): Promise<{ data: unknown }>;
}

export interface GraphqlGatewayOptions {
    endpoint: string;
    timeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    tradesFetchLimit: number;
    pricesFetchLimit: number;
}

export class GraphqlGateway implements DataGateway {
    constructor(
        private readonly options: GraphqlGatewayOptions,
        private readonly http: HttpClient = axios
    ) { }

    async fetchTrades(
        address: WalletAddress,
        status: TradeStatusFilter,
        limit: number = this.options.tradesFetchLimit
    ): Promise<TradeRecord[]> {
        const variables = {
            trader: address.value,
            isOpen: status === 'any' ? null : status === 'open',
            limit,
        };

        logger.debug({ trader: address.value, status, limit }, 'Fetching trades');
        const data = await this.request('trades', TRADES_QUERY, variables);

        const parsed = TradesResponseSchema.safeParse(data);
        if (!parsed.success) {
            logger.error({ issues: parsed.error.issues.slice(0, 5) }, 'Malformed trades response');
            throw new DataUnavailableError('Malformed trades response', { cause: parsed.error });
        }

        const trades = parsed.data.perp.trades.map(toTradeRecord);
        logger.info({ trader: address.value, status, tradeCount: trades.length }, 'Fetched trades');
        return trades;
    }

    async fetchPrices(limit: number = this.options.pricesFetchLimit): Promise<PriceRecord[]> {
        logger.debug({ limit }, 'Fetching oracle prices');
        const data = await this.request('prices', PRICES_QUERY, { limit });

        const parsed = PricesResponseSchema.safeParse(data);
        if (!parsed.success) {
            logger.error({ issues: parsed.error.issues.slice(0, 5) }, 'Malformed prices response');
            throw new DataUnavailableError('Malformed prices response', { cause: parsed.error });
        }

        const prices = parsed.data.oracle.tokenPricesUsd.flatMap((raw) => {
            const record = toPriceRecord(raw);
            return record ? [record] : [];
        });
        logger.info({ priceCount: prices.length }, 'Fetched oracle prices');
        return prices;
    }

    /**
     * POST a query and return the `data` field of the GraphQL envelope
     */
    private async request(label: string, query: string, variables: Record<string, unknown>): Promise<unknown> {
        const { endpoint, timeoutMs, maxRetries, retryBaseDelayMs } = this.options;

        let body: unknown;
        try {
            const response = await retryTransient(
                `graphql:${label}`,
                { maxRetries, baseDelayMs: retryBaseDelayMs },
                () => this.http.post(endpoint, { query, variables }, {
                    timeout: timeoutMs,
                    headers: { 'Content-Type': 'application/json' },
                })
            );
            body = response.data;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error({
                label,
                endpoint,
                status: axios.isAxiosError(error) ? error.response?.status : undefined,
                message,
            }, 'GraphQL request failed');
            throw new DataUnavailableError(`Request to ${endpoint} failed: ${message}`, { cause: error });
        }

        // axios leaves the body as a string when it is not JSON
        const envelope = GraphqlEnvelopeSchema.safeParse(body);
        if (!envelope.success) {
            const preview = typeof body === 'string' ? body.slice(0, 200) : typeof body;
            logger.error({ label, endpoint, preview }, 'Invalid JSON response');
            throw new DataUnavailableError(`Invalid JSON response from ${endpoint}: ${preview}`);
        }

        const { data, errors } = envelope.data;
        if (errors && errors.length > 0) {
            const messages = errors.map((e) => e.message);
            logger.error({ label, errors: messages }, 'GraphQL errors');
            throw new DataUnavailableError(`GraphQL errors: ${messages.join('; ')}`);
        }

        return data;
    }
}
