/**
 * Tests for GraphqlGateway
 *
 * The HTTP client is replaced by a mock so no request leaves the process.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosResponse } from 'axios';
import { DataUnavailableError } from '@sai-bot/core';
import type { WalletAddress } from '@sai-bot/core';
import { GraphqlGateway } from './gateway.js';
import type { HttpClient } from './gateway.js';

const ENDPOINT = 'https://indexer.test/query';
const ADDRESS: WalletAddress = { kind: 'evm', value: '0xa1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1a1' };

function response(data: unknown, status = 200): AxiosResponse<unknown> {
    return { data, status, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

function httpError(status?: number): AxiosError {
    const error = new AxiosError(status ? `Request failed with status code ${status}` : 'timeout exceeded', 'ERR');
    if (status) error.response = response({}, status);
    return error;
}

describe('GraphqlGateway', () => {
    const post = vi.fn<HttpClient['post']>();
    let gateway: GraphqlGateway;

    beforeEach(() => {
        post.mockReset();
        gateway = new GraphqlGateway({
            endpoint: ENDPOINT,
            timeoutMs: 1000,
            maxRetries: 2,
            retryBaseDelayMs: 0,
            tradesFetchLimit: 100,
            pricesFetchLimit: 200,
        }, { post });
    });

    describe('fetchTrades()', () => {
        it('sends trader, status and limit and maps the rows', async () => {
            post.mockResolvedValueOnce(response({
                data: {
                    perp: {
                        trades: [{
                            id: 1,
                            isOpen: false,
                            isLong: true,
                            openPrice: 10,
                            closePrice: 12,
                            openCollateralAmount: '5000000',
                            perpBorrowing: { marketId: 3, baseToken: { symbol: 'ETH' }, quoteToken: { symbol: 'USD' } },
                        }],
                    },
                },
            }));

            const trades = await gateway.fetchTrades(ADDRESS, 'closed');

            expect(post).toHaveBeenCalledTimes(1);
            const [url, body, config] = post.mock.calls[0];
            expect(url).toBe(ENDPOINT);
            expect(body).toMatchObject({ variables: { trader: ADDRESS.value, isOpen: false, limit: 100 } });
            expect(config).toMatchObject({ timeout: 1000 });
            expect(trades).toEqual([{
                id: '1',
                status: 'closed',
                isLong: true,
                leverage: null,
                market: { base: 'ETH', quote: 'USD', marketId: '3' },
                symbol: 'ETH',
                entryPrice: 10,
                collateral: 5,
                openedAt: null,
                exitPrice: 12,
                closedAt: null,
            }]);
        });

        it('sends a null status filter for any', async () => {
            post.mockResolvedValueOnce(response({ data: { perp: { trades: [] } } }));

            expect(await gateway.fetchTrades(ADDRESS, 'any', 5)).toEqual([]);
            expect(post.mock.calls[0][1]).toMatchObject({ variables: { isOpen: null, limit: 5 } });
        });

        it('throws DataUnavailableError on GraphQL errors', async () => {
            post.mockResolvedValueOnce(response({ data: null, errors: [{ message: 'bad trader' }] }));

            await expect(gateway.fetchTrades(ADDRESS, 'open')).rejects.toThrow('GraphQL errors: bad trader');
        });

        it('throws DataUnavailableError on a malformed body', async () => {
            post.mockResolvedValueOnce(response({ data: { perp: { trades: [{ id: 1 }] } } }));

            await expect(gateway.fetchTrades(ADDRESS, 'open')).rejects.toThrow(DataUnavailableError);
        });
    });

    describe('fetchPrices()', () => {
        it('drops rows without a price', async () => {
            post.mockResolvedValueOnce(response({
                data: {
                    oracle: {
                        tokenPricesUsd: [
                            { priceUsd: 50000, token: { id: 1, symbol: 'BTC' } },
                            { priceUsd: null, token: { id: 2, symbol: 'DEAD' } },
                        ],
                    },
                },
            }));

            const prices = await gateway.fetchPrices();

            expect(prices).toEqual([{ tokenId: '1', symbol: 'BTC', value: 50000, updatedAt: null }]);
            expect(post.mock.calls[0][1]).toMatchObject({ variables: { limit: 200 } });
        });

        it('throws DataUnavailableError when the body is not JSON', async () => {
            post.mockResolvedValueOnce(response('<html>Bad gateway</html>'));

            await expect(gateway.fetchPrices()).rejects.toThrow(
                `Invalid JSON response from ${ENDPOINT}: <html>Bad gateway</html>`
            );
        });
    });

    describe('retries', () => {
        it('retries transient failures and succeeds', async () => {
            post
                .mockRejectedValueOnce(httpError())
                .mockRejectedValueOnce(httpError(503))
                .mockResolvedValueOnce(response({ data: { oracle: { tokenPricesUsd: [] } } }));

            expect(await gateway.fetchPrices()).toEqual([]);
            expect(post).toHaveBeenCalledTimes(3);
        });

        it('gives up after the configured retries', async () => {
            post.mockRejectedValue(httpError(502));

            await expect(gateway.fetchPrices()).rejects.toThrow(DataUnavailableError);
            expect(post).toHaveBeenCalledTimes(3);
        });

        it('does not retry client errors', async () => {
            post.mockRejectedValueOnce(httpError(400));

            await expect(gateway.fetchPrices()).rejects.toThrow(
                `Request to ${ENDPOINT} failed: Request failed with status code 400`
            );
            expect(post).toHaveBeenCalledTimes(1);
        });
    });
});
