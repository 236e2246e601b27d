// Command dispatcher - parse, fetch, filter, paginate, format
// Every error stops here and becomes a reply
import pino from 'pino';
import {
    CommandError,
    DataUnavailableError,
    ErrorCodes,
    HELP_TEXT,
    NO_PRICES_MESSAGE,
    PRICES_PAGE_SIZE,
    TRADES_PAGE_SIZE,
    decodeContinuation,
    describeError,
    filterTradesBySymbol,
    filterTradesByStatus,
    findPrice,
    formatNoTrades,
    formatPriceListing,
    formatPriceNotFound,
    formatSinglePrice,
    formatTradeListing,
    isAddressedTo,
    paginate,
    parseCommand,
    sortByPopularity,
    tokenizeCommand,
} from '@sai-bot/core';
import type {
    Command,
    Continuation,
    ParseContext,
    TradeRecord,
    TradeStatus,
    TradeStatusFilter,
    TradesCommand,
    TradesContinuation,
    WalletAddress,
} from '@sai-bot/core';
import type { DataGateway } from './ports/index.js';

const logger = pino({ name: 'dispatcher', level: process.env.LOG_LEVEL || 'info' });

export const EXPIRED_MESSAGE = 'This listing has expired. Please run the command again.';
export const UNEXPECTED_ERROR_MESSAGE = '❌ Something went wrong. Please try again later.';

/**
 * One outbound message, with the listing's next page when there is one
 */
export interface Reply {
    text: string;
    next: Continuation | null;
}

interface TradeListing {
    address: WalletAddress;
    status: TradeStatus;
    fetched: TradeStatusFilter;
    symbol: string | null;
}

function textReply(text: string): Reply {
    return { text, next: null };
}

export class CommandDispatcher {
    constructor(private readonly gateway: DataGateway) { }

    /**
     * Raw message text. Anything that is not a command gets the help text,
     * a command mentioning another bot gets no reply at all.
     */
    async handleText(text: string, botUsername?: string): Promise<Reply[]> {
        const tokenized = tokenizeCommand(text);
        if (!tokenized) return [textReply(HELP_TEXT)];
        if (botUsername !== undefined && !isAddressedTo(tokenized, botUsername)) {
            logger.debug({ command: tokenized.name, mention: tokenized.mention }, 'Ignoring command for another bot');
            return [];
        }
        return this.handleCommand(tokenized.name, tokenized.args);
    }

    async handleCommand(name: string, args: readonly string[], context: ParseContext = {}): Promise<Reply[]> {
        logger.debug({ command: name, argCount: args.length }, 'Handling command');
        return this.guard(name, () => this.execute(parseCommand(name, args, context)));
    }

    /**
     * Payload of a pressed "Next" button
     */
    async handleContinuation(payload: string): Promise<Reply[]> {
        const continuation = decodeContinuation(payload);
        if (!continuation) {
            logger.warn({ payload }, 'Unreadable continuation payload');
            return [textReply(EXPIRED_MESSAGE)];
        }

        return this.guard(`${continuation.kind}:next`, () =>
            continuation.kind === 'prices'
                ? this.prices(continuation.page)
                : this.tradesPage(continuation)
        );
    }

    async execute(command: Command): Promise<Reply[]> {
        switch (command.kind) {
            case 'help':
                return [textReply(HELP_TEXT)];
            case 'trades':
                return this.trades(command);
            case 'prices':
                return this.prices(command.page);
            case 'price':
                return this.price(command.symbol);
        }
    }

    private async guard(label: string, run: () => Promise<Reply[]>): Promise<Reply[]> {
        try {
            return await run();
        } catch (error) {
            if (error instanceof CommandError) {
                logger.info({ label, code: error.code, reason: error.message }, 'Rejected command');
                return [textReply(describeError(error.code, error.usage))];
            }
            if (error instanceof DataUnavailableError) {
                logger.warn({ label, error: error.message }, 'Backend unavailable');
                return [textReply(describeError(ErrorCodes.DATA_UNAVAILABLE))];
            }

            const serialized = error instanceof Error
                ? { message: error.message, stack: error.stack, name: error.name }
                : error;
            logger.error({ label, error: serialized }, 'Command failed');
            return [textReply(UNEXPECTED_ERROR_MESSAGE)];
        }
    }

    private async trades(command: TradesCommand): Promise<Reply[]> {
        const records = await this.gateway.fetchTrades(command.address, command.status);
        const matching = filterTradesBySymbol(records, command.symbol);

        // Open trades first, then closed, each listing paged on its own
        const statuses: TradeStatus[] = command.status === 'any' ? ['open', 'closed'] : [command.status];
        const replies = statuses.flatMap((status) => {
            const reply = this.tradeListing(
                { address: command.address, status, fetched: command.status, symbol: command.symbol },
                matching,
                0
            );
            return reply ? [reply] : [];
        });

        if (replies.length === 0) {
            return [textReply(formatNoTrades(command.address, command.status, command.symbol))];
        }
        return replies;
    }

    /**
     * Later pages re-run the fetch the first page came from, so totals and page bounds line up
     */
    private async tradesPage(continuation: TradesContinuation): Promise<Reply[]> {
        const { page, ...listing } = continuation;
        const records = await this.gateway.fetchTrades(listing.address, listing.fetched);
        const matching = filterTradesBySymbol(records, listing.symbol);

        const reply = this.tradeListing(listing, matching, page);
        return [reply ?? textReply(formatNoTrades(listing.address, listing.status, listing.symbol))];
    }

    private tradeListing(listing: TradeListing, trades: readonly TradeRecord[], pageNumber: number): Reply | null {
        const page = paginate(filterTradesByStatus(trades, listing.status), pageNumber, TRADES_PAGE_SIZE);
        if (page.visible.length === 0) return null;

        return {
            text: formatTradeListing(listing.address, listing.status, page),
            next: page.hasMore
                ? {
                    kind: 'trades',
                    address: listing.address,
                    status: listing.status,
                    fetched: listing.fetched,
                    symbol: listing.symbol,
                    page: pageNumber + 1,
                }
                : null,
        };
    }

    private async prices(pageNumber: number): Promise<Reply[]> {
        const prices = await this.gateway.fetchPrices();
        const page = paginate(sortByPopularity(prices), pageNumber, PRICES_PAGE_SIZE);
        if (page.visible.length === 0) return [textReply(NO_PRICES_MESSAGE)];

        return [{
            text: formatPriceListing(page),
            next: page.hasMore ? { kind: 'prices', page: pageNumber + 1 } : null,
        }];
    }

    private async price(symbol: string): Promise<Reply[]> {
        const prices = await this.gateway.fetchPrices();
        const match = findPrice(prices, symbol);
        return [textReply(match ? formatSinglePrice(match) : formatPriceNotFound(symbol))];
    }
}
