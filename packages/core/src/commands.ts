// Command parser - turns chat command text into a typed Command
// Unknown command names fall back to help

import { classifyAddress } from './address.js';
import { CommandError, ErrorCodes } from './errors.js';
import type { Command, PriceCommand, PricesCommand, TradeStatus, TradeStatusFilter, TradesCommand } from './types.js';

export const COMMAND_USAGE = {
    trades: '/trades <wallet_address> [open|closed] [symbol]',
    prices: '/prices [next]',
    price: '/price <symbol>',
} as const;

export const COMMAND_DESCRIPTIONS = [
    { command: 'trades', description: 'View trades for a wallet' },
    { command: 'prices', description: 'Show oracle prices, 10 at a time' },
    { command: 'price', description: 'Get the price of one token' },
    { command: 'help', description: 'Show all commands' },
] as const;

function isStatusKeyword(token: string): token is TradeStatus {
    return token === 'open' || token === 'closed';
}

export interface ParseContext {
    /** Page of the price listing the user is currently on */
    pricesPage?: number;
}

export interface TokenizedCommand {
    name: string;
    args: string[];
    /** Bot named after the command ("/trades@SaiBot"), or null */
    mention: string | null;
}

/**
 * Split "/trades@SaiBot nibiru1... open" into a lower-cased name, the mentioned bot and the arguments.
 * Returns null for text that is not a command.
 */
export function tokenizeCommand(text: string): TokenizedCommand | null {
    const [head, ...args] = text.trim().split(/\s+/);
    if (!head || !head.startsWith('/') || head.length < 2) return null;

    const [rawName, ...mentionParts] = head.slice(1).split('@');
    const mention = mentionParts.join('@');
    return {
        name: rawName.toLowerCase(),
        args: args.filter((arg) => arg.length > 0),
        mention: mention || null,
    };
}

/**
 * In group chats "/cmd@OtherBot" belongs to another bot. Bot usernames are case-insensitive.
 */
export function isAddressedTo(command: TokenizedCommand, botUsername: string): boolean {
    return command.mention === null || command.mention.toLowerCase() === botUsername.toLowerCase();
}

/**
 * Parse a command name and its argument tokens. Throws CommandError on bad arguments.
 */
export function parseCommand(name: string, args: readonly string[], context: ParseContext = {}): Command {
    switch (name.toLowerCase()) {
        case 'trades':
            return withUsage(COMMAND_USAGE.trades, () => parseTrades(args));
        case 'prices':
            return withUsage(COMMAND_USAGE.prices, () => parsePrices(args, context));
        case 'price':
            return withUsage(COMMAND_USAGE.price, () => parsePrice(args));
        default:
            // start, help and anything unrecognized
            return { kind: 'help' };
    }
}

function withUsage<T>(usage: string, parse: () => T): T {
    try {
        return parse();
    } catch (error) {
        if (error instanceof CommandError && error.usage === null) {
            throw error.withUsage(usage);
        }
        throw error;
    }
}

function parseTrades(args: readonly string[]): TradesCommand {
    if (args.length === 0) {
        throw new CommandError(ErrorCodes.ARGUMENT_COUNT_MISMATCH, 'Missing wallet address');
    }
    if (args.length > 3) {
        throw new CommandError(ErrorCodes.TOO_MANY_ARGUMENTS, `Expected at most 3 arguments, got ${args.length}`);
    }

    const [rawAddress, ...filters] = args;
    const address = classifyAddress(rawAddress);

    let status: TradeStatusFilter = 'any';
    let symbol: string | null = null;

    for (const token of filters) {
        // "open" and "closed" are reserved for status, never treated as a symbol
        const keyword = token.toLowerCase();
        if (isStatusKeyword(keyword)) {
            if (status !== 'any' && status !== keyword) {
                throw new CommandError(ErrorCodes.CONFLICTING_FILTER, `Both ${status} and ${keyword} requested`);
            }
            status = keyword;
            continue;
        }

        if (symbol !== null) {
            throw new CommandError(ErrorCodes.TOO_MANY_ARGUMENTS, `More than one symbol: ${symbol}, ${token}`);
        }
        symbol = token.toUpperCase();
    }

    return { kind: 'trades', address, status, symbol };
}

function parsePrices(args: readonly string[], context: ParseContext): PricesCommand {
    if (args.length === 0) {
        return { kind: 'prices', page: 0 };
    }
    if (args.length > 1) {
        throw new CommandError(ErrorCodes.TOO_MANY_ARGUMENTS, `Expected at most 1 argument, got ${args.length}`);
    }
    if (args[0].toLowerCase() !== 'next') {
        throw new CommandError(ErrorCodes.UNKNOWN_ARGUMENT, `Unknown argument: ${args[0]}`);
    }

    return { kind: 'prices', page: (context.pricesPage ?? 0) + 1 };
}

function parsePrice(args: readonly string[]): PriceCommand {
    if (args.length !== 1) {
        throw new CommandError(ErrorCodes.ARGUMENT_COUNT_MISMATCH, `Expected 1 argument, got ${args.length}`);
    }
    return { kind: 'price', symbol: args[0].toUpperCase() };
}
