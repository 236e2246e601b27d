// Wallet address classification for Nibiru (bech32) and EVM (hex) addresses

import { CommandError, ErrorCodes } from './errors.js';
import type { WalletAddress } from './types.js';

const COSMOS_PREFIX = 'nibiru1';

// bech32 data charset, 20-byte accounts up to the 90 char bech32 limit
const COSMOS_ADDRESS = /^nibiru1[qpzry9x8gf2tvdw0s3jn54khce6mua7l]{38,83}$/;
const EVM_ADDRESS = /^0x[0-9a-fA-F]{40}$/;

/**
 * Classify a raw address string. Throws INVALID_ADDRESS when neither format matches.
 */
export function classifyAddress(raw: string): WalletAddress {
    const value = raw.trim();

    if (value.startsWith(COSMOS_PREFIX) && COSMOS_ADDRESS.test(value)) {
        return { kind: 'cosmos', value };
    }
    if (EVM_ADDRESS.test(value)) {
        return { kind: 'evm', value };
    }

    throw new CommandError(ErrorCodes.INVALID_ADDRESS, `Invalid wallet address: ${value}`);
}

/**
 * Non-throwing variant of classifyAddress
 */
export function tryClassifyAddress(raw: string): WalletAddress | null {
    try {
        return classifyAddress(raw);
    } catch (error) {
        if (error instanceof CommandError) return null;
        throw error;
    }
}

/**
 * Short display form: 0x123456...abcdef / nibiru1abc...uvwxyz
 */
export function shortenAddress(address: WalletAddress): string {
    const head = address.kind === 'evm' ? 8 : 10;
    return `${address.value.slice(0, head)}...${address.value.slice(-6)}`;
}
