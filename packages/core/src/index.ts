// Core package - command parsing, pagination and formatting for the SAI bot
// No I/O here: the bot app owns the gateway and the chat platform

export * from './types.js';
export * from './errors.js';
export * from './address.js';
export * from './commands.js';
export * from './pagination.js';
export * from './continuation.js';
export * from './prices.js';
export * from './trades.js';
export * from './format.js';
export * from './validation.js';
export * from './mapping.js';
