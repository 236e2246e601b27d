// Error codes - one fixed user-facing message per code
// Parse errors carry the usage line of the command that failed

export const ErrorCodes = {
    INVALID_ADDRESS: 'INVALID_ADDRESS',

    // Argument parsing
    CONFLICTING_FILTER: 'CONFLICTING_FILTER',
    TOO_MANY_ARGUMENTS: 'TOO_MANY_ARGUMENTS',
    UNKNOWN_ARGUMENT: 'UNKNOWN_ARGUMENT',
    ARGUMENT_COUNT_MISMATCH: 'ARGUMENT_COUNT_MISMATCH',

    // Backend
    DATA_UNAVAILABLE: 'DATA_UNAVAILABLE',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export type CommandErrorCode = Exclude<ErrorCode, 'DATA_UNAVAILABLE'>;

/**
 * Raised by the address classifier and the command parser
 */
export class CommandError extends Error {
    constructor(
        public readonly code: CommandErrorCode,
        message: string,
        public readonly usage: string | null = null
    ) {
        super(message);
        this.name = 'CommandError';
    }

    withUsage(usage: string): CommandError {
        return new CommandError(this.code, this.message, usage);
    }
}

/**
 * Raised by the data gateway when the backend cannot answer
 * (transport failure, GraphQL errors, malformed body)
 */
export class DataUnavailableError extends Error {
    readonly code = ErrorCodes.DATA_UNAVAILABLE;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DataUnavailableError';
    }
}

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
    INVALID_ADDRESS: '❌ Invalid wallet address. Use a Nibiru (nibiru1...) or Ethereum (0x...) address.',
    CONFLICTING_FILTER: '❌ Conflicting filters: use either "open" or "closed", not both.',
    TOO_MANY_ARGUMENTS: '❌ Too many arguments.',
    UNKNOWN_ARGUMENT: '❌ Unknown argument.',
    ARGUMENT_COUNT_MISMATCH: '❌ Wrong number of arguments.',
    DATA_UNAVAILABLE: '⚠️ Trading data is temporarily unavailable. Please try again later.',
};

/**
 * Render the user-facing message for an error code, with the usage line when known
 */
export function describeError(code: ErrorCode, usage: string | null = null): string {
    const message = ERROR_MESSAGES[code];
    return usage ? `${message}\n\nUsage: ${usage}` : message;
}
