/**
 * Bot configuration - centralized env var loading
 */

/**
 * Configuration object loaded from environment variables
 */
export interface BotConfig {
    // Telegram
    telegramBotToken: string;

    // GraphQL backend
    graphqlEndpoint: string;
    requestTimeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;

    // Fetch sizes
    tradesFetchLimit: number;
    pricesFetchLimit: number;
}

const DEFAULT_GRAPHQL_ENDPOINT = 'https://sai-keeper.testnet-2.nibiru.fi/query';

function parseNonNegativeInt(name: string, fallback: number, env: NodeJS.ProcessEnv): number {
    const raw = env[name];
    if (raw === undefined || raw === '') return fallback;

    const value = parseInt(raw, 10);
    if (!Number.isInteger(value) || value < 0 || String(value) !== raw.trim()) {
        throw new Error(`Invalid ${name}: ${raw}. Must be a non-negative integer`);
    }
    return value;
}

/**
 * Parse and validate configuration from environment variables
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
    const telegramBotToken = env.TELEGRAM_BOT_TOKEN;
    if (!telegramBotToken) {
        throw new Error('TELEGRAM_BOT_TOKEN not set');
    }

    const graphqlEndpoint = env.SAI_GRAPHQL_ENDPOINT || DEFAULT_GRAPHQL_ENDPOINT;
    if (!/^https?:\/\//.test(graphqlEndpoint)) {
        throw new Error(`Invalid SAI_GRAPHQL_ENDPOINT: ${graphqlEndpoint}. Must be an http(s) URL`);
    }

    return {
        telegramBotToken,

        graphqlEndpoint,
        requestTimeoutMs: parseNonNegativeInt('GRAPHQL_TIMEOUT_MS', 20000, env),
        maxRetries: parseNonNegativeInt('GRAPHQL_MAX_RETRIES', 2, env),
        retryBaseDelayMs: parseNonNegativeInt('GRAPHQL_RETRY_BASE_DELAY_MS', 500, env),

        tradesFetchLimit: parseNonNegativeInt('TRADES_FETCH_LIMIT', 100, env),
        pricesFetchLimit: parseNonNegativeInt('PRICES_FETCH_LIMIT', 200, env),
    };
}

// Singleton config instance
let configInstance: BotConfig | null = null;

/**
 * Get the bot configuration (parsed once and cached)
 */
export function getConfig(): BotConfig {
    if (!configInstance) {
        configInstance = parseConfig();
    }
    return configInstance;
}

/**
 * Log configuration on startup (token masked)
 */
export function logConfig(logger: { info: (obj: object, msg: string) => void }): void {
    const config = getConfig();

    const maskToken = (token: string): string =>
        token.length <= 8 ? '***' : `${token.slice(0, 4)}***${token.slice(-4)}`;

    logger.info({
        telegramBotToken: maskToken(config.telegramBotToken),
        graphqlEndpoint: config.graphqlEndpoint,
        requestTimeoutMs: config.requestTimeoutMs,
        maxRetries: config.maxRetries,
        retryBaseDelayMs: config.retryBaseDelayMs,
        tradesFetchLimit: config.tradesFetchLimit,
        pricesFetchLimit: config.pricesFetchLimit,
    }, 'Bot configuration loaded');
}
