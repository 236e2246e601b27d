// Bot entry point - long-polling Telegram bot backed by the SAI indexer
import 'dotenv/config';
import pino from 'pino';
import type { Bot } from 'grammy';
import { COMMAND_DESCRIPTIONS } from '@sai-bot/core';
import { getConfig, logConfig } from './config.js';
import { CommandDispatcher } from './dispatcher.js';
import { GraphqlGateway } from './gateway.js';
import { createBot } from './telegram.js';

const logger = pino({
    name: 'bot',
    level: process.env.LOG_LEVEL || 'info',
    transport: {
        target: 'pino-pretty',
        options: {
            colorize: true,
        },
    },
});

let bot: Bot | null = null;

async function main(): Promise<void> {
    const config = getConfig();
    logConfig(logger);

    const gateway = new GraphqlGateway({
        endpoint: config.graphqlEndpoint,
        timeoutMs: config.requestTimeoutMs,
        maxRetries: config.maxRetries,
        retryBaseDelayMs: config.retryBaseDelayMs,
        tradesFetchLimit: config.tradesFetchLimit,
        pricesFetchLimit: config.pricesFetchLimit,
    });
    const dispatcher = new CommandDispatcher(gateway);
    const instance = createBot(config.telegramBotToken, dispatcher);
    bot = instance;

    // Command menu is cosmetic, keep going without it
    await instance.api.setMyCommands(COMMAND_DESCRIPTIONS.map((c) => ({ ...c }))).catch((error: unknown) => {
        logger.warn({ error: error instanceof Error ? error.message : error }, 'setMyCommands failed');
    });

    logger.info('Starting bot...');
    await instance.start({
        drop_pending_updates: true,
        onStart: (info) => logger.info({ username: info.username }, 'Bot polling started'),
    });

    logger.info('Bot stopped');
}

/**
 * Graceful shutdown handler
 */
async function shutdown(signal: string): Promise<void> {
    logger.info({ signal }, 'Received shutdown signal');

    if (bot) {
        try {
            await bot.stop();
        } catch (error) {
            logger.error({ error }, 'Error stopping bot');
        }
    }
    process.exit(0);
}

// Graceful shutdown handlers
process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

// Unhandled rejection handler
process.on('unhandledRejection', (reason) => {
    const serialized = reason instanceof Error
        ? { message: reason.message, stack: reason.stack, name: reason.name }
        : reason;
    logger.error({ reason: serialized }, 'Unhandled promise rejection');
});

// Uncaught exception handler
process.on('uncaughtException', (error) => {
    logger.fatal({ error: { message: error.message, stack: error.stack, name: error.name } }, 'Uncaught exception - shutting down');
    process.exit(1);
});

main().catch((error) => {
    const serialized = error instanceof Error
        ? { message: error.message, stack: error.stack, name: error.name }
        : error;
    logger.fatal({ error: serialized }, 'Bot crashed');
    process.exit(1);
});
