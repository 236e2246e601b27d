// Telegram wiring - commands in, replies and "Next" buttons out
import { Bot, InlineKeyboard } from 'grammy';
import type { Context } from 'grammy';
import type { InlineKeyboardMarkup } from 'grammy/types';
import pino from 'pino';
import { decodeContinuation, encodeContinuation, fitsCallbackLimit } from '@sai-bot/core';
import type { ParseContext } from '@sai-bot/core';
import type { CommandDispatcher, Reply } from './dispatcher.js';

const logger = pino({ name: 'telegram', level: process.env.LOG_LEVEL || 'info' });

const COMMANDS = ['start', 'help', 'trades', 'prices', 'price'] as const;

export const NEXT_BUTTON_LABEL = 'Next →';

/**
 * "Next" button for a reply, or undefined when the listing is complete
 */
export function keyboardFor(reply: Reply): InlineKeyboard | undefined {
    if (!reply.next) return undefined;

    const payload = encodeContinuation(reply.next);
    if (!fitsCallbackLimit(payload)) {
        logger.warn({ payload, bytes: Buffer.byteLength(payload) }, 'Continuation too long for a button, dropping it');
        return undefined;
    }
    return new InlineKeyboard().text(NEXT_BUTTON_LABEL, payload);
}

async function sendReplies(ctx: Context, replies: readonly Reply[]): Promise<void> {
    for (const reply of replies) {
        await ctx.reply(reply.text, { reply_markup: keyboardFor(reply) });
    }
}

/**
 * A typed "/prices next" sent as a reply to a price listing continues that listing.
 * The listing's own Next button says which page comes after it.
 */
export function parseContextFrom(repliedTo: { reply_markup?: InlineKeyboardMarkup } | undefined): ParseContext {
    for (const row of repliedTo?.reply_markup?.inline_keyboard ?? []) {
        for (const button of row) {
            if (!('callback_data' in button)) continue;
            const continuation = decodeContinuation(button.callback_data);
            if (continuation?.kind === 'prices') {
                return { pricesPage: continuation.page - 1 };
            }
        }
    }
    return {};
}

export function splitArgs(match: string): string[] {
    return match.split(/\s+/).filter((arg) => arg.length > 0);
}

export function createBot(token: string, dispatcher: CommandDispatcher): Bot {
    const bot = new Bot(token);

    for (const name of COMMANDS) {
        bot.command(name, async (ctx) => {
            const context = parseContextFrom(ctx.message?.reply_to_message);
            const replies = await dispatcher.handleCommand(name, splitArgs(ctx.match), context);
            await sendReplies(ctx, replies);
        });
    }

    // Unrecognized slash commands get the help text, other bots' commands are left alone
    bot.on('message:text', async (ctx) => {
        if (!ctx.message.text.startsWith('/')) return;
        const replies = await dispatcher.handleText(ctx.message.text, ctx.me.username);
        await sendReplies(ctx, replies);
    });

    // A pressed "Next" button replaces the listing it belongs to
    bot.on('callback_query:data', async (ctx) => {
        await ctx.answerCallbackQuery();

        const [first, ...rest] = await dispatcher.handleContinuation(ctx.callbackQuery.data);
        if (first) {
            await ctx.editMessageText(first.text, { reply_markup: keyboardFor(first) });
        }
        await sendReplies(ctx, rest);
    });

    bot.catch((err) => {
        const error = err.error;
        logger.error({
            updateId: err.ctx.update.update_id,
            error: error instanceof Error ? { message: error.message, name: error.name } : error,
        }, 'Telegram update failed');
    });

    return bot;
}
