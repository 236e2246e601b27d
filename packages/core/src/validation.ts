// Validation schemas using zod
// Used by the GraphQL gateway to validate indexer responses before mapping

import { z } from 'zod';

// Indexer returns big numbers as strings and small ones as numbers
const NumericSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
    const parsed = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a number: ${value}` });
        return z.NEVER;
    }
    return parsed;
});

const IdSchema = z.union([z.string(), z.number()]).transform(String);

export const TokenSchema = z.object({
    id: IdSchema.nullish(),
    name: z.string().nullish(),
    symbol: z.string().nullish(),
});

export const BlockSchema = z.object({
    block: NumericSchema.nullish(),
    block_ts: z.union([z.string(), z.number()]).nullish(),
});

export const TradeStateSchema = z.object({
    positionValue: NumericSchema.nullish(),
    liquidationPrice: NumericSchema.nullish(),
    pnlCollateral: NumericSchema.nullish(),
    pnlPct: NumericSchema.nullish(),
});

export const RawTradeSchema = z.object({
    id: IdSchema,
    trader: z.string().nullish(),
    isOpen: z.boolean(),
    isLong: z.boolean().nullish(),
    leverage: NumericSchema.nullish(),
    openPrice: NumericSchema.nullish(),
    closePrice: NumericSchema.nullish(),
    openCollateralAmount: NumericSchema.nullish(),
    collateralAmount: NumericSchema.nullish(),
    openBlock: BlockSchema.nullish(),
    closeBlock: BlockSchema.nullish(),
    state: TradeStateSchema.nullish(),
    perpBorrowing: z.object({
        marketId: IdSchema.nullish(),
        baseToken: TokenSchema.nullish(),
        quoteToken: TokenSchema.nullish(),
    }).nullish(),
});

export const RawPriceSchema = z.object({
    priceUsd: NumericSchema.nullish(),
    token: TokenSchema.nullish(),
    lastUpdatedBlock: BlockSchema.nullish(),
});

export const TradesResponseSchema = z.object({
    perp: z.object({
        trades: z.array(RawTradeSchema),
    }),
});

export const PricesResponseSchema = z.object({
    oracle: z.object({
        tokenPricesUsd: z.array(RawPriceSchema),
    }),
});

// GraphQL envelope: data may be null when errors is set
export const GraphqlEnvelopeSchema = z.object({
    data: z.unknown().optional(),
    errors: z.array(z.object({ message: z.string() }).passthrough()).optional(),
});

export type RawToken = z.infer<typeof TokenSchema>;
export type RawBlock = z.infer<typeof BlockSchema>;
export type RawTrade = z.infer<typeof RawTradeSchema>;
export type RawPrice = z.infer<typeof RawPriceSchema>;
