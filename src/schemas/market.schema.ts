import { z } from "zod";

const sideEnum = z.enum(["HIGHER", "LOWER"]);

export const identitySchema = z
  .string()
  .trim()
  .min(1)
  .transform((s) => s.toLowerCase());

/** Base-unit amount on the wire: a non-negative integer string (or safe integer). */
export const amountSchema = z
  .union([z.string().regex(/^\d+$/, "amount must be a non-negative integer string"), z.number().int().nonnegative().safe()])
  .transform((v) => BigInt(v));

/** Outcome price with at most 2 decimals, e.g. "14.50". */
export const outcomePriceSchema = z
  .union([z.string().regex(/^\d+(\.\d{1,2})?$/, "outcome must be a price with at most 2 decimals"), z.number().nonnegative()])
  .transform((v) => String(v));

const bpsSchema = z.number().int().min(0).max(10_000);

export const marketConfigSchema = z
  .object({
    minStake: z.bigint().positive(),
    maxStake: z.bigint().nonnegative(),
    settlementInterval: z.number().int().positive(),
    bettingCutoff: z.number().int().nonnegative(),
    feeBps: bpsSchema,
    owner: identitySchema,
    keeper: identitySchema,
    outcomeSource: z.string().trim().min(1),
    treasury: identitySchema,
    paused: z.boolean(),
    outcomeMin: z.bigint().nonnegative(),
    outcomeMax: z.bigint().positive(),
    safeMode: z.boolean(),
    safeModeMaxMoveBps: bpsSchema,
    claimWindow: z.number().int().nonnegative(),
  })
  .superRefine((c, ctx) => {
    if (c.maxStake !== 0n && c.minStake > c.maxStake) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["maxStake"], message: "minStake must not exceed maxStake" });
    }
    if (c.bettingCutoff > c.settlementInterval) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["bettingCutoff"],
        message: "bettingCutoff must not exceed settlementInterval",
      });
    }
    if (c.outcomeMin > c.outcomeMax) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["outcomeMin"], message: "outcomeMin must not exceed outcomeMax" });
    }
  });

export const stakeBodySchema = z.object({
  side: sideEnum,
  amount: amountSchema,
});

export const settleBodySchema = z.object({
  outcome: outcomePriceSchema,
});

export const roundParamsSchema = z.object({
  round: z.coerce.number().int().min(1),
});

export const claimableParamsSchema = roundParamsSchema.extend({
  participant: identitySchema,
});

export const identityBodySchema = z.object({
  address: identitySchema,
});

export const outcomeSourceBodySchema = z.object({
  outcomeSource: z.string().trim().min(1),
});

export const amountBodySchema = z.object({
  amount: amountSchema,
});

export const feeBodySchema = z.object({
  feeBps: bpsSchema,
});

export const safeModeBodySchema = z.object({
  enabled: z.boolean(),
  maxMoveBps: bpsSchema.optional(),
});

export const claimWindowBodySchema = z.object({
  seconds: z.number().int().nonnegative(),
});

export const rescueBodySchema = z.object({
  recipient: identitySchema,
  amount: amountSchema,
});

export const eventsQuerySchema = z.object({
  type: z
    .enum(["BET_PLACED", "ROUND_SETTLED", "WINNINGS_CLAIMED", "MARKET_CONFIG_UPDATED", "FUNDS_RESCUED"])
    .optional(),
  round: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional().default(100),
});

export type MarketConfigInput = z.input<typeof marketConfigSchema>;
