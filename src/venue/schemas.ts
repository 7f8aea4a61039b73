/**
 * Zod schemas for raw venue payloads. Numbers may arrive as strings or JSON
 * numbers; both become Decimal.
 */

import { z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";

export const decimalSchema = z
	.union([z.string().trim().min(1), z.number().finite()])
	.transform((value, ctx) => {
		const text = String(value);
		if (!/^-?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i.test(text)) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a decimal: ${text}` });
			return z.NEVER;
		}
		return Decimal.from(text);
	});

const levelSchema = z.object({
	price: decimalSchema,
	size: decimalSchema,
});

export const rawOrderBookSchema = z.object({
	bids: z.array(levelSchema).default([]),
	asks: z.array(levelSchema).default([]),
	timestamp: z.coerce.number().int().nonnegative().optional(),
});

export type RawOrderBook = z.infer<typeof rawOrderBookSchema>;

export const rawOrderAckSchema = z.object({
	success: z.boolean(),
	orderID: z.string().optional(),
	errorMsg: z.string().optional(),
	filledShares: decimalSchema.optional(),
	avgPrice: decimalSchema.optional(),
});

export type RawOrderAck = z.infer<typeof rawOrderAckSchema>;

export const rawBalanceSchema = z.object({
	balance: decimalSchema,
});

export const rawPositionSchema = z.object({
	asset: z.string().min(1),
	eventSlug: z.string().default(""),
	outcome: z.string().default(""),
	avgPrice: decimalSchema,
	size: decimalSchema,
	curPrice: decimalSchema,
	initialValue: decimalSchema,
	currentValue: decimalSchema,
	cashPnl: decimalSchema,
	percentPnl: decimalSchema,
	realizedPnl: decimalSchema.default(0),
});

export const rawPositionsSchema = z.array(rawPositionSchema);

export type RawPosition = z.infer<typeof rawPositionSchema>;

/** `clobTokenIds` and `outcomes` come either as arrays or as JSON-encoded strings. */
const stringList = z.union([
	z.array(z.string()),
	z.string().transform((raw, ctx) => {
		const parsed = z.array(z.string()).safeParse(parseJson(raw));
		if (!parsed.success) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a JSON string array" });
			return z.NEVER;
		}
		return parsed.data;
	}),
]);

function parseJson(raw: string): unknown {
	try {
		return JSON.parse(raw);
	} catch {
		return undefined;
	}
}

export const rawEventSchema = z.object({
	slug: z.string(),
	markets: z
		.array(
			z.object({
				question: z.string().optional(),
				clobTokenIds: stringList,
				outcomes: stringList.optional(),
			}),
		)
		.default([]),
});

export type RawEvent = z.infer<typeof rawEventSchema>;
