import { z } from "zod";
import type { Account, ClosedTrade, Position, SetupRecord } from "../types";

const DirectionSchema = z.enum(["long", "short"]);
const ConfidenceSchema = z.enum(["HIGH", "MEDIUM", "LOW"]);

export const AccountSchema = z.object({
	equity: z.number(),
	initialCapital: z.number().positive(),
	totalTrades: z.number().int().min(0),
	winningTrades: z.number().int().min(0),
	losingTrades: z.number().int().min(0),
	updatedAt: z.string(),
}) satisfies z.ZodType<Account>;

export const PositionSchema = z.object({
	id: z.string(),
	symbol: z.string().trim().min(1),
	direction: DirectionSchema,
	entryPrice: z.number().positive(),
	positionSize: z.number().positive(),
	stopLoss: z.number().positive(),
	takeProfit: z.number().positive(),
	riskAmount: z.number(),
	equityAtOpen: z.number(),
	openedAt: z.string(),
	setupId: z.string(),
	highWaterMark: z.number(),
	lowWaterMark: z.number(),
}) satisfies z.ZodType<Position>;

export const ClosedTradeSchema = PositionSchema.extend({
	exitPrice: z.number(),
	closedAt: z.string(),
	pnl: z.number(),
	pnlPercent: z.number(),
	exitReason: z.enum(["stop", "target", "manual"]),
	mfePercent: z.number(),
	maePercent: z.number(),
}) satisfies z.ZodType<ClosedTrade>;

export const SetupRecordSchema = z.object({
	id: z.string(),
	symbol: z.string(),
	timeframe: z.enum(["15m", "1h", "4h", "1d"]),
	setupType: z.enum([
		"volatility_expansion",
		"range_break_attempt",
		"trend_acceleration",
		"compression_expansion",
	]),
	direction: DirectionSchema,
	status: z.literal("FORMING"),
	confidence: ConfidenceSchema,
	context: z.string(),
	detectedAt: z.string(),
	updatedAt: z.string(),
}) satisfies z.ZodType<SetupRecord>;
