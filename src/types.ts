export type Candle = {
	openTime: number;
	closeTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
};

export type Timeframe = "15m" | "1h" | "4h" | "1d";

export type Direction = "long" | "short";

export type ConfidenceTier = "HIGH" | "MEDIUM" | "LOW";

export type FeatureSet = {
	symbol: string;
	timeframe: Timeframe;
	asOf: number;
	candleCount: number;
	close: number;
	atr: number;
	volatilityPct: number;
	volatilityRatio: number | null;
	maFast: number;
	maSlow: number;
	maTrend: number;
	distanceFastPct: number;
	distanceSlowPct: number;
	distanceTrendPct: number;
	recentHigh: number;
	recentLow: number;
	distanceHighPct: number;
	distanceLowPct: number;
};

export type FeatureWindow = {
	features: FeatureSet;
	/** Prior volatility readings, oldest first. */
	volatilityHistory: number[];
};

export type SetupType =
	| "volatility_expansion"
	| "range_break_attempt"
	| "trend_acceleration"
	| "compression_expansion";

export type SetupCandidate = {
	symbol: string;
	timeframe: Timeframe;
	setupType: SetupType;
	direction: Direction;
	confidence: ConfidenceTier;
	context: string;
	metrics: Record<string, number>;
};

export type DecisionStatus = "forming" | "reject";

export type ScoreBucketName =
	| "trend_alignment"
	| "volatility_expansion"
	| "reward_risk"
	| "structure_clarity";

export type Decision = {
	id: string;
	symbol: string;
	timeframe: Timeframe;
	setupType: SetupType;
	direction: Direction;
	score: number;
	status: DecisionStatus;
	confidence: ConfidenceTier;
	buckets: ScoreBucketName[];
	justification: string;
	entryPrice: number;
	stopPrice: number;
	asOf: number;
};

export type Account = {
	equity: number;
	initialCapital: number;
	totalTrades: number;
	winningTrades: number;
	losingTrades: number;
	updatedAt: string;
};

export type Position = {
	id: string;
	symbol: string;
	direction: Direction;
	entryPrice: number;
	positionSize: number;
	stopLoss: number;
	takeProfit: number;
	riskAmount: number;
	equityAtOpen: number;
	openedAt: string;
	setupId: string;
	highWaterMark: number;
	lowWaterMark: number;
};

export type ExitReason = "stop" | "target" | "manual";

export type ClosedTrade = Position & {
	exitPrice: number;
	closedAt: string;
	pnl: number;
	pnlPercent: number;
	exitReason: ExitReason;
	mfePercent: number;
	maePercent: number;
};

export type PaperState = {
	account: Account;
	position: Position | null;
};

export type SetupRecord = {
	id: string;
	symbol: string;
	timeframe: Timeframe;
	setupType: SetupType;
	direction: Direction;
	status: "FORMING";
	confidence: ConfidenceTier;
	context: string;
	detectedAt: string;
	updatedAt: string;
};
