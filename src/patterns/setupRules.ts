import {
	DETECTION_SETTINGS,
	type DetectionSettings,
} from "../config/strategy";
import type {
	ConfidenceTier,
	Direction,
	FeatureSet,
	SetupCandidate,
	SetupType,
} from "../types";

export type RuleContext = {
	features: FeatureSet;
	volatilityHistory: number[];
	settings: DetectionSettings;
};

export type SetupRule = {
	type: SetupType;
	evaluate: (ctx: RuleContext) => SetupCandidate | null;
};

function directionOf(distancePct: number): Direction {
	return distancePct >= 0 ? "long" : "short";
}

function candidate(
	features: FeatureSet,
	setupType: SetupType,
	direction: Direction,
	confidence: ConfidenceTier,
	context: string,
	metrics: Record<string, number>,
): SetupCandidate {
	return {
		symbol: features.symbol,
		timeframe: features.timeframe,
		setupType,
		direction,
		confidence,
		context,
		metrics,
	};
}

export const volatilityExpansion: SetupRule = {
	type: "volatility_expansion",
	evaluate: ({ features, settings }) => {
		const ratio = features.volatilityRatio;
		if (ratio === null || ratio <= settings.volExpansionMultiplier) return null;

		return candidate(
			features,
			"volatility_expansion",
			directionOf(features.distanceFastPct),
			ratio > settings.volExpansionHighMultiplier ? "HIGH" : "MEDIUM",
			`Volatility expanded ${ratio.toFixed(2)}x its recent average`,
			{ volatilityRatio: ratio },
		);
	},
};

export const rangeBreakAttempt: SetupRule = {
	type: "range_break_attempt",
	evaluate: ({ features, settings }) => {
		const ratio = features.volatilityRatio;
		if (ratio === null || ratio <= settings.rangeBreakVolMultiplier) return null;

		const nearHigh = features.distanceHighPct <= settings.rangeProximityPct;
		const nearLow = features.distanceLowPct <= settings.rangeProximityPct;
		if (!nearHigh && !nearLow) return null;

		const towardHigh =
			nearHigh && (!nearLow || features.distanceHighPct <= features.distanceLowPct);
		const distance = towardHigh
			? features.distanceHighPct
			: features.distanceLowPct;

		return candidate(
			features,
			"range_break_attempt",
			towardHigh ? "long" : "short",
			"MEDIUM",
			`Close ${distance.toFixed(2)}% from recent ${towardHigh ? "high" : "low"}, volatility ${ratio.toFixed(2)}x`,
			{ volatilityRatio: ratio, distanceToLevelPct: distance },
		);
	},
};

export const trendAcceleration: SetupRule = {
	type: "trend_acceleration",
	evaluate: ({ features, settings }) => {
		const slowTriggered =
			Math.abs(features.distanceSlowPct) > settings.slowMaDistancePct;
		const fastTriggered =
			Math.abs(features.distanceFastPct) > settings.fastMaDistancePct;
		if (!slowTriggered && !fastTriggered) return null;

		const distance = slowTriggered
			? features.distanceSlowPct
			: features.distanceFastPct;

		return candidate(
			features,
			"trend_acceleration",
			directionOf(distance),
			slowTriggered ? "HIGH" : "MEDIUM",
			`Close ${distance.toFixed(2)}% from the ${slowTriggered ? "slow" : "fast"} MA`,
			{
				distanceFastPct: features.distanceFastPct,
				distanceSlowPct: features.distanceSlowPct,
			},
		);
	},
};

export const compressionExpansion: SetupRule = {
	type: "compression_expansion",
	evaluate: ({ features, volatilityHistory, settings }) => {
		if (volatilityHistory.length < 2) return null;

		let lowestIdx = 0;
		for (let i = 1; i < volatilityHistory.length; i++) {
			if (volatilityHistory[i] < volatilityHistory[lowestIdx]) lowestIdx = i;
		}
		// compression needs a reading before it to compare against
		if (lowestIdx === 0) return null;

		const compressed = volatilityHistory[lowestIdx];
		const reference = Math.max(...volatilityHistory.slice(0, lowestIdx));
		if (compressed <= 0 || compressed >= settings.compressionRatio * reference) {
			return null;
		}

		const expansion = features.volatilityPct / compressed;
		if (expansion <= settings.expansionRatio) return null;

		return candidate(
			features,
			"compression_expansion",
			directionOf(features.distanceFastPct),
			expansion > settings.strongExpansionRatio ? "HIGH" : "MEDIUM",
			`Volatility compressed to ${(compressed / reference).toFixed(2)}x then expanded ${expansion.toFixed(2)}x`,
			{ compressionRatio: compressed / reference, expansionRatio: expansion },
		);
	},
};

export const SETUP_RULES: readonly SetupRule[] = [
	volatilityExpansion,
	rangeBreakAttempt,
	trendAcceleration,
	compressionExpansion,
];

/** Every rule runs; several setup types may fire for the same pair. */
export function detectSetups(
	features: FeatureSet,
	volatilityHistory: number[],
	settings: DetectionSettings = DETECTION_SETTINGS,
	rules: readonly SetupRule[] = SETUP_RULES,
): SetupCandidate[] {
	const ctx: RuleContext = { features, volatilityHistory, settings };
	const found: SetupCandidate[] = [];
	for (const rule of rules) {
		const result = rule.evaluate(ctx);
		if (result) found.push(result);
	}
	return found;
}
