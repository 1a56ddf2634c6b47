import crypto from "node:crypto";
import { SCORING_SETTINGS, type ScoringSettings } from "../config/strategy";
import type {
	ConfidenceTier,
	Decision,
	Direction,
	FeatureSet,
	ScoreBucketName,
	SetupCandidate,
	SetupType,
} from "../types";

export type ScoreBucket = {
	name: ScoreBucketName;
	points: (settings: ScoringSettings) => number;
	awarded: (
		candidate: SetupCandidate,
		features: FeatureSet,
		settings: ScoringSettings,
	) => boolean;
};

const STRUCTURED_SETUPS: ReadonlySet<SetupType> = new Set([
	"range_break_attempt",
	"compression_expansion",
]);

/** Structure-based reward/risk: distance to the far extreme over distance to the near one. */
export function rewardRiskRatio(
	features: FeatureSet,
	direction: Direction,
): number | null {
	const above = features.recentHigh - features.close;
	const below = features.close - features.recentLow;
	const [reward, risk] = direction === "long" ? [above, below] : [below, above];
	if (risk <= 0) return null;
	return reward / risk;
}

function trendAligned(features: FeatureSet, direction: Direction): boolean {
	const { close, maFast, maSlow, maTrend } = features;
	if (direction === "long") {
		return close > maFast && maFast > maSlow && maSlow > maTrend;
	}
	return close < maFast && maFast < maSlow && maSlow < maTrend;
}

export const SCORE_BUCKETS: readonly ScoreBucket[] = [
	{
		name: "trend_alignment",
		points: (s) => s.trendAlignmentPoints,
		awarded: (c, f) => trendAligned(f, c.direction),
	},
	{
		name: "volatility_expansion",
		points: (s) => s.volatilityExpansionPoints,
		awarded: (_c, f, s) =>
			f.volatilityRatio !== null &&
			f.volatilityRatio >= s.volatilityExpansionRatio,
	},
	{
		name: "reward_risk",
		points: (s) => s.rewardRiskPoints,
		awarded: (c, f, s) => {
			const ratio = rewardRiskRatio(f, c.direction);
			return ratio !== null && ratio >= s.minRewardRisk;
		},
	},
	{
		name: "structure_clarity",
		points: (s) => s.structureClarityPoints,
		awarded: (c) => STRUCTURED_SETUPS.has(c.setupType),
	},
];

export function confidenceTier(
	score: number,
	settings: ScoringSettings = SCORING_SETTINGS,
): ConfidenceTier {
	if (score >= settings.highConfidenceScore) return "HIGH";
	if (score >= settings.mediumConfidenceScore) return "MEDIUM";
	return "LOW";
}

export function deriveDecisionId(
	candidate: SetupCandidate,
	asOf: number,
): string {
	const raw = [
		candidate.symbol,
		candidate.timeframe,
		candidate.setupType,
		candidate.direction,
		String(asOf),
	].join("|");
	return crypto.createHash("sha256").update(raw).digest("hex").slice(0, 16);
}

export function makeDecision(
	candidate: SetupCandidate,
	features: FeatureSet,
	settings: ScoringSettings = SCORING_SETTINGS,
	buckets: readonly ScoreBucket[] = SCORE_BUCKETS,
): Decision {
	const fired = buckets.filter((b) => b.awarded(candidate, features, settings));
	const total = fired.reduce((sum, b) => sum + b.points(settings), 0);
	const score = Math.min(100, Math.max(0, Math.round(total)));
	const status = score >= settings.minFormingScore ? "forming" : "reject";
	const names = fired.map((b) => b.name);
	const bucketText = names.length ? names.join(", ") : "none";
	const label = `${candidate.setupType} ${candidate.direction}`;

	const justification =
		status === "forming"
			? `${label}: ${candidate.context}; buckets: ${bucketText}; score ${score}/100`
			: `${label} rejected: score ${score} below ${settings.minFormingScore}; buckets: ${bucketText}`;

	const stopDistance = features.atr * settings.stopAtrMultiple;

	return {
		id: deriveDecisionId(candidate, features.asOf),
		symbol: candidate.symbol,
		timeframe: candidate.timeframe,
		setupType: candidate.setupType,
		direction: candidate.direction,
		score,
		status,
		confidence: confidenceTier(score, settings),
		buckets: names,
		justification,
		entryPrice: features.close,
		stopPrice:
			candidate.direction === "long"
				? features.close - stopDistance
				: features.close + stopDistance,
		asOf: features.asOf,
	};
}

export function makeDecisions(
	candidates: SetupCandidate[],
	features: FeatureSet,
	settings: ScoringSettings = SCORING_SETTINGS,
): Decision[] {
	return candidates.map((c) => makeDecision(c, features, settings));
}
