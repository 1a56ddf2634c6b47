// Fixed thresholds. These never vary with market state or environment.

export type FeatureSettings = {
	volatilityPeriod: number;
	volatilityHistory: number;
	maFast: number;
	maSlow: number;
	maTrend: number;
	rangePeriod: number;
};

export type DetectionSettings = {
	volExpansionMultiplier: number;
	volExpansionHighMultiplier: number;
	rangeProximityPct: number;
	rangeBreakVolMultiplier: number;
	fastMaDistancePct: number;
	slowMaDistancePct: number;
	compressionRatio: number;
	expansionRatio: number;
	strongExpansionRatio: number;
};

export type ScoringSettings = {
	trendAlignmentPoints: number;
	volatilityExpansionPoints: number;
	rewardRiskPoints: number;
	structureClarityPoints: number;
	volatilityExpansionRatio: number;
	minRewardRisk: number;
	minFormingScore: number;
	highConfidenceScore: number;
	mediumConfidenceScore: number;
	stopAtrMultiple: number;
};

export const FEATURE_SETTINGS: FeatureSettings = {
	volatilityPeriod: 20,
	volatilityHistory: 10,
	maFast: 20,
	maSlow: 50,
	maTrend: 200,
	rangePeriod: 20,
};

export const DETECTION_SETTINGS: DetectionSettings = {
	volExpansionMultiplier: 2,
	volExpansionHighMultiplier: 3,
	rangeProximityPct: 2,
	rangeBreakVolMultiplier: 1.5,
	fastMaDistancePct: 3,
	slowMaDistancePct: 6,
	compressionRatio: 0.7,
	expansionRatio: 1.5,
	strongExpansionRatio: 2,
};

export const SCORING_SETTINGS: ScoringSettings = {
	trendAlignmentPoints: 30,
	volatilityExpansionPoints: 25,
	rewardRiskPoints: 25,
	structureClarityPoints: 20,
	volatilityExpansionRatio: 1.5,
	minRewardRisk: 2,
	minFormingScore: 50,
	highConfidenceScore: 75,
	mediumConfidenceScore: 50,
	stopAtrMultiple: 1,
};
