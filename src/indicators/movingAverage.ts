export function simpleMovingAverage(values: number[], period: number): number {
	if (period <= 0 || values.length < period) {
		throw new Error(`Not enough values to calculate SMA(${period})`);
	}
	const recent = values.slice(-period);
	return recent.reduce((acc, val) => acc + val, 0) / period;
}

/** Signed distance of `value` from `reference`, in percent of the reference. */
export function percentDistance(value: number, reference: number): number {
	return ((value - reference) / reference) * 100;
}
