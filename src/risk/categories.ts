import { RiskContractError, type RiskCategory, type RiskMethod, type RiskResult } from './types.js';

/**
 * Lower bounds (percent, inclusive) of each category above `low`.
 * Shared by every method and by the overall estimate.
 */
export const CATEGORY_THRESHOLDS = {
    moderate: 5,
    high: 10,
    very_high: 20,
} as const;

export function categorize(percent: number): RiskCategory {
    if (percent >= CATEGORY_THRESHOLDS.very_high) return 'very_high';
    if (percent >= CATEGORY_THRESHOLDS.high) return 'high';
    if (percent >= CATEGORY_THRESHOLDS.moderate) return 'moderate';
    return 'low';
}

/**
 * Turns a 10-year event probability (0..1) into a rounded, clamped result.
 */
export function toRiskResult(method: RiskMethod, probability: number): RiskResult {
    if (!Number.isFinite(probability)) {
        throw new RiskContractError(method, `non-finite probability ${probability}`);
    }

    const clamped = Math.min(Math.max(probability * 100, 0), 100);
    const percent = Math.round(clamped * 10) / 10;

    return { method, percent, category: categorize(percent) };
}

export function checkedLog(method: RiskMethod, name: string, value: number): number {
    if (!(value > 0) || !Number.isFinite(value)) {
        throw new RiskContractError(method, `cannot take log of ${name}=${value}`);
    }
    return Math.log(value);
}

/**
 * Cox survival transform: 1 - S0^exp(linear predictor - mean).
 */
export function survivalRisk(baselineSurvival: number, linearPredictor: number, mean: number): number {
    return 1 - Math.pow(baselineSurvival, Math.exp(linearPredictor - mean));
}
