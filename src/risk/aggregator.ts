import { advisoryWarning, checkApplicability, skipWarning } from './applicability.js';
import { categorize } from './categories.js';
import {
    RISK_METHODS,
    type AggregatedResult,
    type CalculatorSet,
    type MethodSelector,
    type PatientRecord,
    type RiskAssessmentBody,
    type RiskMethod,
    type RiskResult,
} from './types.js';

export function resolveMethods(selector: MethodSelector): readonly RiskMethod[] {
    return selector === 'all' ? RISK_METHODS : [selector];
}

/**
 * Parses a method name from a URL or CLI argument. `acc-aha` is accepted as a
 * spelling of `acc_aha`.
 */
export function parseMethodSelector(value: string): MethodSelector | undefined {
    const normalized = value.trim().toLowerCase().replace(/-/g, '_');
    if (normalized === 'all') return 'all';
    return RISK_METHODS.find((method) => method === normalized);
}

/**
 * Runs every requested method that passes its gate and merges the results.
 * The overall estimate is the highest available percent.
 */
export function aggregate(
    record: PatientRecord,
    methods: readonly RiskMethod[],
    calculators: CalculatorSet,
    advisories: readonly string[] = [],
): AggregatedResult {
    const results: Partial<Record<RiskMethod, RiskResult>> = {};
    const available: RiskResult[] = [];
    const warnings = [...advisories];

    for (const method of methods) {
        const applicability = checkApplicability(method, record);
        if (!applicability.applicable) {
            warnings.push(skipWarning(method, applicability.reasons));
            continue;
        }
        warnings.push(...applicability.advisories.map((advisory) => advisoryWarning(method, advisory)));
        const result = calculators[method].calculate(record);
        results[method] = result;
        available.push(result);
    }

    if (available.length === 0) {
        return { results, warnings };
    }

    const percent = Math.max(...available.map((result) => result.percent));
    return {
        results,
        overall: { percent, category: categorize(percent) },
        warnings,
    };
}

export function toWireFormat(assessment: AggregatedResult): RiskAssessmentBody {
    const body: RiskAssessmentBody = { warnings: [...assessment.warnings] };

    for (const method of RISK_METHODS) {
        const result = assessment.results[method];
        if (result) {
            body[method] = { percent: result.percent, category: result.category };
        }
    }
    if (assessment.overall) {
        body.overall = { ...assessment.overall };
    }

    return body;
}
