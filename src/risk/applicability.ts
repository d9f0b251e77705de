import type { Applicability, PatientRecord, RiskMethod } from './types.js';

interface Range {
    min: number;
    max: number;
}

interface MethodPreconditions {
    label: string;
    age: Range;
    requiresTreatmentStatus: boolean;
    totalCholesterol?: Range;
    advisories: (record: PatientRecord) => string[];
}

export const METHOD_PRECONDITIONS: Readonly<Record<RiskMethod, MethodPreconditions>> = {
    framingham: {
        label: 'Framingham',
        age: { min: 30, max: 74 },
        requiresTreatmentStatus: false,
        advisories: () => [],
    },
    score: {
        label: 'SCORE2',
        age: { min: 40, max: 69 },
        requiresTreatmentStatus: false,
        advisories: () => [],
    },
    acc_aha: {
        label: 'ACC/AHA',
        age: { min: 40, max: 79 },
        requiresTreatmentStatus: true,
        totalCholesterol: { min: 130, max: 320 },
        advisories: (record) =>
            record.onStatins ? ['patient is on statins; the pooled cohort equations assume statin-naive patients'] : [],
    },
};

export function methodLabel(method: RiskMethod): string {
    return METHOD_PRECONDITIONS[method].label;
}

/**
 * Decides whether a method may score this record. A failed precondition is
 * advisory: the caller skips the method and reports the reasons as a warning.
 */
export function checkApplicability(method: RiskMethod, record: PatientRecord): Applicability {
    const pre = METHOD_PRECONDITIONS[method];
    const reasons: string[] = [];

    if (record.age < pre.age.min || record.age > pre.age.max) {
        reasons.push(`age ${record.age} is outside the supported range ${pre.age.min}-${pre.age.max}`);
    }

    if (pre.requiresTreatmentStatus) {
        if (record.onHypertensionTreatment === undefined) {
            reasons.push('hypertension treatment status is required');
        }
        if (record.onStatins === undefined) {
            reasons.push('statin status is required');
        }
    }

    const tc = pre.totalCholesterol;
    if (tc && (record.totalCholesterol < tc.min || record.totalCholesterol > tc.max)) {
        reasons.push(
            `total cholesterol ${record.totalCholesterol} mg/dL is outside the supported range ${tc.min}-${tc.max}`,
        );
    }

    if (reasons.length > 0) {
        return { applicable: false, reasons };
    }
    return { applicable: true, advisories: pre.advisories(record) };
}

export function skipWarning(method: RiskMethod, reasons: string[]): string {
    return `${methodLabel(method)} not applicable: ${reasons.join('; ')}`;
}

export function advisoryWarning(method: RiskMethod, advisory: string): string {
    return `${methodLabel(method)}: ${advisory}`;
}
