export const RISK_METHODS = ['framingham', 'score', 'acc_aha'] as const;

export type RiskMethod = (typeof RISK_METHODS)[number];

export type MethodSelector = RiskMethod | 'all';

export const SCORE2_REGIONS = ['low', 'moderate', 'high', 'very_high'] as const;

export type Score2Region = (typeof SCORE2_REGIONS)[number];

export type Sex = 'male' | 'female';

export type RiskCategory = 'low' | 'moderate' | 'high' | 'very_high';

/**
 * Patient data as it arrives from a caller, before validation.
 * Numeric values may still be strings and booleans may be spelled as 0/1.
 */
export interface RawPatientRecord {
    age?: unknown;
    sex?: unknown;
    weight?: unknown;
    height?: unknown;
    total_cholesterol?: unknown;
    hdl?: unknown;
    ldl?: unknown;
    systolic_pressure?: unknown;
    diastolic_pressure?: unknown;
    smoker?: unknown;
    diabetic?: unknown;
    hypertension_treatment?: unknown;
    statins?: unknown;
}

export type RawPatientField = keyof RawPatientRecord;

/**
 * Validated and normalized patient data. Lipids in mg/dL, pressures in mmHg.
 */
export interface PatientRecord {
    age: number;
    sex: Sex;
    totalCholesterol: number;
    hdl: number;
    systolicPressure: number;
    smoker: boolean;
    diabetic: boolean;
    weight?: number;
    height?: number;
    ldl?: number;
    diastolicPressure?: number;
    onHypertensionTreatment?: boolean;
    onStatins?: boolean;
}

export interface RiskEstimate {
    percent: number;
    category: RiskCategory;
}

export interface RiskResult extends RiskEstimate {
    method: RiskMethod;
}

export interface RiskCalculator {
    readonly method: RiskMethod;
    calculate(record: PatientRecord): RiskResult;
}

export type CalculatorSet = Readonly<Record<RiskMethod, RiskCalculator>>;

export interface AggregatedResult {
    results: Partial<Record<RiskMethod, RiskResult>>;
    overall?: RiskEstimate;
    warnings: string[];
}

export type ValidationOutcome =
    | { ok: true; record: PatientRecord; advisories: string[] }
    | { ok: false; errors: string[] };

export type Applicability =
    | { applicable: true; advisories: string[] }
    | { applicable: false; reasons: string[] };

export type AssessmentOutcome =
    | { ok: true; assessment: AggregatedResult }
    | { ok: false; errors: string[] };

/**
 * Transport shape of an assessment, keyed by method name.
 */
export interface RiskAssessmentBody {
    framingham?: RiskEstimate;
    score?: RiskEstimate;
    acc_aha?: RiskEstimate;
    overall?: RiskEstimate;
    warnings: string[];
}

/**
 * Thrown when a calculator receives input outside its numeric domain.
 * Validation and the applicability gate make this unreachable; seeing one
 * means a bug, not bad user input.
 */
export class RiskContractError extends Error {
    constructor(
        public readonly method: RiskMethod,
        message: string,
    ) {
        super(`${method}: ${message}`);
        this.name = 'RiskContractError';
    }
}
