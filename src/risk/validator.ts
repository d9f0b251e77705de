import Ajv2020Lib from 'ajv/dist/2020.js';
import type { ErrorObject } from 'ajv';
import type { PatientRecord, RawPatientField, Sex, ValidationOutcome } from './types.js';

const Ajv2020 = Ajv2020Lib.default;

type NumericField =
    | 'age'
    | 'weight'
    | 'height'
    | 'total_cholesterol'
    | 'hdl'
    | 'ldl'
    | 'systolic_pressure'
    | 'diastolic_pressure';

type BooleanField = 'smoker' | 'diabetic' | 'hypertension_treatment' | 'statins';

export interface NumericRule {
    min: number;
    max: number;
    required: boolean;
    integer?: boolean;
}

/** Plausibility bounds, inclusive. */
export const NUMERIC_RULES: Readonly<Record<NumericField, NumericRule>> = {
    age: { min: 20, max: 100, required: true, integer: true },
    weight: { min: 30, max: 250, required: false },
    height: { min: 100, max: 250, required: false },
    total_cholesterol: { min: 100, max: 400, required: true },
    hdl: { min: 20, max: 100, required: true },
    ldl: { min: 30, max: 300, required: false },
    systolic_pressure: { min: 90, max: 200, required: true },
    diastolic_pressure: { min: 40, max: 130, required: false },
};

const NUMERIC_FIELDS: readonly NumericField[] = [
    'age',
    'weight',
    'height',
    'total_cholesterol',
    'hdl',
    'ldl',
    'systolic_pressure',
    'diastolic_pressure',
];

const BOOLEAN_FIELDS: readonly BooleanField[] = ['smoker', 'diabetic', 'hypertension_treatment', 'statins'];

// Error and advisory order follows this list.
const FIELD_ORDER: readonly RawPatientField[] = [
    'age',
    'sex',
    'weight',
    'height',
    'total_cholesterol',
    'hdl',
    'ldl',
    'systolic_pressure',
    'diastolic_pressure',
    ...BOOLEAN_FIELDS,
];

const PRESSURE_ORDER_ERROR = 'diastolic_pressure must be lower than systolic_pressure';

const SEXES: readonly Sex[] = ['male', 'female'];

/** Shape of a record once Ajv has coerced it. */
interface CoercedPatientRecord {
    age: number;
    sex: Sex;
    weight?: number;
    height?: number;
    total_cholesterol: number;
    hdl: number;
    ldl?: number;
    systolic_pressure: number;
    diastolic_pressure?: number;
    smoker?: boolean;
    diabetic?: boolean;
    hypertension_treatment?: boolean;
    statins?: boolean;
}

function isNumericField(field: RawPatientField): field is NumericField {
    return NUMERIC_FIELDS.some((n) => n === field);
}

function isBooleanField(field: RawPatientField): field is BooleanField {
    return BOOLEAN_FIELDS.some((b) => b === field);
}

function buildSchema() {
    const properties: Record<string, object> = {};
    const required: string[] = ['sex'];

    for (const field of NUMERIC_FIELDS) {
        const rule = NUMERIC_RULES[field];
        properties[field] = {
            type: rule.integer ? 'integer' : 'number',
            minimum: rule.min,
            maximum: rule.max,
        };
        if (rule.required) required.push(field);
    }
    properties.sex = { type: 'string', enum: SEXES };
    for (const field of BOOLEAN_FIELDS) {
        properties[field] = { type: 'boolean' };
    }

    return { type: 'object', required, properties };
}

const ajv = new Ajv2020({
    strict: false,
    allErrors: true,
    coerceTypes: true,
});

const validateShape = ajv.compile<CoercedPatientRecord>(buildSchema());

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copies the known fields, dropping null and blank values so that they read
 * as missing rather than as malformed.
 */
function pickFields(raw: Record<string, unknown>): Record<string, unknown> {
    const picked: Record<string, unknown> = {};

    for (const field of FIELD_ORDER) {
        let value = raw[field];
        if (typeof value === 'string') {
            value = field === 'sex' ? value.trim().toLowerCase() : value.trim();
        }
        if (value === undefined || value === null || value === '') continue;
        picked[field] = value;
    }

    return picked;
}

function errorField(error: ErrorObject): RawPatientField | undefined {
    const name =
        error.keyword === 'required' ? String(error.params.missingProperty) : error.instancePath.replace(/^\//, '');
    return FIELD_ORDER.find((field) => field === name);
}

function describeError(field: RawPatientField, error: ErrorObject, value: unknown): string {
    if (error.keyword === 'required') return `Missing required field: ${field}`;
    if (field === 'sex') return `sex must be 'male' or 'female'`;
    if (isBooleanField(field)) return `${field} must be true or false`;
    if (!isNumericField(field)) return `${field} is invalid`;

    const rule = NUMERIC_RULES[field];
    if (error.keyword === 'minimum' || error.keyword === 'maximum') {
        return `${field} out of range (${rule.min}-${rule.max}): ${String(value)}`;
    }
    return rule.integer ? `${field} must be a whole number` : `${field} must be a number`;
}

function pressuresOutOfOrder(systolic: unknown, diastolic: unknown): boolean {
    return typeof systolic === 'number' && typeof diastolic === 'number' && diastolic >= systolic;
}

function collectAdvisories(record: PatientRecord, data: CoercedPatientRecord): string[] {
    const advisories: string[] = [];

    for (const field of NUMERIC_FIELDS) {
        const rule = NUMERIC_RULES[field];
        const value = data[field];
        if (value === rule.min || value === rule.max) {
            advisories.push(`${field} is at the limit of the accepted range (${rule.min}-${rule.max}): ${value}`);
        }
    }

    if (
        (record.age < 40 && record.systolicPressure > 140) ||
        (record.age > 65 && record.systolicPressure > 130)
    ) {
        advisories.push('Systolic pressure is elevated for age');
    }

    if (record.totalCholesterol / record.hdl > 5) {
        advisories.push('Total cholesterol/HDL ratio is elevated (>5)');
    }

    return advisories;
}

/**
 * Validates a loosely typed patient record. Every violated rule is reported;
 * a valid record comes back normalized together with advisory warnings.
 */
export function validatePatientRecord(raw: unknown): ValidationOutcome {
    if (!isPlainObject(raw)) {
        return { ok: false, errors: ['Patient record must be a JSON object'] };
    }

    const data = pickFields(raw);

    if (!validateShape(data)) {
        const byField = new Map<RawPatientField, string>();
        for (const error of validateShape.errors ?? []) {
            const field = errorField(error);
            if (field && !byField.has(field)) {
                byField.set(field, describeError(field, error, data[field]));
            }
        }
        const errors = FIELD_ORDER.flatMap((field) => byField.get(field) ?? []);
        if (
            !byField.has('systolic_pressure') &&
            !byField.has('diastolic_pressure') &&
            pressuresOutOfOrder(data.systolic_pressure, data.diastolic_pressure)
        ) {
            errors.push(PRESSURE_ORDER_ERROR);
        }
        return { ok: false, errors: errors.length > 0 ? errors : ['Patient record is invalid'] };
    }

    if (pressuresOutOfOrder(data.systolic_pressure, data.diastolic_pressure)) {
        return { ok: false, errors: [PRESSURE_ORDER_ERROR] };
    }

    const record: PatientRecord = Object.freeze({
        age: data.age,
        sex: data.sex,
        totalCholesterol: data.total_cholesterol,
        hdl: data.hdl,
        systolicPressure: data.systolic_pressure,
        smoker: data.smoker ?? false,
        diabetic: data.diabetic ?? false,
        weight: data.weight,
        height: data.height,
        ldl: data.ldl,
        diastolicPressure: data.diastolic_pressure,
        onHypertensionTreatment: data.hypertension_treatment,
        onStatins: data.statins,
    });

    return { ok: true, record, advisories: collectAdvisories(record, data) };
}
