import { describe, it, expect } from 'vitest';
import { validatePatientRecord } from '../../../src/risk/validator.js';

const validRaw = {
    age: 45,
    sex: 'male',
    total_cholesterol: 220,
    hdl: 50,
    systolic_pressure: 130,
    smoker: false,
    diabetic: false,
    hypertension_treatment: false,
    statins: false,
};

function errorsOf(raw: unknown): string[] {
    const outcome = validatePatientRecord(raw);
    return outcome.ok ? [] : outcome.errors;
}

describe('validatePatientRecord', () => {
    describe('Valid records', () => {
        it('should normalize a complete record', () => {
            const outcome = validatePatientRecord(validRaw);

            expect(outcome).toEqual({
                ok: true,
                record: {
                    age: 45,
                    sex: 'male',
                    totalCholesterol: 220,
                    hdl: 50,
                    systolicPressure: 130,
                    smoker: false,
                    diabetic: false,
                    onHypertensionTreatment: false,
                    onStatins: false,
                },
                advisories: [],
            });
        });

        it('should coerce numeric strings and boolean spellings', () => {
            const outcome = validatePatientRecord({
                age: '45',
                sex: ' Male ',
                total_cholesterol: '220',
                hdl: '50.5',
                systolic_pressure: 130,
                smoker: 'true',
                diabetic: 0,
            });

            expect(outcome.ok).toBe(true);
            if (!outcome.ok) return;
            expect(outcome.record.age).toBe(45);
            expect(outcome.record.sex).toBe('male');
            expect(outcome.record.totalCholesterol).toBe(220);
            expect(outcome.record.hdl).toBe(50.5);
            expect(outcome.record.smoker).toBe(true);
            expect(outcome.record.diabetic).toBe(false);
        });

        it('should default risk factors to false and leave treatment status unset', () => {
            const outcome = validatePatientRecord({
                age: 50,
                sex: 'female',
                total_cholesterol: 190,
                hdl: 60,
                systolic_pressure: 118,
            });

            expect(outcome.ok).toBe(true);
            if (!outcome.ok) return;
            expect(outcome.record.smoker).toBe(false);
            expect(outcome.record.diabetic).toBe(false);
            expect(outcome.record.onHypertensionTreatment).toBeUndefined();
            expect(outcome.record.onStatins).toBeUndefined();
        });

        it('should keep optional measurements', () => {
            const outcome = validatePatientRecord({
                ...validRaw,
                weight: 82,
                height: 178,
                ldl: 140,
                diastolic_pressure: 85,
            });

            expect(outcome.ok).toBe(true);
            if (!outcome.ok) return;
            expect(outcome.record.weight).toBe(82);
            expect(outcome.record.height).toBe(178);
            expect(outcome.record.ldl).toBe(140);
            expect(outcome.record.diastolicPressure).toBe(85);
        });

        it('should ignore unknown fields and leave the input untouched', () => {
            const raw = { ...validRaw, age: '45', name: 'Test Patient' };
            const outcome = validatePatientRecord(raw);

            expect(outcome.ok).toBe(true);
            expect(raw.age).toBe('45');
        });

        it('should return a frozen record', () => {
            const outcome = validatePatientRecord(validRaw);
            expect(outcome.ok && Object.isFrozen(outcome.record)).toBe(true);
        });
    });

    describe('Errors', () => {
        it('should report a missing HDL and a non-numeric age together', () => {
            const { hdl: _hdl, ...withoutHdl } = validRaw;

            expect(errorsOf({ ...withoutHdl, age: 'abc' })).toEqual([
                'age must be a whole number',
                'Missing required field: hdl',
            ]);
        });

        it('should reject values that are not objects', () => {
            expect(errorsOf('age=45')).toEqual(['Patient record must be a JSON object']);
            expect(errorsOf(null)).toEqual(['Patient record must be a JSON object']);
            expect(errorsOf([validRaw])).toEqual(['Patient record must be a JSON object']);
        });

        it('should list every missing required field', () => {
            expect(errorsOf({})).toEqual([
                'Missing required field: age',
                'Missing required field: sex',
                'Missing required field: total_cholesterol',
                'Missing required field: hdl',
                'Missing required field: systolic_pressure',
            ]);
        });

        it('should treat null and blank values as missing', () => {
            expect(errorsOf({ ...validRaw, age: '', hdl: null })).toEqual([
                'Missing required field: age',
                'Missing required field: hdl',
            ]);
        });

        it('should collect range, category and boolean errors in field order', () => {
            expect(errorsOf({ ...validRaw, age: 15, sex: 'other', systolic_pressure: 250, smoker: 'maybe' })).toEqual([
                'age out of range (20-100): 15',
                "sex must be 'male' or 'female'",
                'systolic_pressure out of range (90-200): 250',
                'smoker must be true or false',
            ]);
        });

        it('should reject a fractional age', () => {
            expect(errorsOf({ ...validRaw, age: 45.5 })).toEqual(['age must be a whole number']);
        });

        it('should reject non-numeric measurements', () => {
            expect(errorsOf({ ...validRaw, total_cholesterol: 'high' })).toEqual([
                'total_cholesterol must be a number',
            ]);
        });

        it('should check bounds of optional measurements', () => {
            expect(errorsOf({ ...validRaw, weight: 10 })).toEqual(['weight out of range (30-250): 10']);
        });

        it('should reject a diastolic pressure not below the systolic one', () => {
            expect(errorsOf({ ...validRaw, diastolic_pressure: 130 })).toEqual([
                'diastolic_pressure must be lower than systolic_pressure',
            ]);
        });

        it('should report the pressure order alongside field errors', () => {
            const { hdl: _hdl, ...withoutHdl } = validRaw;

            expect(errorsOf({ ...withoutHdl, systolic_pressure: 110, diastolic_pressure: 120 })).toEqual([
                'Missing required field: hdl',
                'diastolic_pressure must be lower than systolic_pressure',
            ]);
        });
    });

    describe('Advisories', () => {
        function advisoriesOf(raw: unknown): string[] {
            const outcome = validatePatientRecord(raw);
            return outcome.ok ? outcome.advisories : ['<invalid>'];
        }

        it('should flag values at the edge of the accepted range', () => {
            expect(advisoriesOf({ ...validRaw, age: 20 })).toEqual([
                'age is at the limit of the accepted range (20-100): 20',
            ]);
            expect(advisoriesOf({ ...validRaw, hdl: 100 })).toEqual([
                'hdl is at the limit of the accepted range (20-100): 100',
            ]);
        });

        it('should flag elevated systolic pressure for young and older patients', () => {
            expect(advisoriesOf({ ...validRaw, age: 35, systolic_pressure: 150 })).toEqual([
                'Systolic pressure is elevated for age',
            ]);
            expect(advisoriesOf({ ...validRaw, age: 70, systolic_pressure: 140 })).toEqual([
                'Systolic pressure is elevated for age',
            ]);
            expect(advisoriesOf({ ...validRaw, age: 65, systolic_pressure: 140 })).toEqual([]);
        });

        it('should flag a high total cholesterol to HDL ratio', () => {
            expect(advisoriesOf({ ...validRaw, total_cholesterol: 260 })).toEqual([
                'Total cholesterol/HDL ratio is elevated (>5)',
            ]);
            expect(advisoriesOf({ ...validRaw, total_cholesterol: 250 })).toEqual([]);
        });
    });
});
