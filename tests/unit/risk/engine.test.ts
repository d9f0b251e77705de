import { describe, it, expect, beforeEach } from 'vitest';
import { Metrics } from '../../../src/metrics/counter.js';
import { createCalculators } from '../../../src/risk/calculators/index.js';
import { RiskEngine } from '../../../src/risk/engine.js';

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

describe('RiskEngine', () => {
    let metrics: Metrics;
    let engine: RiskEngine;

    beforeEach(() => {
        metrics = new Metrics();
        engine = new RiskEngine(createCalculators(), metrics);
    });

    it('should assess a valid record with every method', () => {
        const outcome = engine.assess(validRaw, 'all');

        expect(outcome.ok).toBe(true);
        if (!outcome.ok) return;
        expect(outcome.assessment.overall).toEqual({ percent: 6.8, category: 'moderate' });
        expect(outcome.assessment.warnings).toEqual([]);

        expect(metrics.getCounters()).toEqual({
            received: 1,
            validated: 1,
            dropped_invalid: 0,
            assessments_computed: 1,
            methods_computed: 3,
            methods_skipped: 0,
            contract_failures: 0,
            skipped_by_method: { framingham: 0, score: 0, acc_aha: 0 },
        });
    });

    it('should return validation errors without scoring', () => {
        const { hdl: _hdl, ...withoutHdl } = validRaw;
        const outcome = engine.assess({ ...withoutHdl, age: 'abc' }, 'all');

        expect(outcome).toEqual({
            ok: false,
            errors: ['age must be a whole number', 'Missing required field: hdl'],
        });
        expect(metrics.getCounters().dropped_invalid).toBe(1);
        expect(metrics.getCounters().assessments_computed).toBe(0);
    });

    it('should carry validator advisories into the warnings', () => {
        const outcome = engine.assess({ ...validRaw, total_cholesterol: 260 }, 'framingham');

        expect(outcome.ok && outcome.assessment.warnings).toEqual(['Total cholesterol/HDL ratio is elevated (>5)']);
    });

    it('should count methods skipped by the applicability gate', () => {
        const outcome = engine.assess({ ...validRaw, age: 25 }, 'all');

        expect(outcome.ok).toBe(true);
        if (!outcome.ok) return;
        expect(outcome.assessment.results).toEqual({});
        expect(outcome.assessment.warnings).toHaveLength(3);

        const counters = metrics.getCounters();
        expect(counters.methods_computed).toBe(0);
        expect(counters.methods_skipped).toBe(3);
        expect(counters.skipped_by_method).toEqual({ framingham: 1, score: 1, acc_aha: 1 });
    });

    it('should score stored records without counting them as received', () => {
        const assessment = engine.assessRecord(
            {
                age: 72,
                sex: 'female',
                totalCholesterol: 210,
                hdl: 55,
                systolicPressure: 125,
                smoker: false,
                diabetic: false,
                onHypertensionTreatment: false,
                onStatins: false,
            },
            'all',
        );

        expect(Object.keys(assessment.results)).toEqual(['framingham', 'acc_aha']);
        expect(metrics.getCounters().received).toBe(0);
        expect(metrics.getCounters().skipped_by_method.score).toBe(1);
    });

    it('should create its own metrics when none are given', () => {
        const standalone = new RiskEngine(createCalculators());
        standalone.assess(validRaw, 'score');

        expect(standalone.getMetrics().getCounters().methods_computed).toBe(1);
    });
});

describe('Metrics', () => {
    it('should reset every counter', () => {
        const metrics = new Metrics();
        metrics.incrementReceived();
        metrics.incrementMethodSkipped('score');
        metrics.incrementContractFailures();

        metrics.reset();

        expect(metrics.getCounters()).toEqual({
            received: 0,
            validated: 0,
            dropped_invalid: 0,
            assessments_computed: 0,
            methods_computed: 0,
            methods_skipped: 0,
            contract_failures: 0,
            skipped_by_method: { framingham: 0, score: 0, acc_aha: 0 },
        });
    });
});
