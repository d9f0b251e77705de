import { logger } from '../config/logger.js';
import { Metrics } from '../metrics/counter.js';
import { aggregate, resolveMethods } from './aggregator.js';
import type {
    AggregatedResult,
    AssessmentOutcome,
    CalculatorSet,
    MethodSelector,
    PatientRecord,
    RiskMethod,
} from './types.js';
import { validatePatientRecord } from './validator.js';

export class RiskEngine {
    constructor(
        private calculators: CalculatorSet,
        private metrics: Metrics = new Metrics(),
    ) { }

    /**
     * Validate a raw record and score it with the selected methods
     */
    assess(raw: unknown, selector: MethodSelector): AssessmentOutcome {
        this.metrics.incrementReceived();

        const validation = validatePatientRecord(raw);
        if (!validation.ok) {
            logger.debug({ errors: validation.errors }, 'Patient record rejected');
            this.metrics.incrementDroppedInvalid();
            return { ok: false, errors: validation.errors };
        }

        this.metrics.incrementValidated();

        return {
            ok: true,
            assessment: this.assessRecord(validation.record, selector, validation.advisories),
        };
    }

    /**
     * Score an already-normalized record, e.g. a stored profile
     */
    assessRecord(
        record: PatientRecord,
        selector: MethodSelector,
        advisories: readonly string[] = [],
    ): AggregatedResult {
        const methods = resolveMethods(selector);
        const assessment = aggregate(record, methods, this.calculators, advisories);

        const computed = methods.filter((method) => assessment.results[method] !== undefined);
        const skipped = methods.filter((method) => assessment.results[method] === undefined);
        skipped.forEach((method: RiskMethod) => {
            this.metrics.incrementMethodSkipped(method);
        });

        if (skipped.length > 0) {
            logger.debug({ selector, skipped, age: record.age }, 'Methods skipped by applicability gate');
        }

        this.metrics.incrementAssessmentsComputed();
        this.metrics.incrementMethodsComputed(computed.length);

        logger.info(
            {
                selector,
                computed,
                overall: assessment.overall,
                warnings: assessment.warnings.length,
            },
            'Risk assessment computed',
        );

        return assessment;
    }

    getMetrics(): Metrics {
        return this.metrics;
    }
}
