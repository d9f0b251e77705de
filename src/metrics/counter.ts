import type { RiskMethod } from '../risk/types.js';

export class Metrics {
    private counters = Metrics.emptyCounters();

    private static emptyCounters() {
        return {
            received: 0,
            validated: 0,
            dropped_invalid: 0,
            assessments_computed: 0,
            methods_computed: 0,
            methods_skipped: 0,
            contract_failures: 0,
        };
    }

    private skippedByMethod: Record<RiskMethod, number> = { framingham: 0, score: 0, acc_aha: 0 };

    incrementReceived(): void {
        this.counters.received++;
    }

    incrementValidated(): void {
        this.counters.validated++;
    }

    incrementDroppedInvalid(): void {
        this.counters.dropped_invalid++;
    }

    incrementAssessmentsComputed(): void {
        this.counters.assessments_computed++;
    }

    incrementMethodsComputed(count: number): void {
        this.counters.methods_computed += count;
    }

    incrementMethodSkipped(method: RiskMethod): void {
        this.counters.methods_skipped++;
        this.skippedByMethod[method]++;
    }

    incrementContractFailures(): void {
        this.counters.contract_failures++;
    }

    getCounters() {
        return { ...this.counters, skipped_by_method: { ...this.skippedByMethod } };
    }

    reset(): void {
        this.counters = Metrics.emptyCounters();
        this.skippedByMethod = { framingham: 0, score: 0, acc_aha: 0 };
    }
}
