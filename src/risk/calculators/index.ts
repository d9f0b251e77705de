import type { CalculatorSet, Score2Region } from '../types.js';
import { AccAhaCalculator } from './acc-aha.js';
import { FraminghamCalculator } from './framingham.js';
import { Score2Calculator } from './score2.js';

export interface CalculatorOptions {
    score2Region?: Score2Region;
}

export function createCalculators(options: CalculatorOptions = {}): CalculatorSet {
    return Object.freeze({
        framingham: new FraminghamCalculator(),
        score: new Score2Calculator(options.score2Region),
        acc_aha: new AccAhaCalculator(),
    });
}

export { AccAhaCalculator, FraminghamCalculator, Score2Calculator };
