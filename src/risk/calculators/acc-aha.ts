import { checkedLog, survivalRisk, toRiskResult } from '../categories.js';
import type { PatientRecord, RiskCalculator, RiskResult, Sex } from '../types.js';

interface PooledCohortCoefficients {
    lnAge: number;
    lnAgeSquared: number;
    lnTotalCholesterol: number;
    lnAgeLnTotalCholesterol: number;
    lnHdl: number;
    lnAgeLnHdl: number;
    lnSbpTreated: number;
    lnSbpUntreated: number;
    smoker: number;
    lnAgeSmoker: number;
    diabetic: number;
    mean: number;
    baselineSurvival: number;
}

// Goff et al., 2013 ACC/AHA Guideline on the Assessment of Cardiovascular Risk,
// pooled cohort equations for white and other populations.
const COEFFICIENTS: Record<Sex, PooledCohortCoefficients> = {
    male: {
        lnAge: 12.344,
        lnAgeSquared: 0,
        lnTotalCholesterol: 11.853,
        lnAgeLnTotalCholesterol: -2.664,
        lnHdl: -7.99,
        lnAgeLnHdl: 1.769,
        lnSbpTreated: 1.797,
        lnSbpUntreated: 1.764,
        smoker: 7.837,
        lnAgeSmoker: -1.795,
        diabetic: 0.658,
        mean: 61.18,
        baselineSurvival: 0.9144,
    },
    female: {
        lnAge: -29.799,
        lnAgeSquared: 4.884,
        lnTotalCholesterol: 13.54,
        lnAgeLnTotalCholesterol: -3.114,
        lnHdl: -13.578,
        lnAgeLnHdl: 3.149,
        lnSbpTreated: 2.019,
        lnSbpUntreated: 1.957,
        smoker: 7.574,
        lnAgeSmoker: -1.665,
        diabetic: 0.661,
        mean: -29.18,
        baselineSurvival: 0.9665,
    },
};

export const POOLED_COHORT_MIN_AGE = 40;

/** Age at which the ln(age) factor of the interaction terms stops growing. */
export const INTERACTION_AGE_CAP = 77;

/**
 * ACC/AHA pooled cohort equations, 10-year ASCVD risk.
 *
 * Above 77 the published ln(age) interactions turn the cholesterol term
 * negative for women and the smoking term negative for men. Interaction terms
 * are evaluated at min(age, 77), and the reported risk is the highest value of
 * the equation over the ages from 40 up to the patient's own; through age 77
 * this matches the published equations wherever they rise with age.
 */
export class AccAhaCalculator implements RiskCalculator {
    readonly method = 'acc_aha' as const;

    calculate(record: PatientRecord): RiskResult {
        let risk = this.equation(record, record.age);
        for (let age = POOLED_COHORT_MIN_AGE; age < record.age; age++) {
            risk = Math.max(risk, this.equation(record, age));
        }
        return toRiskResult(this.method, risk);
    }

    private equation(record: PatientRecord, age: number): number {
        const c = COEFFICIENTS[record.sex];

        const lnAge = checkedLog(this.method, 'age', age);
        const lnInteractionAge = Math.log(Math.min(age, INTERACTION_AGE_CAP));
        const lnTotalCholesterol = checkedLog(this.method, 'totalCholesterol', record.totalCholesterol);
        const lnHdl = checkedLog(this.method, 'hdl', record.hdl);
        const lnSbp = checkedLog(this.method, 'systolicPressure', record.systolicPressure);
        const smoker = record.smoker ? 1 : 0;

        const sum =
            c.lnAge * lnAge +
            c.lnAgeSquared * lnAge * lnAge +
            c.lnTotalCholesterol * lnTotalCholesterol +
            c.lnAgeLnTotalCholesterol * lnInteractionAge * lnTotalCholesterol +
            c.lnHdl * lnHdl +
            c.lnAgeLnHdl * lnInteractionAge * lnHdl +
            (record.onHypertensionTreatment ? c.lnSbpTreated : c.lnSbpUntreated) * lnSbp +
            c.smoker * smoker +
            c.lnAgeSmoker * lnInteractionAge * smoker +
            (record.diabetic ? c.diabetic : 0);

        return survivalRisk(c.baselineSurvival, sum, c.mean);
    }
}
