import { checkedLog, toRiskResult } from '../categories.js';
import type { PatientRecord, RiskCalculator, RiskResult, Score2Region, Sex } from '../types.js';

const MG_DL_PER_MMOL_L = 38.67;

interface Score2Coefficients {
    age: number;
    smoker: number;
    sbp: number;
    totalCholesterol: number;
    hdl: number;
    diabetic: number;
    ageSmoker: number;
    ageSbp: number;
    ageTotalCholesterol: number;
    ageHdl: number;
    ageDiabetic: number;
    baselineSurvival: number;
}

// SCORE2 working group and ESC Cardiovascular risk collaboration, Eur Heart J 2021.
const COEFFICIENTS: Record<Sex, Score2Coefficients> = {
    male: {
        age: 0.3742,
        smoker: 0.6012,
        sbp: 0.2777,
        totalCholesterol: 0.1458,
        hdl: -0.2698,
        diabetic: 0.6457,
        ageSmoker: -0.0755,
        ageSbp: -0.0255,
        ageTotalCholesterol: -0.0281,
        ageHdl: 0.0426,
        ageDiabetic: -0.0983,
        baselineSurvival: 0.9605,
    },
    female: {
        age: 0.4648,
        smoker: 0.7744,
        sbp: 0.3131,
        totalCholesterol: 0.1002,
        hdl: -0.2606,
        diabetic: 0.8096,
        ageSmoker: -0.1088,
        ageSbp: -0.0277,
        ageTotalCholesterol: -0.0226,
        ageHdl: 0.0613,
        ageDiabetic: -0.1272,
        baselineSurvival: 0.9776,
    },
};

/** Region recalibration scales: [intercept, slope] on the cloglog scale. */
const CALIBRATION: Record<Score2Region, Record<Sex, readonly [number, number]>> = {
    low: { male: [-0.5699, 0.7476], female: [-0.738, 0.7019] },
    moderate: { male: [-0.1565, 0.8009], female: [-0.3143, 0.7701] },
    high: { male: [0.3207, 0.936], female: [0.571, 0.9369] },
    very_high: { male: [0.5836, 0.8294], female: [0.9412, 0.8329] },
};

export const SCORE2_MIN_AGE = 40;

/**
 * SCORE2 10-year fatal and non-fatal CVD risk, recalibrated to one of the
 * four European risk regions.
 *
 * The negative age interactions (diabetes in particular) can make the model
 * fall with age for extreme risk-factor combinations; the reported risk is the
 * highest value over the ages from 40 up to the patient's own.
 */
export class Score2Calculator implements RiskCalculator {
    readonly method = 'score' as const;

    constructor(readonly region: Score2Region = 'low') { }

    calculate(record: PatientRecord): RiskResult {
        let risk = this.equation(record, record.age);
        for (let age = SCORE2_MIN_AGE; age < record.age; age++) {
            risk = Math.max(risk, this.equation(record, age));
        }
        return toRiskResult(this.method, risk);
    }

    private equation(record: PatientRecord, age: number): number {
        const c = COEFFICIENTS[record.sex];

        const cage = (age - 60) / 5;
        const csbp = (record.systolicPressure - 120) / 20;
        const ctchol = record.totalCholesterol / MG_DL_PER_MMOL_L - 6;
        const chdl = (record.hdl / MG_DL_PER_MMOL_L - 1.3) / 0.5;
        const smoker = record.smoker ? 1 : 0;
        const diabetic = record.diabetic ? 1 : 0;

        const x =
            c.age * cage +
            c.smoker * smoker +
            c.sbp * csbp +
            c.totalCholesterol * ctchol +
            c.hdl * chdl +
            c.diabetic * diabetic +
            c.ageSmoker * cage * smoker +
            c.ageSbp * cage * csbp +
            c.ageTotalCholesterol * cage * ctchol +
            c.ageHdl * cage * chdl +
            c.ageDiabetic * cage * diabetic;

        const uncalibrated = 1 - Math.pow(c.baselineSurvival, Math.exp(x));
        const [intercept, slope] = CALIBRATION[this.region][record.sex];
        const hazard = -checkedLog(this.method, 'survival', 1 - uncalibrated);
        const cloglog = checkedLog(this.method, 'cumulativeHazard', hazard);
        return 1 - Math.exp(-Math.exp(intercept + slope * cloglog));
    }
}
