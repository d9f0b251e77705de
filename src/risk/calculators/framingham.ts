import { checkedLog, survivalRisk, toRiskResult } from '../categories.js';
import type { PatientRecord, RiskCalculator, RiskResult, Sex } from '../types.js';

interface FraminghamCoefficients {
    lnAge: number;
    lnTotalCholesterol: number;
    lnHdl: number;
    lnSbpUntreated: number;
    lnSbpTreated: number;
    smoker: number;
    diabetic: number;
    mean: number;
    baselineSurvival: number;
}

// D'Agostino et al., General Cardiovascular Risk Profile, Circulation 2008.
const COEFFICIENTS: Record<Sex, FraminghamCoefficients> = {
    male: {
        lnAge: 3.06117,
        lnTotalCholesterol: 1.1237,
        lnHdl: -0.93263,
        lnSbpUntreated: 1.93303,
        lnSbpTreated: 1.99881,
        smoker: 0.65451,
        diabetic: 0.57367,
        mean: 23.9802,
        baselineSurvival: 0.88936,
    },
    female: {
        lnAge: 2.32888,
        lnTotalCholesterol: 1.20904,
        lnHdl: -0.70833,
        lnSbpUntreated: 2.76157,
        lnSbpTreated: 2.82263,
        smoker: 0.52873,
        diabetic: 0.69154,
        mean: 26.1931,
        baselineSurvival: 0.95012,
    },
};

export class FraminghamCalculator implements RiskCalculator {
    readonly method = 'framingham' as const;

    calculate(record: PatientRecord): RiskResult {
        const c = COEFFICIENTS[record.sex];
        const sbpCoefficient = record.onHypertensionTreatment ? c.lnSbpTreated : c.lnSbpUntreated;

        const sum =
            c.lnAge * checkedLog(this.method, 'age', record.age) +
            c.lnTotalCholesterol * checkedLog(this.method, 'totalCholesterol', record.totalCholesterol) +
            c.lnHdl * checkedLog(this.method, 'hdl', record.hdl) +
            sbpCoefficient * checkedLog(this.method, 'systolicPressure', record.systolicPressure) +
            (record.smoker ? c.smoker : 0) +
            (record.diabetic ? c.diabetic : 0);

        return toRiskResult(this.method, survivalRisk(c.baselineSurvival, sum, c.mean));
    }
}
