import type { PatientRecord } from '../risk/types.js';

export interface PatientProfile {
    name: string;
    description: string;
    /** Patient data as written in the profile file. */
    patient: Readonly<Record<string, unknown>>;
    record: PatientRecord;
    advisories: readonly string[];
}

export type ProfileTable = ReadonlyMap<string, Readonly<PatientProfile>>;
