import { readFileSync } from 'fs';
import { logger } from '../config/logger.js';
import type { SchemaValidator } from '../contracts/schema-validator.js';
import { validatePatientRecord } from '../risk/validator.js';
import type { PatientProfile, ProfileTable } from './types.js';

interface RawProfile {
    name: string;
    description: string;
    patient: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRawProfile(value: unknown): value is RawProfile {
    return (
        isRecord(value) &&
        typeof value.name === 'string' &&
        typeof value.description === 'string' &&
        isRecord(value.patient)
    );
}

function readProfileFile(profilesPath: string): unknown {
    try {
        const content = readFileSync(profilesPath, 'utf-8');
        return JSON.parse(content);
    } catch (err) {
        logger.error({ profilesPath, error: err }, 'Failed to load profiles');
        throw new Error(`Failed to load profiles from ${profilesPath}: ${err}`);
    }
}

/**
 * Load the predefined patient profiles once. Every profile must pass the same
 * validation as a caller-supplied record; the returned table is read-only.
 */
export function loadProfiles(profilesPath: string, validator: SchemaValidator): ProfileTable {
    const data = readProfileFile(profilesPath);

    const check = validator.validateProfiles(data);
    if (!check.valid) {
        logger.error({ profilesPath, errors: check.errors }, 'Profile file does not match contract');
        throw new Error(`Invalid profile file ${profilesPath}: ${check.errors}`);
    }

    const entries: unknown[] = isRecord(data) && Array.isArray(data.profiles) ? data.profiles : [];
    const table = new Map<string, Readonly<PatientProfile>>();

    for (const entry of entries) {
        if (!isRawProfile(entry)) {
            throw new Error(`Invalid profile entry in ${profilesPath}`);
        }
        if (table.has(entry.name)) {
            throw new Error(`Duplicate profile name in ${profilesPath}: ${entry.name}`);
        }

        const validation = validatePatientRecord(entry.patient);
        if (!validation.ok) {
            logger.error({ profile: entry.name, errors: validation.errors }, 'Profile patient data is invalid');
            throw new Error(`Profile ${entry.name} is invalid: ${validation.errors.join('; ')}`);
        }

        table.set(
            entry.name,
            Object.freeze({
                name: entry.name,
                description: entry.description,
                patient: Object.freeze({ ...entry.patient }),
                record: validation.record,
                advisories: Object.freeze([...validation.advisories]),
            }),
        );
    }

    logger.info({ profilesPath, count: table.size }, 'Profiles loaded successfully');

    return table;
}
