import Ajv2020Lib from 'ajv/dist/2020.js';
import addFormatsLib from 'ajv-formats';
import type { AnySchemaObject } from 'ajv';

const Ajv2020 = Ajv2020Lib.default;
const addFormats = addFormatsLib.default;
import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../config/logger.js';

export const SCHEMA_IDS = {
    patientProfiles: 'https://cardio-risk.example.com/schemas/patient-profiles.json',
    riskAssessment: 'https://cardio-risk.example.com/schemas/risk-assessment.json',
} as const;

export interface ValidationResult {
    valid: boolean;
    errors?: string;
}

function isSchemaObject(value: unknown): value is AnySchemaObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON Schema (2020-12) contracts for the profile file and for outgoing
 * assessments, loaded from every .json file under the contracts directory.
 */
export class SchemaValidator {
    private ajv: InstanceType<typeof Ajv2020>;
    private schemaIds = new Set<string>();
    private schemasLoaded = false;

    constructor(private contractsPath: string) {
        this.ajv = new Ajv2020({
            validateSchema: false,
            strict: false,
            allErrors: true,
        });
        addFormats(this.ajv);
    }

    loadSchemas(): void {
        if (!existsSync(this.contractsPath)) {
            logger.error({ path: this.contractsPath }, 'Contracts directory not found');
            return;
        }

        const files = this.findJsonFiles(this.contractsPath);
        logger.info({ count: files.length, path: this.contractsPath }, 'Loading schemas');

        for (const file of files) {
            this.loadSchemaFile(file);
        }

        this.schemasLoaded = true;
        logger.info({ schemas: [...this.schemaIds] }, 'Schemas loaded');
    }

    private loadSchemaFile(file: string): void {
        let schema: unknown;
        try {
            schema = JSON.parse(readFileSync(file, 'utf-8'));
        } catch (err) {
            logger.error({ file, error: err }, 'Failed to read schema');
            return;
        }

        if (!isSchemaObject(schema) || typeof schema.$id !== 'string') {
            logger.warn({ file }, 'Schema missing $id, skipped');
            return;
        }
        if (this.schemaIds.has(schema.$id)) {
            logger.warn({ file, $id: schema.$id }, 'Duplicate schema $id, skipped');
            return;
        }

        try {
            this.ajv.addSchema(schema);
            this.schemaIds.add(schema.$id);
            logger.debug({ $id: schema.$id, file }, 'Schema loaded');
        } catch (err) {
            logger.error({ file, error: err }, 'Failed to compile schema');
        }
    }

    private findJsonFiles(dir: string): string[] {
        return readdirSync(dir, { withFileTypes: true }).flatMap((entry) => {
            const fullPath = join(dir, entry.name);
            if (entry.isDirectory()) return this.findJsonFiles(fullPath);
            return entry.isFile() && entry.name.endsWith('.json') ? [fullPath] : [];
        });
    }

    isLoaded(): boolean {
        return this.schemasLoaded;
    }

    hasSchema(schemaId: string): boolean {
        return this.schemaIds.has(schemaId);
    }

    /**
     * Validate data against a schema by its $id
     */
    validate(schemaId: string, data: unknown): ValidationResult {
        if (!this.schemasLoaded) {
            logger.warn('Schemas not loaded, validation will fail');
            return { valid: false, errors: 'Schemas not loaded' };
        }

        const validateFn = this.ajv.getSchema(schemaId);
        if (!validateFn) {
            logger.error({ schemaId }, 'Schema not found');
            return { valid: false, errors: `Schema not found: ${schemaId}` };
        }

        if (!validateFn(data)) {
            return { valid: false, errors: this.ajv.errorsText(validateFn.errors) };
        }
        return { valid: true };
    }

    validateProfiles(data: unknown): ValidationResult {
        return this.validate(SCHEMA_IDS.patientProfiles, data);
    }

    /**
     * Validate an outgoing risk assessment body
     */
    validateRiskAssessment(data: unknown): ValidationResult {
        return this.validate(SCHEMA_IDS.riskAssessment, data);
    }
}
