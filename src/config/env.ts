import { config } from 'dotenv';
import { SCORE2_REGIONS, type Score2Region } from '../risk/types.js';

// Load .env file if present
config();

export interface AppConfig {
    http: {
        port: number;
        corsOrigin: string;
    };
    contracts: {
        path: string;
    };
    profiles: {
        path: string;
    };
    score2: {
        region: Score2Region;
    };
    log: {
        level: string;
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid number for environment variable ${key}: ${value}`);
    }
    return parsed;
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
    const value = process.env[key];
    if (!value) return defaultValue;
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
        throw new Error(
            `Invalid value for environment variable ${key}: ${value} (expected one of ${choices.join(', ')})`,
        );
    }
    return match;
}

export function loadConfig(): AppConfig {
    return {
        http: {
            port: getEnvNumber('HTTP_PORT', 5000),
            corsOrigin: getEnv('CORS_ORIGIN', '*'),
        },
        contracts: {
            path: getEnv('CONTRACTS_PATH', './contracts'),
        },
        profiles: {
            path: getEnv('PROFILES_PATH', './profiles/default.json'),
        },
        score2: {
            region: getEnvChoice('SCORE2_REGION', SCORE2_REGIONS, 'low'),
        },
        log: {
            level: getEnv('LOG_LEVEL', 'info'),
        },
    };
}
