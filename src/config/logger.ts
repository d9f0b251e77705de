import pino from 'pino';
import { loadConfig, type AppConfig } from './env.js';

export const SERVICE_NAME = 'cardio-risk-engine';

/**
 * Every line carries the service name and the SCORE2 calibration region, so
 * estimates logged by differently configured instances can be told apart.
 * Pretty printing is for local runs only.
 */
export function loggerOptions(config: Pick<AppConfig, 'log' | 'score2'>, nodeEnv?: string): pino.LoggerOptions {
    const pretty = nodeEnv !== 'production' && nodeEnv !== 'test';

    return {
        name: SERVICE_NAME,
        level: config.log.level,
        base: { region: config.score2.region },
        transport: pretty
            ? {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                },
            }
            : undefined,
    };
}

export const logger = pino(loggerOptions(loadConfig(), process.env.NODE_ENV));
