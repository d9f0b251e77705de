import { loadConfig } from './config/env.js';
import { logger } from './config/logger.js';
import { SCHEMA_IDS, SchemaValidator } from './contracts/schema-validator.js';
import { loadProfiles } from './profiles/loader.js';
import { createCalculators } from './risk/calculators/index.js';
import { RiskEngine } from './risk/engine.js';
import { Metrics } from './metrics/counter.js';
import { ApiServer } from './api/server.js';

async function main() {
    logger.info('Starting cardiovascular risk service');

    // Load configuration
    const config = loadConfig();
    logger.info({ config }, 'Configuration loaded');

    // Initialize schema validator
    const validator = new SchemaValidator(config.contracts.path);
    validator.loadSchemas();
    for (const schemaId of Object.values(SCHEMA_IDS)) {
        if (!validator.hasSchema(schemaId)) {
            throw new Error(`Required contract missing from ${config.contracts.path}: ${schemaId}`);
        }
    }

    // Load predefined profiles
    const profiles = loadProfiles(config.profiles.path, validator);

    // Initialize risk engine
    const metrics = new Metrics();
    const engine = new RiskEngine(createCalculators({ score2Region: config.score2.region }), metrics);

    // Initialize HTTP API server
    const apiServer = new ApiServer(config.http.port, engine, profiles, validator, {
        corsOrigin: config.http.corsOrigin,
    });

    await apiServer.start();

    logger.info({ score2Region: config.score2.region }, 'Cardiovascular risk service running');

    // Graceful shutdown
    const shutdown = async () => {
        logger.info('Shutting down gracefully');

        await apiServer.stop();

        process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch((err) => {
    logger.error({ error: err }, 'Fatal error during startup');
    process.exit(1);
});
