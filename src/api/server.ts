import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { logger } from '../config/logger.js';
import { SchemaValidator } from '../contracts/schema-validator.js';
import type { ProfileTable } from '../profiles/types.js';
import { parseMethodSelector, toWireFormat } from '../risk/aggregator.js';
import { RiskEngine } from '../risk/engine.js';
import { RiskContractError, type AggregatedResult } from '../risk/types.js';

export const MAX_BODY_BYTES = 1024 * 1024;

export interface ApiServerOptions {
    corsOrigin: string;
}

class HttpError extends Error {
    constructor(
        public readonly status: number,
        message: string,
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export class ApiServer {
    private server: Server;

    constructor(
        private port: number,
        private engine: RiskEngine,
        private profiles: ProfileTable,
        private validator: SchemaValidator,
        private options: ApiServerOptions = { corsOrigin: '*' },
    ) {
        this.server = createServer((req, res) => {
            this.handleRequest(req, res).catch((err: unknown) => this.handleFailure(req, res, err));
        });
    }

    private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const method = req.method ?? 'GET';
        const { pathname } = new URL(req.url ?? '/', 'http://localhost');
        const segments = pathname.split('/').filter(Boolean).map(decodeURIComponent);

        // CORS headers
        res.setHeader('Access-Control-Allow-Origin', this.options.corsOrigin);
        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

        if (method === 'OPTIONS') {
            res.writeHead(204);
            res.end();
            return;
        }

        if (method === 'GET' && pathname === '/health') {
            this.handleHealth(res);
        } else if (method === 'GET' && pathname === '/metrics') {
            this.handleMetrics(res);
        } else if (method === 'GET' && segments[0] === 'profiles' && segments.length === 1) {
            this.handleListProfiles(res);
        } else if (method === 'GET' && segments[0] === 'profiles' && segments.length === 2) {
            this.handleGetProfile(res, segments[1]);
        } else if (method === 'GET' && segments[0] === 'profiles' && segments.length === 3 && segments[2] === 'risk') {
            this.handleProfileRisk(res, segments[1]);
        } else if (method === 'POST' && segments[0] === 'calculate' && segments.length === 2) {
            await this.handleCalculate(req, res, segments[1]);
        } else {
            this.sendJson(res, 404, { status: 'error', errors: ['Not found'] });
        }
    }

    private handleHealth(res: ServerResponse): void {
        const response = {
            status: 'ok',
            profiles: this.profiles.size,
            timestamp: new Date().toISOString(),
        };

        this.sendJson(res, 200, response);
    }

    private handleMetrics(res: ServerResponse): void {
        const response = {
            ...this.engine.getMetrics().getCounters(),
            timestamp: new Date().toISOString(),
        };

        this.sendJson(res, 200, response);
    }

    private handleListProfiles(res: ServerResponse): void {
        const profiles: Record<string, { description: string; patient: Readonly<Record<string, unknown>> }> = {};
        for (const profile of this.profiles.values()) {
            profiles[profile.name] = { description: profile.description, patient: profile.patient };
        }

        this.sendJson(res, 200, { status: 'ok', profiles });
    }

    private handleGetProfile(res: ServerResponse, name: string): void {
        const profile = this.profiles.get(name);
        if (!profile) {
            this.sendJson(res, 404, { status: 'error', errors: [`Profile not found: ${name}`] });
            return;
        }

        this.sendJson(res, 200, {
            status: 'ok',
            profile: { name: profile.name, description: profile.description, patient: profile.patient },
        });
    }

    private handleProfileRisk(res: ServerResponse, name: string): void {
        const profile = this.profiles.get(name);
        if (!profile) {
            this.sendJson(res, 404, { status: 'error', errors: [`Profile not found: ${name}`] });
            return;
        }

        const assessment = this.engine.assessRecord(profile.record, 'all', profile.advisories);
        this.sendAssessment(res, assessment, { profile: profile.name });
    }

    private async handleCalculate(req: IncomingMessage, res: ServerResponse, methodName: string): Promise<void> {
        const selector = parseMethodSelector(methodName);
        if (!selector) {
            this.sendJson(res, 404, { status: 'error', errors: [`Unknown method: ${methodName}`] });
            return;
        }

        const body = await this.readJsonBody(req);
        const outcome = this.engine.assess(body, selector);

        if (!outcome.ok) {
            this.sendJson(res, 400, { status: 'error', errors: outcome.errors });
            return;
        }

        this.sendAssessment(res, outcome.assessment);
    }

    /**
     * Send an assessment after checking it against the response contract
     */
    private sendAssessment(
        res: ServerResponse,
        assessment: AggregatedResult,
        extra: { profile?: string } = {},
    ): void {
        const body = {
            status: 'ok',
            assessed_at: new Date().toISOString(),
            ...extra,
            ...toWireFormat(assessment),
        };

        const check = this.validator.validateRiskAssessment(body);
        if (!check.valid) {
            logger.error({ errors: check.errors, body }, 'Risk assessment does not match response contract');
            this.sendJson(res, 500, { status: 'error', errors: ['Internal error'] });
            return;
        }

        this.sendJson(res, 200, body);
    }

    /**
     * Oversized bodies are rejected at the limit but still drained, so the
     * 413 reaches a client that is still uploading
     */
    private readJsonBody(req: IncomingMessage): Promise<unknown> {
        return new Promise((resolve, reject) => {
            const chunks: Buffer[] = [];
            let size = 0;
            let rejected = false;

            req.on('data', (chunk: Buffer) => {
                if (rejected) return;
                size += chunk.length;
                if (size > MAX_BODY_BYTES) {
                    rejected = true;
                    chunks.length = 0;
                    reject(new HttpError(413, 'Request body too large'));
                    return;
                }
                chunks.push(chunk);
            });

            req.on('end', () => {
                if (rejected) return;
                try {
                    resolve(JSON.parse(Buffer.concat(chunks).toString('utf-8')));
                } catch {
                    reject(new HttpError(400, 'Request body is not valid JSON'));
                }
            });

            req.on('error', (err) => {
                if (!rejected) reject(err);
            });
        });
    }

    private handleFailure(req: IncomingMessage, res: ServerResponse, err: unknown): void {
        if (err instanceof HttpError) {
            if (err.status === 413) {
                // The rest of the upload is never read; drop the connection once answered.
                res.setHeader('Connection', 'close');
                res.once('finish', () => req.destroy());
            }
            this.sendJson(res, err.status, { status: 'error', errors: [err.message] });
            return;
        }

        if (err instanceof RiskContractError) {
            this.engine.getMetrics().incrementContractFailures();
        }
        logger.error({ error: err }, 'Request failed');

        if (res.headersSent) {
            res.end();
            return;
        }
        this.sendJson(res, 500, { status: 'error', errors: ['Internal error'] });
    }

    private sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
        res.writeHead(statusCode, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(body));
    }

    /**
     * Port the server is bound to; differs from the configured one when that was 0
     */
    getPort(): number {
        const address = this.server.address();
        return typeof address === 'object' && address !== null ? address.port : this.port;
    }

    async start(): Promise<void> {
        return new Promise((resolve) => {
            this.server.listen(this.port, () => {
                logger.info({ port: this.getPort() }, 'HTTP API server started');
                resolve();
            });
        });
    }

    async stop(): Promise<void> {
        return new Promise((resolve) => {
            this.server.close(() => {
                logger.info('HTTP API server stopped');
                resolve();
            });
        });
    }
}
