/**
 * Slot Generator Server
 *
 * Main entry point for the Fastify-based settings editor API.
 *
 * Features:
 * - Fastify web server with pretty logging
 * - Rate limiting (RATE_LIMIT_MAX requests per RATE_LIMIT_WINDOW)
 * - RESTful API endpoints under /slots prefix
 * - In-memory settings, reset on restart
 */

import { buildApp } from "./app";
import { loadConfig } from "./config";
import { loggerOptions } from "./logger";

const config = loadConfig();

const app = buildApp({
    logger: loggerOptions(config.LOG_LEVEL),
    rateLimit: config
});

app.listen({ port: config.PORT, host: config.HOST }).catch((err: unknown) => {
    app.log.error(err);
    process.exit(1);
});

export default app;
