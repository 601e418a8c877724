import fastify, { type FastifyError, type FastifyServerOptions } from "fastify";
import rateLimit from '@fastify/rate-limit';
import {
    getSettings,
    updateSettings,
    resetSettings,
    addAvoidTime,
    removeAvoidTime,
    generateSlots
} from "./routes";
import { SlotGeneratorError } from "./domain/errors";
import type { AppConfig } from "./config";

export interface BuildAppOptions {
    logger: FastifyServerOptions['logger'];
    rateLimit: Pick<AppConfig, 'RATE_LIMIT_MAX' | 'RATE_LIMIT_WINDOW'>;
}

/**
 * Build the slot generator API
 *
 * Routes are registered under /slots. Generator errors become 400 responses naming the field;
 * anything else is logged and answered with 500.
 */
export const buildApp = (options: BuildAppOptions) => {
    const app = fastify({ logger: options.logger });

    app.register(rateLimit, {
        max: options.rateLimit.RATE_LIMIT_MAX,
        timeWindow: options.rateLimit.RATE_LIMIT_WINDOW
    });

    app.setErrorHandler<FastifyError>((error, request, reply) => {
        if (error instanceof SlotGeneratorError) {
            return reply.status(400).send({ error: error.code, field: error.field, detail: error.message });
        }
        if (error.statusCode && error.statusCode < 500) {
            return reply.status(error.statusCode).send({ error: error.code, detail: error.message });
        }
        request.log.error(error);
        return reply.status(500).send({ error: 'internal_error' });
    });

    app.register(function (app, _, done) {
        app.get("/settings", getSettings);
        app.patch("/settings", updateSettings);
        app.delete("/settings", resetSettings);
        app.post("/settings/avoid-times", addAvoidTime);
        app.delete("/settings/avoid-times/:index", removeAvoidTime);
        app.post("/generate", generateSlots);

        done();
    }, { prefix: "/slots" });

    return app;
}
