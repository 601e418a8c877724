import pino from "pino";

/**
 * Pretty-printed pino options shared by the server and the console front end
 *
 * @param level - Minimum level to log
 * @param destination - File descriptor written to (1 = stdout, 2 = stderr)
 */
export const loggerOptions = (level: string, destination: 1 | 2 = 1) => ({
    level,
    transport: {
        target: "pino-pretty",
        options: {
            colorize: true,
            ignore: "pid,hostname",
            translateTime: "SYS:dd-mm-yyyy HH:MM:ss",
            destination
        }
    }
});

/**
 * Standalone logger for processes without a Fastify instance
 *
 * Writes to stderr so stdout only carries program output.
 */
export const createLogger = (level: string = process.env.LOG_LEVEL ?? "info") =>
    pino(loggerOptions(level, 2));
