/**
 * Pino-based structured logging.
 *
 * Everything goes to stderr so that command output on stdout stays machine
 * readable. Set LOG_PRETTY=1 for human-friendly output while developing.
 */

import pino from "pino";

export const DEFAULT_LOG_LEVEL = "info";

/** Known pino level names plus "silent"; anything else resolves to the default. */
export function resolveLogLevel(value: string | undefined): { level: string; rejected?: string } {
    const requested = value?.trim();
    if (!requested) return { level: DEFAULT_LOG_LEVEL };
    if (requested === "silent" || Object.keys(pino.levels.values).includes(requested)) return { level: requested };
    return { level: DEFAULT_LOG_LEVEL, rejected: requested };
}

const { level, rejected } = resolveLogLevel(process.env.LOG_LEVEL);
const pretty = process.env.LOG_PRETTY === "1";

export const logger = pretty
    ? pino({
        level,
        transport: {
            target: "pino-pretty",
            options: {
                colorize: true,
                destination: 2,
                ignore: "pid,hostname",
                translateTime: "HH:MM:ss",
            },
        },
    })
    : pino({ level }, pino.destination(2));

if (rejected) {
    logger.warn({ LOG_LEVEL: rejected }, `unknown LOG_LEVEL, using ${DEFAULT_LOG_LEVEL}`);
}

export const analyzerLogger = logger.child({ module: "analyzer" });
export const llmLogger = logger.child({ module: "llm" });
export const cliLogger = logger.child({ module: "cli" });
