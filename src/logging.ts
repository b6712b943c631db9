import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

const LEVELS: readonly LevelWithSilent[] = [
    "fatal",
    "error",
    "warn",
    "info",
    "debug",
    "trace",
    "silent",
];

function isLevel(value: string | undefined): value is LevelWithSilent {
    return LEVELS.some((level) => level === value);
}

/**
 * Resolve the log level from `LOG_LEVEL`, falling back to `"warn"` when it is
 * unset or names no pino level.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
    const value = env.LOG_LEVEL;
    return isLevel(value) ? value : "warn";
}

export const createLogger = (level: LevelWithSilent = resolveLogLevel()): Logger =>
    pino({ name: "account-guard", level });

/** Module logger used when no logger is configured */
export const logger: Logger = createLogger();
