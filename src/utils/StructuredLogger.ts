export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
    debug(message: string, fields?: Record<string, unknown>): void;
    info(message: string, fields?: Record<string, unknown>): void;
    warn(message: string, fields?: Record<string, unknown>): void;
    error(message: string, fields?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const configured = (env.SOLUTION_MAP_LOG_LEVEL ?? "").toLowerCase();
    if (isLogLevel(configured)) {
        return configured;
    }
    return env.SOLUTION_MAP_DEBUG === "true" ? "debug" : "info";
}

export function createLogger(component: string, level: LogLevel = resolveLogLevel()): Logger {
    const log = (entryLevel: LogLevel, message: string, fields?: Record<string, unknown>) => {
        if (LEVEL_PRIORITY[entryLevel] < LEVEL_PRIORITY[level]) {
            return;
        }
        const payload = {
            timestamp: new Date().toISOString(),
            level: entryLevel,
            component,
            message,
            ...(fields ?? {})
        };
        const sink = entryLevel === "error" ? console.error
            : entryLevel === "warn" ? console.warn
            : entryLevel === "debug" ? console.debug
            : console.info;
        sink(payload);
    };

    return {
        debug: (message, fields) => log("debug", message, fields),
        info: (message, fields) => log("info", message, fields),
        warn: (message, fields) => log("warn", message, fields),
        error: (message, fields) => log("error", message, fields)
    };
}
