import type { LogLevel } from "./config";

const LEVELS: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel) {
    currentLevel = level;
}

export function log(level: LogLevel, msg: string, ctx: Record<string, unknown> = {}) {
    if (LEVELS[level] < LEVELS[currentLevel]) return;
    const line = {
        t: new Date().toISOString(),
        level,
        msg,
        ...ctx,
    };
    console.log(JSON.stringify(line));
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

export const logger = {
    debug: (m: string, c?: Record<string, unknown>) => log("debug", m, c),
    info: (m: string, c?: Record<string, unknown>) => log("info", m, c),
    warn: (m: string, c?: Record<string, unknown>) => log("warn", m, c),
    error: (m: string, c?: Record<string, unknown>) => log("error", m, c),
};
