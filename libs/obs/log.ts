export const LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const RANK: Record<LogLevel, number> = { DEBUG: 10, INFO: 20, WARNING: 30, ERROR: 40 };

let threshold: LogLevel = "INFO";

export function setLogLevel(level: LogLevel) {
    threshold = level;
}

// One JSON object per line. Everything goes to stderr: stdout carries the dry-run preview only.
function emit(level: LogLevel, event: string, fields?: Record<string, unknown>) {
    if (RANK[level] < RANK[threshold]) return;
    const line = JSON.stringify({ ts: new Date().toISOString(), level, event, ...fields });
    if (level === "WARNING") console.warn(line);
    else console.error(line);
}

export const log = {
    debug: (event: string, fields?: Record<string, unknown>) => emit("DEBUG", event, fields),
    info: (event: string, fields?: Record<string, unknown>) => emit("INFO", event, fields),
    warn: (event: string, fields?: Record<string, unknown>) => emit("WARNING", event, fields),
    error: (event: string, fields?: Record<string, unknown>) => emit("ERROR", event, fields),
};
