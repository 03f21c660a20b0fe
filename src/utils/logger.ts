// src/utils/logger.ts
// Logger utility for the ftrace tokenizer

export const logger = {
    info: (...args: unknown[]) => console.log("[INFO]", ...args),
    warn: (...args: unknown[]) => console.warn("[WARN]", ...args),
    error: (...args: unknown[]) => console.error("[ERROR]", ...args),
    debug: (...args: unknown[]) => {
        if (process.env.DEBUG === "1") {
            debugLog(...args);
        }
    },
};

// Ungated debug line; callers holding their own debug switch check it first
export function debugLog(...args: unknown[]): void {
    console.log("[DEBUG]", ...args);
}

// Hot-path errors: only the first few per key reach the console
const MAX_LOGS_PER_KEY = 10;
const logCounts = new Map<string, number>();

export function logErrorLimited(key: string, message: string): void {
    const count = logCounts.get(key) ?? 0;
    if (count >= MAX_LOGS_PER_KEY) return;
    logCounts.set(key, count + 1);

    if (count + 1 === MAX_LOGS_PER_KEY) {
        logger.error(`${message} (further '${key}' messages suppressed)`);
    } else {
        logger.error(message);
    }
}

export function resetLogLimits(): void {
    logCounts.clear();
}

export default logger;
