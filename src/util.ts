/**
 * Logging and small helpers shared by the purge job.
 *
 * Copyright (C) 2025 Paulo Ferreira de Castro
 *
 * Licensed under the Open Software License version 3.0, a copy of which can be
 * found in the LICENSE file.
 */

import winston from "winston";
import type { Logger } from "winston";

export type LevelT = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";
const LEVELS: readonly LevelT[] = [
    "error",
    "warn",
    "info",
    "http",
    "verbose",
    "debug",
    "silly",
];

/** Environment-style configuration mapping, e.g. `process.env`. */
export type EnvMap = Readonly<Record<string, string | undefined>>;

let log: Logger | undefined;

export function getLogger(opts?: { level?: LevelT }): Logger {
    if (!log) {
        const { level = "info" } = opts || {};
        log = setupLogger({ level });
    }
    return log;
}

export function setupLogger(opts: { level: LevelT }): Logger {
    const { level } = opts;
    const { combine, splat, printf, timestamp } = winston.format;
    // All levels go to stderr: stdout carries the CLI's JSON output.
    const stderrLevels = [...LEVELS];
    return winston.createLogger({
        level,
        format: combine(
            timestamp(),
            splat(),
            printf(
                ({ level, message, timestamp }) =>
                    `${timestamp} ${level.toUpperCase()}: ${message}`,
            ),
        ),
        transports: [new winston.transports.Console({ stderrLevels })],
    });
}

export function isLevel(value: string): value is LevelT {
    return LEVELS.some((level) => level === value);
}

/**
 * Pick the log level from LOG_LEVEL, falling back to ‘debug’ when DEBUG is set.
 */
export function levelFromEnv(env: EnvMap): LevelT {
    const level = strVar(env, "LOG_LEVEL")?.toLowerCase();
    if (level && isLevel(level)) {
        return level;
    }
    return boolVar(env, "DEBUG", false) ? "debug" : "info";
}

/** Return the trimmed value of ‘name’, or undefined if absent or blank. */
export function strVar(env: EnvMap, name: string): string | undefined {
    const val = env[name]?.trim();
    return val ? val : undefined;
}

export function boolVar(env: EnvMap, name: string, defaultValue: boolean): boolean {
    const val = strVar(env, name);
    if (val === undefined) {
        return defaultValue;
    }
    return !["0", "no", "false", "off"].includes(val.toLowerCase());
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
