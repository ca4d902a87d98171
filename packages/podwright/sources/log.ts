import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    service: string;
};

type PrettyFactory = (options: Record<string, unknown>) => DestinationStream;

const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }

    const config = resolveLogConfig(overrides);
    rootLogger = buildLogger(config);
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    const trimmed = moduleName?.trim() ?? "";
    return logger.child({ module: trimmed.length > 0 ? trimmed : "unknown" });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isUnitTest = process.env.VITEST === "true" || process.env.VITEST === "1";
    const level =
        overrides.level ?? envValue("PODWRIGHT_LOG_LEVEL") ?? envValue("LOG_LEVEL") ?? (isUnitTest ? "silent" : "info");
    // Build output goes to stdout, so logs default to stderr.
    const destination = overrides.destination ?? envValue("PODWRIGHT_LOG_DEST") ?? envValue("LOG_DEST") ?? "stderr";
    let format =
        overrides.format ??
        parseFormat(envValue("PODWRIGHT_LOG_FORMAT")) ??
        parseFormat(envValue("LOG_FORMAT")) ??
        "pretty";

    if (destination !== "stdout" && destination !== "stderr") {
        format = "json";
    }

    return {
        level,
        format,
        destination,
        service: overrides.service ?? "podwright"
    };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { service: config.service },
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    const destination = resolveDestination(config.destination);

    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (prettyFactory) {
            return pino(
                options,
                prettyFactory({
                    colorize: !process.env.NO_COLOR,
                    translateTime: "HH:MM:ss",
                    ignore: "pid,hostname,service",
                    messageFormat: "[{module}] {msg}",
                    destination: config.destination === "stderr" ? 2 : 1
                })
            );
        }
    }

    return destination ? pino(options, destination) : pino(options);
}

function resolveDestination(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }
    if (destination === "stderr") {
        return pino.destination(2);
    }
    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function resolvePrettyFactory(): PrettyFactory | null {
    try {
        const loaded: unknown = nodeRequire("pino-pretty");
        return typeof loaded === "function" ? (options) => loaded(options) : null;
    } catch {
        return null;
    }
}

function parseFormat(value: string | null): LogFormat | null {
    const normalized = value?.trim().toLowerCase();
    if (normalized === "pretty" || normalized === "json") {
        return normalized;
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key];
    if (typeof value !== "string") {
        return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}
