import { z } from "zod";
import { CollectorError } from "./errors";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
    SCK_DEVICE_ID: z.string().trim().min(1).default("19396"),
    SCK_API_BASE: z.string().url().default("https://api.smartcitizen.me/v0"),
    POLL_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    INFLUX_URL: z.string().url().default("http://influxdb:8086"),
    INFLUX_TOKEN: z.string().min(1).default("my-super-secret-token"),
    INFLUX_ORG: z.string().min(1).default("sck"),
    INFLUX_BUCKET: z.string().min(1).default("sck_data"),

    LOG_LEVEL: z
        .string()
        .transform((level) => level.trim().toLowerCase())
        .pipe(z.enum(LOG_LEVELS))
        .default("info"),
    LOG_PRETTY: z
        .string()
        .optional()
        .transform((value) => value === "1" || value?.toLowerCase() === "true"),

    HEALTH_PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
});

export interface InfluxSettings {
    url: string;
    token: string;
    org: string;
    bucket: string;
}

export interface CollectorConfig {
    deviceId: string;
    apiBase: string;
    pollIntervalSeconds: number;
    requestTimeoutMs: number;
    influx: InfluxSettings;
    logLevel: LogLevel;
    logPretty: boolean;
    healthPort: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CollectorConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new CollectorError({
            code: "config.invalid",
            message: `Invalid configuration (${details})`,
            cause: parsed.error,
        });
    }

    const vars = parsed.data;
    return {
        deviceId: vars.SCK_DEVICE_ID,
        apiBase: vars.SCK_API_BASE.replace(/\/+$/, ""),
        pollIntervalSeconds: vars.POLL_INTERVAL_SECONDS,
        requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
        influx: {
            url: vars.INFLUX_URL,
            token: vars.INFLUX_TOKEN,
            org: vars.INFLUX_ORG,
            bucket: vars.INFLUX_BUCKET,
        },
        logLevel: vars.LOG_LEVEL,
        logPretty: vars.LOG_PRETTY,
        healthPort: vars.HEALTH_PORT,
    };
}
