import { HttpError, InfluxDB, setLogger, type WriteApi, type WriteOptions } from "@influxdata/influxdb-client";
import { HealthAPI } from "@influxdata/influxdb-client-apis";
import type { InfluxSettings } from "./config";
import { CollectorError } from "./errors";
import { readingToPoint } from "./helpers";
import type { Logger } from "./logger";
import type { SensorReading } from "./types";

// every write is flushed explicitly; retries and buffering stay off
const WRITE_OPTIONS: Partial<WriteOptions> = {
    batchSize: 10_000,
    maxBufferLines: 50_000,
    flushInterval: 0,
    maxRetries: 0,
};

export type PointWriter = Pick<WriteApi, "writePoints" | "flush" | "close">;
export type HealthChecker = Pick<HealthAPI, "getHealth">;

export interface ReadingSink {
    /** Resolves to the number of points written. */
    write(readings: readonly SensorReading[]): Promise<number>;
}

export class InfluxSink implements ReadingSink {
    private readonly writeApi: PointWriter;
    private readonly log: Logger;

    constructor(writeApi: PointWriter, log: Logger) {
        this.writeApi = writeApi;
        this.log = log;
    }

    async write(readings: readonly SensorReading[]): Promise<number> {
        if (readings.length === 0) return 0;

        const points = readings.map(readingToPoint);
        this.writeApi.writePoints(points);
        try {
            await this.writeApi.flush();
        } catch (err) {
            throw new CollectorError({
                code: "influx.write_failed",
                status: err instanceof HttpError ? err.statusCode : undefined,
                message: `InfluxDB write of ${points.length} points failed`,
                cause: err,
            });
        }
        this.log.debug({ points: points.length }, "batch flushed");
        return points.length;
    }

    async close(): Promise<void> {
        await this.writeApi.close();
    }
}

/** Log the server's health; never throws. */
export async function checkInfluxHealth(health: HealthChecker, log: Logger): Promise<boolean> {
    try {
        const result = await health.getHealth();
        if (result.status === "pass") {
            log.info({ version: result.version }, "InfluxDB connection OK");
            return true;
        }
        log.warn({ message: result.message }, "InfluxDB health check did not pass");
        return false;
    } catch (err) {
        log.error({ err }, "cannot reach InfluxDB, will keep trying in the loop");
        return false;
    }
}

export interface InfluxConnection {
    sink: InfluxSink;
    health: HealthChecker;
}

/**
 * Routes the client's own diagnostics through pino. Its errors go to debug:
 * every failed write or health call is already reported by the caller.
 */
export function clientLogger(log: Logger): Parameters<typeof setLogger>[0] {
    return {
        error: (message, err) => log.debug({ err }, message),
        warn: (message, err) => log.warn({ err }, message),
    };
}

export function connectInflux(settings: InfluxSettings, log: Logger): InfluxConnection {
    setLogger(clientLogger(log));

    const client = new InfluxDB({ url: settings.url, token: settings.token });
    const writeApi = client.getWriteApi(settings.org, settings.bucket, "ms", WRITE_OPTIONS);
    log.info({ url: settings.url, org: settings.org, bucket: settings.bucket }, "write API initialized");

    return {
        sink: new InfluxSink(writeApi, log),
        health: new HealthAPI(client),
    };
}
