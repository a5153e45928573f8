import { parseArgs } from "node:util";
import type { InfluxSettings } from "./config";
import { CollectorError, asCollectorError } from "./errors";
import { chunk, normalizeDate, toNumber } from "./helpers";
import type { ReadingSink } from "./influx";
import type { Logger } from "./logger";
import { parseReadingsHistory } from "./payload";
import type { SmartCitizenClient } from "./smartCitizen";
import { mappedSensors, type SensorName, type SensorReading } from "./types";

const BACKFILL_BATCH_SIZE = 5000;

// diagnostic flag, no history worth importing
const SKIPPED_SENSORS: readonly SensorName[] = ["sd_card_present"];

export interface BackfillOptions {
    from: string;
    to: string;
    rollup: string;
    deviceId: string;
    apiBase: string;
    influx: InfluxSettings;
    delaySeconds: number;
}

export const CONNECTION_FLAGS = {
    "influxdb-url": { type: "string" },
    token: { type: "string" },
    org: { type: "string" },
    bucket: { type: "string" },
    "device-id": { type: "string" },
} as const;

export interface ConnectionFlags {
    "influxdb-url"?: string;
    token?: string;
    org?: string;
    bucket?: string;
    "device-id"?: string;
}

export function influxFromFlags(values: ConnectionFlags): InfluxSettings {
    return {
        url: values["influxdb-url"] ?? "http://localhost:8086",
        token: values.token ?? "my-super-secret-token",
        org: values.org ?? "sck",
        bucket: values.bucket ?? "sck_data",
    };
}

export function parseBackfillArgs(argv: string[]): BackfillOptions {
    const { values } = parseArgs({
        args: argv,
        options: {
            ...CONNECTION_FLAGS,
            from: { type: "string" },
            to: { type: "string" },
            rollup: { type: "string" },
            "api-base": { type: "string" },
            delay: { type: "string" },
        },
    });

    if (!values.from || !values.to) {
        throw new CollectorError({
            code: "config.invalid",
            message: "both --from and --to are required (YYYY-MM-DD or ISO 8601)",
        });
    }

    const delay = values.delay ?? "1";
    const delaySeconds = toNumber(delay);
    if (delaySeconds === null || delaySeconds < 0) {
        throw new CollectorError({
            code: "config.invalid",
            message: `--delay must be a non-negative number of seconds, got "${delay}"`,
        });
    }

    return {
        from: normalizeDate(values.from),
        to: normalizeDate(values.to, true),
        rollup: values.rollup ?? "1m",
        deviceId: values["device-id"] ?? "19396",
        apiBase: values["api-base"] ?? "https://api.smartcitizen.me/v0",
        influx: influxFromFlags(values),
        delaySeconds,
    };
}

export interface BackfillDeps {
    api: Pick<SmartCitizenClient, "getSensorReadings">;
    sink: ReadingSink;
    log: Logger;
    sleep: (ms: number) => Promise<void>;
}

export interface BackfillSummary {
    sensors: number;
    failedSensors: number;
    points: number;
}

/**
 * Import the history of every mapped sensor, one sensor at a time.
 * A failed fetch skips that sensor; a failed write aborts the run.
 */
export async function runBackfill(options: BackfillOptions, deps: BackfillDeps): Promise<BackfillSummary> {
    const sensors = mappedSensors().filter((sensor) => !SKIPPED_SENSORS.includes(sensor.name));
    const summary: BackfillSummary = { sensors: sensors.length, failedSensors: 0, points: 0 };

    deps.log.info(
        { deviceId: options.deviceId, from: options.from, to: options.to, rollup: options.rollup },
        `backfilling ${sensors.length} sensors`
    );

    for (const [index, sensor] of sensors.entries()) {
        const progress = `[${index + 1}/${sensors.length}]`;

        let readings: SensorReading[];
        try {
            const body = await deps.api.getSensorReadings({
                deviceId: options.deviceId,
                sensorId: sensor.id,
                rollup: options.rollup,
                from: options.from,
                to: options.to,
            });
            readings = parseReadingsHistory(body, {
                deviceId: options.deviceId,
                sensorId: sensor.id,
                sensorName: sensor.name,
            });
        } catch (err) {
            const error = asCollectorError(err);
            summary.failedSensors += 1;
            deps.log.error({ err: error, code: error.code }, `${progress} ${sensor.name}: fetch failed`);
            await deps.sleep(options.delaySeconds * 1000);
            continue;
        }

        let written = 0;
        for (const batch of chunk(readings, BACKFILL_BATCH_SIZE)) {
            written += await deps.sink.write(batch);
        }
        summary.points += written;
        deps.log.info(`${progress} ${sensor.name}: ${written > 0 ? `${written} points written` : "no data"}`);

        await deps.sleep(options.delaySeconds * 1000);
    }

    deps.log.info({ points: summary.points, failedSensors: summary.failedSensors }, "backfill complete");
    return summary;
}
