import { z, type ZodError } from "zod";
import { CollectorError } from "./errors";
import { toNumber } from "./helpers";
import { sensorNameFor, type DeviceSnapshot, type SensorReading } from "./types";

const Timestamp = z.string().datetime({ offset: true });
const RawValue = z.union([z.number(), z.string()]).nullable().optional();

// { device, readings: [{ sensor, value, unit }], timestamp }
const ReadingsListSchema = z.object({
    device: z.union([z.number(), z.string()]),
    readings: z.array(
        z.object({
            sensor: z.string().min(1),
            value: RawValue,
            unit: z.string().nullable().optional(),
        })
    ),
    timestamp: Timestamp,
});

// GET /devices/{id} on the Smart Citizen API. Sensor entries are only
// checked once their id is known to be mapped.
const SmartCitizenDeviceSchema = z.object({
    id: z.number().optional(),
    last_reading_at: Timestamp.nullable().optional(),
    data: z.object({
        sensors: z.array(z.unknown()).default([]),
    }),
});

const SensorIdSchema = z.object({ id: z.number() });

const SensorEntrySchema = z.object({
    id: z.number(),
    unit: z.string().nullable().optional(),
    value: RawValue,
    last_reading_at: Timestamp.nullable().optional(),
});

// GET /devices/{id}/readings: [[iso, value | null], ...]
const ReadingsHistorySchema = z.object({
    readings: z.array(z.array(z.union([z.string(), z.number(), z.null()]))).default([]),
});

function describeIssues(error: ZodError): string {
    return error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
}

/**
 * Validate a device endpoint body and normalize it into readings.
 *
 * Readings are tagged with the configured device id, whatever id the
 * payload carries.
 */
export function parseDevicePayload(body: unknown, deviceId: string): DeviceSnapshot {
    const list = ReadingsListSchema.safeParse(body);
    if (list.success) {
        const { readings, timestamp } = list.data;
        const parsed: SensorReading[] = [];
        for (const entry of readings) {
            const value = toNumber(entry.value);
            if (value === null) continue;
            parsed.push({
                deviceId,
                sensorId: null,
                sensorName: entry.sensor,
                value,
                unit: entry.unit ?? null,
                timestamp,
            });
        }
        return { readingAt: timestamp, readings: parsed };
    }

    const device = SmartCitizenDeviceSchema.safeParse(body);
    if (!device.success) {
        throw new CollectorError({
            code: "api.invalid_payload",
            message: `Unexpected device payload (${describeIssues(device.error)})`,
            cause: device.error,
        });
    }

    const readingAt = device.data.last_reading_at ?? null;
    const readings: SensorReading[] = [];
    for (const entry of device.data.data.sensors) {
        const id = SensorIdSchema.safeParse(entry);
        if (!id.success) continue;
        const sensorName = sensorNameFor(id.data.id);
        if (sensorName === null) continue;

        const parsed = SensorEntrySchema.safeParse(entry);
        if (!parsed.success) continue;
        const sensor = parsed.data;

        const value = toNumber(sensor.value);
        if (value === null) continue;

        const timestamp = sensor.last_reading_at ?? readingAt;
        if (timestamp === null) continue;

        readings.push({
            deviceId,
            sensorId: sensor.id,
            sensorName,
            value,
            unit: sensor.unit ?? null,
            timestamp,
        });
    }

    return { readingAt, readings };
}

export interface HistorySensor {
    deviceId: string;
    sensorId: number;
    sensorName: string;
}

export function parseReadingsHistory(body: unknown, sensor: HistorySensor): SensorReading[] {
    const parsed = ReadingsHistorySchema.safeParse(body);
    if (!parsed.success) {
        throw new CollectorError({
            code: "api.invalid_payload",
            message: `Unexpected readings payload (${describeIssues(parsed.error)})`,
            cause: parsed.error,
        });
    }

    const readings: SensorReading[] = [];
    for (const row of parsed.data.readings) {
        if (row.length < 2) continue;
        const [timestamp, raw] = row;
        if (typeof timestamp !== "string" || !Timestamp.safeParse(timestamp).success) continue;

        const value = toNumber(raw);
        if (value === null) continue;

        readings.push({
            deviceId: sensor.deviceId,
            sensorId: sensor.sensorId,
            sensorName: sensor.sensorName,
            value,
            unit: null,
            timestamp,
        });
    }
    return readings;
}
