import { Point } from "@influxdata/influxdb-client";
import type { SensorReading } from "../types";

const MEASUREMENT = "sck_sensors";

// normalize to number | null
export function toNumber(value: unknown): number | null {
    if (value === null || value === undefined || value === "") return null;
    if (typeof value !== "number" && typeof value !== "string") return null;
    const num = Number(value);
    return Number.isFinite(num) ? num : null;
}

export function readingToPoint(reading: SensorReading): Point {
    return new Point(MEASUREMENT)
        .tag("device_id", reading.deviceId)
        .tag("sensor_name", reading.sensorName)
        .floatField("value", reading.value)
        .timestamp(new Date(reading.timestamp));
}

// "2025-02-01" => start (or end) of that day in UTC, full ISO strings pass through
export function normalizeDate(date: string, endOfDay = false): string {
    if (date.includes("T")) return date;
    return endOfDay ? `${date}T23:59:59Z` : `${date}T00:00:00Z`;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        batches.push(items.slice(i, i + size));
    }
    return batches;
}
