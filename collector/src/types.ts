// Shared types between the vendor client, Influx writer and the collector loop

export interface SensorReading {
    deviceId: string;
    sensorId: number | null;
    sensorName: string;
    value: number;
    unit: string | null;
    timestamp: string; // ISO timestamp, UTC
}

export interface DeviceSnapshot {
    // device-level "last reading" marker, used for duplicate detection
    readingAt: string | null;
    readings: SensorReading[];
}

// Smart Citizen sensor id => tag name. Ids are stable across firmware versions.
export const SENSOR_NAMES = {
    55: "temperature",
    56: "humidity",
    53: "noise_dba",
    14: "light",
    58: "pressure",
    214: "uv_a",
    215: "uv_b",
    216: "uv_c",
    193: "pm_1",
    194: "pm_2_5",
    195: "pm_4",
    196: "pm_10",
    197: "pn_0_5",
    198: "pn_1",
    199: "pn_2_5",
    200: "pn_4",
    201: "pn_10",
    202: "typical_particle_size",
    10: "battery",
    220: "wifi_rssi",
    221: "sd_card_present",
} as const satisfies Record<number, string>;

export type SensorName = (typeof SENSOR_NAMES)[keyof typeof SENSOR_NAMES];

const SENSOR_NAME_BY_ID = new Map<number, SensorName>(
    Object.entries(SENSOR_NAMES).map(([id, name]) => [Number(id), name])
);

export function sensorNameFor(sensorId: number): SensorName | null {
    return SENSOR_NAME_BY_ID.get(sensorId) ?? null;
}

export function mappedSensors(): { id: number; name: SensorName }[] {
    return [...SENSOR_NAME_BY_ID].map(([id, name]) => ({ id, name }));
}

export interface CollectorStatus {
    running: boolean;
    lastPollAt: string | null;
    lastReadingAt: string | null;
    pollsTotal: number;
    consecutiveErrors: number;
}
