import { parseArgs } from "node:util";
import { CONNECTION_FLAGS, influxFromFlags } from "./backfill";
import type { InfluxSettings } from "./config";
import { CollectorError } from "./errors";
import { chunk, toNumber } from "./helpers";
import type { ReadingSink } from "./influx";
import type { Logger } from "./logger";
import type { SensorName, SensorReading } from "./types";

const SEED_BATCH_SIZE = 1000;

const MINUTE_MS = 60_000;

export interface SeedOptions {
    hours: number;
    seed: number;
    deviceId: string;
    influx: InfluxSettings;
}

export function parseSeedArgs(argv: string[]): SeedOptions {
    const { values } = parseArgs({
        args: argv,
        options: {
            ...CONNECTION_FLAGS,
            hours: { type: "string" },
            seed: { type: "string" },
        },
    });

    const hours = toNumber(values.hours ?? "24");
    if (hours === null || !Number.isInteger(hours) || hours <= 0) {
        throw new CollectorError({ code: "config.invalid", message: "--hours must be a positive integer" });
    }
    const seed = toNumber(values.seed ?? "42");
    if (seed === null || !Number.isInteger(seed)) {
        throw new CollectorError({ code: "config.invalid", message: "--seed must be an integer" });
    }

    return {
        hours,
        seed,
        deviceId: values["device-id"] ?? "19396",
        influx: influxFromFlags(values),
    };
}

// mulberry32, small and deterministic for a given seed
export function createRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

function createGauss(random: () => number): (mean: number, sigma: number) => number {
    return (mean, sigma) => {
        // Box-Muller; 1 - u keeps log() away from 0
        const u = 1 - random();
        const v = random();
        return mean + sigma * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
    };
}

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));
const round = (value: number, digits: number): number => Number(value.toFixed(digits));

export interface SeedWindow {
    start: Date;
    end: Date;
    deviceId: string;
    seed: number;
    intervalMinutes?: number;
}

/** Synthetic day/night patterns for the main environmental sensors, one sample per interval. */
export function generateSeedReadings(window: SeedWindow): SensorReading[] {
    const random = createRandom(window.seed);
    const gauss = createGauss(random);
    const stepMs = (window.intervalMinutes ?? 1) * MINUTE_MS;
    const readings: SensorReading[] = [];

    for (let t = window.start.getTime(); t <= window.end.getTime(); t += stepMs) {
        const current = new Date(t);
        const utcHour = current.getUTCHours();
        const hour = utcHour + current.getUTCMinutes() / 60;
        const dayFraction = hour / 24;
        const minutesElapsed = (t - window.start.getTime()) / MINUTE_MS;

        // temperature peaks mid-afternoon, humidity moves the other way
        const temperature = 23 + 5 * Math.sin(2 * Math.PI * (dayFraction - 0.25)) + gauss(0, 0.3);
        const humidity = clamp(75 - 1.5 * (temperature - 18) + gauss(0, 2), 25, 85);

        const daytime = utcHour >= 8 && utcHour < 22;
        const noise = clamp(daytime ? 45 + gauss(0, 5) : 32 + gauss(0, 3), 20, 80);

        const light =
            utcHour >= 6 && utcHour <= 20
                ? Math.max(0, 50_000 * Math.sin((Math.PI * (hour - 6)) / 14) + gauss(0, 500))
                : Math.max(0, gauss(0, 2));

        const pressure = 101.75 + 0.75 * Math.sin((2 * Math.PI * dayFraction) / 3 + gauss(0, 0.1));

        let uvA: number;
        let uvB: number;
        let uvC: number;
        if (utcHour >= 7 && utcHour <= 19) {
            const uv = Math.sin((Math.PI * (hour - 7)) / 12);
            uvA = Math.max(0, 8 * uv + gauss(0, 0.2));
            uvB = Math.max(0, 3 * uv + gauss(0, 0.1));
            uvC = Math.max(0, 0.5 * uv + gauss(0, 0.02));
        } else {
            uvA = Math.max(0, gauss(0.02, 0.01));
            uvB = Math.max(0, gauss(0.01, 0.005));
            uvC = Math.max(0, gauss(0.005, 0.002));
        }

        // particulate matter: low base with occasional spikes
        let pmBase = 5 + gauss(0, 2);
        if (random() < 0.05) pmBase += 15 + random() * 25;

        const battery = Math.max(90, 100 - minutesElapsed / 240 + gauss(0, 0.1));
        const rssi = -65 + gauss(0, 8);

        const values: [SensorName, number][] = [
            ["temperature", round(temperature, 2)],
            ["humidity", round(humidity, 2)],
            ["noise_dba", round(noise, 2)],
            ["light", round(light, 2)],
            ["pressure", round(pressure, 2)],
            ["uv_a", round(uvA, 4)],
            ["uv_b", round(uvB, 4)],
            ["uv_c", round(uvC, 4)],
            ["pm_1", round(Math.max(0, pmBase * 0.6 + gauss(0, 0.5)), 2)],
            ["pm_2_5", round(Math.max(0, pmBase + gauss(0, 1)), 2)],
            ["pm_4", round(Math.max(0, pmBase * 1.1 + gauss(0, 1)), 2)],
            ["pm_10", round(Math.max(0, pmBase * 1.2 + gauss(0, 1.5)), 2)],
            ["battery", round(battery, 1)],
            ["wifi_rssi", round(rssi, 1)],
        ];

        const timestamp = current.toISOString();
        for (const [sensorName, value] of values) {
            readings.push({
                deviceId: window.deviceId,
                sensorId: null,
                sensorName,
                value,
                unit: null,
                timestamp,
            });
        }
    }

    return readings;
}

export interface SeedDeps {
    sink: ReadingSink;
    log: Logger;
    now?: () => Date;
}

export async function runSeed(options: SeedOptions, deps: SeedDeps): Promise<number> {
    const end = new Date(deps.now ? deps.now().getTime() : Date.now());
    end.setUTCSeconds(0, 0);
    const start = new Date(end.getTime() - options.hours * 60 * MINUTE_MS);

    deps.log.info({ hours: options.hours, start, end }, "generating synthetic data");
    const readings = generateSeedReadings({ start, end, deviceId: options.deviceId, seed: options.seed });
    deps.log.info(`generated ${readings.length} readings`);

    let written = 0;
    for (const batch of chunk(readings, SEED_BATCH_SIZE)) {
        written += await deps.sink.write(batch);
        deps.log.info(`written ${written}/${readings.length} records`);
    }
    return written;
}
