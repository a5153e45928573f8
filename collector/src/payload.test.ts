import { describe, expect, it } from "vitest";
import deviceFixture from "./fixtures/smartCitizenDevice.json";
import { CollectorError } from "./errors";
import { parseDevicePayload, parseReadingsHistory } from "./payload";

const READINGS_LIST = {
    device: 19396,
    readings: [
        { sensor: "PM2.5", value: 12.3, unit: "ug/m3" },
        { sensor: "temperature", value: 21.5, unit: "C" },
    ],
    timestamp: "2024-01-01T00:00:00Z",
};

describe("parseDevicePayload", () => {
    it("normalizes a readings list", () => {
        expect(parseDevicePayload(READINGS_LIST, "19396")).toEqual({
            readingAt: "2024-01-01T00:00:00Z",
            readings: [
                {
                    deviceId: "19396",
                    sensorId: null,
                    sensorName: "PM2.5",
                    value: 12.3,
                    unit: "ug/m3",
                    timestamp: "2024-01-01T00:00:00Z",
                },
                {
                    deviceId: "19396",
                    sensorId: null,
                    sensorName: "temperature",
                    value: 21.5,
                    unit: "C",
                    timestamp: "2024-01-01T00:00:00Z",
                },
            ],
        });
    });

    it("drops list entries without a numeric value", () => {
        const snapshot = parseDevicePayload(
            {
                ...READINGS_LIST,
                readings: [
                    { sensor: "PM2.5", value: 12.3 },
                    { sensor: "co2", value: null },
                    { sensor: "noise", value: "n/a" },
                ],
            },
            "19396"
        );
        expect(snapshot.readings.map((r) => r.sensorName)).toEqual(["PM2.5"]);
        expect(snapshot.readings[0]?.unit).toBeNull();
    });

    it("keeps only mapped Smart Citizen sensors with a value", () => {
        const snapshot = parseDevicePayload(deviceFixture, "19396");

        expect(snapshot.readingAt).toBe("2026-02-04T17:00:47Z");
        expect(snapshot.readings.map((r) => [r.sensorId, r.sensorName, r.value])).toEqual([
            [10, "battery", 93],
            [14, "light", 412.5],
            [53, "noise_dba", 48.21],
            [55, "temperature", 21.34],
            [56, "humidity", 70.44],
            [194, "pm_2_5", 7],
            [220, "wifi_rssi", -67],
        ]);
    });

    it("ignores odd fields on sensors it does not map", () => {
        const snapshot = parseDevicePayload(
            {
                last_reading_at: "2026-02-04T17:00:47Z",
                data: {
                    sensors: [
                        { id: 55, value: 21.3 },
                        { id: 9999, name: null, value: 1 },
                        { id: "x", value: 2 },
                        { id: 56, value: 70, last_reading_at: "recently" },
                    ],
                },
            },
            "19396"
        );

        expect(snapshot).toEqual({
            readingAt: "2026-02-04T17:00:47Z",
            readings: [
                {
                    deviceId: "19396",
                    sensorId: 55,
                    sensorName: "temperature",
                    value: 21.3,
                    unit: null,
                    timestamp: "2026-02-04T17:00:47Z",
                },
            ],
        });
    });

    it("prefers the sensor timestamp over the device one", () => {
        const snapshot = parseDevicePayload(deviceFixture, "19396");
        const byName = new Map(snapshot.readings.map((r) => [r.sensorName, r.timestamp]));

        expect(byName.get("temperature")).toBe("2026-02-04T17:00:40Z");
        expect(byName.get("humidity")).toBe("2026-02-04T17:00:47Z");
    });

    it("skips sensors when no timestamp is known", () => {
        const snapshot = parseDevicePayload({ data: { sensors: [{ id: 55, value: 20 }] } }, "19396");
        expect(snapshot).toEqual({ readingAt: null, readings: [] });
    });

    it("treats a device without sensors as empty", () => {
        const snapshot = parseDevicePayload({ last_reading_at: "2026-01-01T00:00:00Z", data: {} }, "19396");
        expect(snapshot).toEqual({ readingAt: "2026-01-01T00:00:00Z", readings: [] });
    });

    it.each([
        ["an empty object", {}],
        ["a string", "<html>maintenance</html>"],
        ["null", null],
        ["a list with a bad timestamp", { device: 1, readings: [], timestamp: "yesterday" }],
    ])("rejects %s", (_label, body) => {
        expect(() => parseDevicePayload(body, "19396")).toThrowError(CollectorError);
        try {
            parseDevicePayload(body, "19396");
        } catch (err) {
            expect(err).toMatchObject({ code: "api.invalid_payload" });
        }
    });
});

describe("parseReadingsHistory", () => {
    const sensor = { deviceId: "19396", sensorId: 55, sensorName: "temperature" };

    it("converts rows and skips incomplete ones", () => {
        const readings = parseReadingsHistory(
            {
                readings: [
                    ["2025-02-01T00:00:00Z", 20.5],
                    ["2025-02-01T00:01:00Z", null],
                    ["2025-02-01T00:02:00Z"],
                    ["not a date", 19],
                    ["2025-02-01T00:03:00Z", 0],
                ],
            },
            sensor
        );

        expect(readings).toEqual([
            { ...sensor, value: 20.5, unit: null, timestamp: "2025-02-01T00:00:00Z" },
            { ...sensor, value: 0, unit: null, timestamp: "2025-02-01T00:03:00Z" },
        ]);
    });

    it("returns nothing when readings are missing", () => {
        expect(parseReadingsHistory({ device_id: 19396 }, sensor)).toEqual([]);
    });

    it("rejects a non-object body", () => {
        expect(() => parseReadingsHistory("oops", sensor)).toThrowError(/Unexpected readings payload/);
    });
});
