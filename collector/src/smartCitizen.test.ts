import { afterEach, describe, expect, it, vi } from "vitest";
import { SmartCitizenClient } from "./smartCitizen";

const API_BASE = "https://api.example.test/v0";

function jsonResponse(body: unknown): Response {
    return new Response(JSON.stringify(body), {
        status: 200,
        headers: { "content-type": "application/json" },
    });
}

function stubFetch(impl: (url: string, init?: { signal?: AbortSignal | null }) => Promise<Response>) {
    const fetchMock = vi.fn(impl);
    vi.stubGlobal("fetch", fetchMock);
    return fetchMock;
}

afterEach(() => {
    vi.unstubAllGlobals();
});

describe("SmartCitizenClient", () => {
    it("fetches and decodes the device document", async () => {
        const fetchMock = stubFetch(async () => jsonResponse({ id: 19396, data: { sensors: [] } }));
        const client = new SmartCitizenClient({ apiBase: `${API_BASE}/`, timeoutMs: 1000 });

        await expect(client.getDevice("19396")).resolves.toEqual({ id: 19396, data: { sensors: [] } });
        expect(fetchMock).toHaveBeenCalledTimes(1);
        expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.example.test/v0/devices/19396");
    });

    it("passes the history query as search params", async () => {
        const fetchMock = stubFetch(async () => jsonResponse({ readings: [] }));
        const client = new SmartCitizenClient({ apiBase: API_BASE, timeoutMs: 1000 });

        await client.getSensorReadings({
            deviceId: "19396",
            sensorId: 55,
            rollup: "1m",
            from: "2025-02-01T00:00:00Z",
            to: "2025-02-04T23:59:59Z",
        });

        expect(fetchMock.mock.calls[0]?.[0]).toBe(
            "https://api.example.test/v0/devices/19396/readings" +
                "?sensor_id=55&rollup=1m&from=2025-02-01T00%3A00%3A00Z&to=2025-02-04T23%3A59%3A59Z&function=avg"
        );
    });

    it("maps non-200 responses to api.http_status", async () => {
        stubFetch(async () => new Response("not found", { status: 404 }));
        const client = new SmartCitizenClient({ apiBase: API_BASE, timeoutMs: 1000 });

        await expect(client.getDevice("19396")).rejects.toMatchObject({
            code: "api.http_status",
            status: 404,
            message: "GET /devices/19396 failed with status 404",
        });
    });

    it("maps a non-JSON body to api.invalid_json", async () => {
        stubFetch(async () => new Response("<html>maintenance</html>", { status: 200 }));
        const client = new SmartCitizenClient({ apiBase: API_BASE, timeoutMs: 1000 });

        await expect(client.getDevice("19396")).rejects.toMatchObject({ code: "api.invalid_json", status: 200 });
    });

    it("maps network failures to api.network_error", async () => {
        stubFetch(async () => {
            throw new TypeError("fetch failed");
        });
        const client = new SmartCitizenClient({ apiBase: API_BASE, timeoutMs: 1000 });

        await expect(client.getDevice("19396")).rejects.toMatchObject({
            code: "api.network_error",
            message: "GET /devices/19396 failed: fetch failed",
        });
    });

    it("aborts slow requests", async () => {
        stubFetch(
            (_url, init) =>
                new Promise<Response>((_resolve, reject) => {
                    init?.signal?.addEventListener("abort", () => {
                        const aborted = new Error("This operation was aborted");
                        aborted.name = "AbortError";
                        reject(aborted);
                    });
                })
        );
        const client = new SmartCitizenClient({ apiBase: API_BASE, timeoutMs: 10 });

        await expect(client.getDevice("19396")).rejects.toMatchObject({
            code: "api.timeout",
            message: "GET /devices/19396 timed out after 10 ms",
        });
    });
});
