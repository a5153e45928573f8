import { CollectorError } from "./errors";

export interface SmartCitizenClientOptions {
    apiBase: string;
    timeoutMs: number;
}

export interface SensorReadingsQuery {
    deviceId: string;
    sensorId: number;
    rollup: string;
    from: string;
    to: string;
}

type QueryParams = Record<string, string | number>;

export class SmartCitizenClient {
    private readonly apiBase: string;
    private readonly timeoutMs: number;

    constructor(options: SmartCitizenClientOptions) {
        this.apiBase = options.apiBase.replace(/\/+$/, "");
        this.timeoutMs = options.timeoutMs;
    }

    /** Latest state of one device, sensors included. */
    getDevice(deviceId: string): Promise<unknown> {
        return this.getJson(`/devices/${encodeURIComponent(deviceId)}`);
    }

    /** Historical readings of one sensor, averaged per rollup bucket. */
    getSensorReadings(query: SensorReadingsQuery): Promise<unknown> {
        return this.getJson(`/devices/${encodeURIComponent(query.deviceId)}/readings`, {
            sensor_id: query.sensorId,
            rollup: query.rollup,
            from: query.from,
            to: query.to,
            function: "avg",
        });
    }

    private async getJson(path: string, params: QueryParams = {}): Promise<unknown> {
        const url = new URL(`${this.apiBase}${path}`);
        for (const [key, value] of Object.entries(params)) {
            url.searchParams.set(key, String(value));
        }

        const controller = new AbortController();
        const handle = setTimeout(() => controller.abort(), this.timeoutMs);

        let status: number;
        let text: string;
        try {
            const response = await fetch(url.toString(), {
                headers: { Accept: "application/json" },
                signal: controller.signal,
            });
            status = response.status;
            text = await response.text();
        } catch (error) {
            if (error instanceof Error && error.name === "AbortError") {
                throw new CollectorError({
                    code: "api.timeout",
                    message: `GET ${path} timed out after ${this.timeoutMs} ms`,
                    cause: error,
                });
            }
            throw new CollectorError({
                code: "api.network_error",
                message: `GET ${path} failed: ${error instanceof Error ? error.message : String(error)}`,
                cause: error,
            });
        } finally {
            clearTimeout(handle);
        }

        if (status !== 200) {
            throw new CollectorError({
                code: "api.http_status",
                status,
                message: `GET ${path} failed with status ${status}`,
            });
        }

        try {
            const body: unknown = JSON.parse(text);
            return body;
        } catch (error) {
            throw new CollectorError({
                code: "api.invalid_json",
                status,
                message: `GET ${path} returned a body that is not JSON`,
                cause: error,
            });
        }
    }
}
