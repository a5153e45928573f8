import { asCollectorError, type CollectorError } from "./errors";
import type { ReadingSink } from "./influx";
import type { Logger } from "./logger";
import { parseDevicePayload } from "./payload";
import type { CollectorStatus } from "./types";

const MAX_BACKOFF_SECONDS = 300;

export type TickOutcome =
    | { kind: "written"; points: number; readingAt: string | null }
    | { kind: "duplicate"; readingAt: string }
    | { kind: "empty"; readingAt: string | null }
    | { kind: "failed"; error: CollectorError };

export interface CollectorOptions {
    deviceId: string;
    pollIntervalSeconds: number;
    fetchDevice: () => Promise<unknown>;
    sink: ReadingSink;
    logger: Logger;
    now?: () => Date;
}

/**
 * Seconds to wait before the next tick. Consecutive failures back off
 * exponentially (capped), but never poll faster than the interval.
 */
export function nextDelaySeconds(consecutiveErrors: number, intervalSeconds: number): number {
    if (consecutiveErrors <= 0) return intervalSeconds;
    return Math.max(intervalSeconds, Math.min(2 ** consecutiveErrors, MAX_BACKOFF_SECONDS));
}

export class Collector {
    private readonly deviceId: string;
    private readonly intervalSeconds: number;
    private readonly fetchDevice: () => Promise<unknown>;
    private readonly sink: ReadingSink;
    private readonly log: Logger;
    private readonly now: () => Date;

    private running = false;
    // bumped on every start; a tick from an older run never reschedules
    private generation = 0;
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<void> | null = null;

    private lastReadingAt: string | null = null;
    private lastPollAt: string | null = null;
    private pollsTotal = 0;
    private consecutiveErrors = 0;

    constructor(options: CollectorOptions) {
        this.deviceId = options.deviceId;
        this.intervalSeconds = options.pollIntervalSeconds;
        this.fetchDevice = options.fetchDevice;
        this.sink = options.sink;
        this.log = options.logger;
        this.now = options.now ?? (() => new Date());
    }

    start(): void {
        if (this.running) return;
        this.running = true;
        this.generation += 1;
        this.log.info(
            { deviceId: this.deviceId, intervalSeconds: this.intervalSeconds },
            "collector starting"
        );
        this.schedule(0, this.generation);
    }

    async stop(): Promise<void> {
        this.running = false;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.inFlight) await this.inFlight;
        this.log.info("collector stopped");
    }

    status(): CollectorStatus {
        return {
            running: this.running,
            lastPollAt: this.lastPollAt,
            lastReadingAt: this.lastReadingAt,
            pollsTotal: this.pollsTotal,
            consecutiveErrors: this.consecutiveErrors,
        };
    }

    /** One fetch => transform => write cycle. Failures are logged, never thrown. */
    async pollOnce(): Promise<TickOutcome> {
        try {
            const body = await this.fetchDevice();
            const { readingAt, readings } = parseDevicePayload(body, this.deviceId);

            if (readingAt !== null && readingAt === this.lastReadingAt) {
                this.log.debug({ readingAt }, "skipping duplicate reading");
                this.consecutiveErrors = 0;
                return { kind: "duplicate", readingAt };
            }

            if (readings.length === 0) {
                this.log.warn({ readingAt }, "no valid sensor readings in API response");
                this.consecutiveErrors = 0;
                return { kind: "empty", readingAt };
            }

            const points = await this.sink.write(readings);

            this.lastReadingAt = readingAt;
            this.lastPollAt = this.now().toISOString();
            this.pollsTotal += 1;
            this.consecutiveErrors = 0;
            this.log.info({ points, readingAt, poll: this.pollsTotal }, "points written");
            return { kind: "written", points, readingAt };
        } catch (err) {
            const error = asCollectorError(err);
            this.consecutiveErrors += 1;
            this.log.error(
                { err: error, code: error.code, attempt: this.consecutiveErrors },
                "tick skipped"
            );
            return { kind: "failed", error };
        }
    }

    private schedule(delayMs: number, generation: number): void {
        this.timer = setTimeout(() => {
            this.timer = null;
            this.inFlight = this.tick(generation, this.inFlight);
        }, delayMs);
    }

    private async tick(generation: number, previous: Promise<void> | null): Promise<void> {
        // a restart can fire while the last run's tick is still out
        if (previous) await previous;
        if (!this.running || generation !== this.generation) return;

        const outcome = await this.pollOnce();
        if (!this.running || generation !== this.generation) return;

        const delaySeconds = nextDelaySeconds(this.consecutiveErrors, this.intervalSeconds);
        if (outcome.kind === "failed") {
            this.log.info({ delaySeconds }, "next attempt scheduled");
        }
        this.schedule(delaySeconds * 1000, generation);
    }
}
