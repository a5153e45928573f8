import Fastify from "fastify";
import type { Logger } from "./logger";
import type { CollectorStatus } from "./types";

export function buildHealthServer(getStatus: () => CollectorStatus, logger: Logger) {
    const server = Fastify({
        loggerInstance: logger,
        disableRequestLogging: true,
    });

    server.get("/health", async () => {
        const status = getStatus();
        return {
            status: "ok",
            last_poll: status.lastPollAt,
            polls_total: status.pollsTotal,
            last_reading_at: status.lastReadingAt,
            consecutive_errors: status.consecutiveErrors,
        };
    });

    return server;
}
