import "dotenv/config";
import { Collector } from "./collector";
import { loadConfig } from "./config";
import { buildHealthServer } from "./health";
import { checkInfluxHealth, connectInflux } from "./influx";
import { createLogger, type Logger } from "./logger";
import { SmartCitizenClient } from "./smartCitizen";

let logger: Logger = createLogger({ level: "info", pretty: false });

async function main(): Promise<void> {
    const config = loadConfig();
    logger = createLogger({ level: config.logLevel, pretty: config.logPretty });

    const influx = connectInflux(config.influx, logger.child({ module: "influx" }));
    const api = new SmartCitizenClient({
        apiBase: config.apiBase,
        timeoutMs: config.requestTimeoutMs,
    });

    const collector = new Collector({
        deviceId: config.deviceId,
        pollIntervalSeconds: config.pollIntervalSeconds,
        fetchDevice: () => api.getDevice(config.deviceId),
        sink: influx.sink,
        logger: logger.child({ module: "collector" }),
    });

    const server = buildHealthServer(() => collector.status(), logger.child({ module: "health" }));

    logger.info(
        { deviceId: config.deviceId, apiBase: config.apiBase, influx: config.influx.url },
        "sck collector starting"
    );
    await checkInfluxHealth(influx.health, logger.child({ module: "influx" }));
    await server.listen({ port: config.healthPort, host: "0.0.0.0" });

    collector.start();

    let stopping = false;
    const shutdown = (signal: NodeJS.Signals): void => {
        if (stopping) return;
        stopping = true;
        logger.info({ signal }, "initiating graceful shutdown");

        collector
            .stop()
            .then(() => influx.sink.close())
            .then(() => server.close())
            .then(() => {
                logger.info("shutdown complete");
                process.exit(0);
            })
            .catch((err) => {
                logger.error({ err }, "shutdown failed");
                process.exit(1);
            });
    };

    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
}

main().catch((err) => {
    logger.fatal({ err }, "collector failed to start");
    process.exit(1);
});
