import { setTimeout as sleep } from "node:timers/promises";
import { parseBackfillArgs, runBackfill } from "../backfill";
import { connectInflux } from "../influx";
import { createLogger } from "../logger";
import { SmartCitizenClient } from "../smartCitizen";

// Usage:
//   npm run backfill -- --from 2025-02-01 --to 2025-02-04 [--rollup 5m]
//   npm run backfill -- --influxdb-url http://localhost:8086 --token <TOKEN> --from 2025-01-01 --to 2025-02-01

const logger = createLogger({ level: "info", pretty: Boolean(process.stdout.isTTY) });

async function main(): Promise<void> {
    const options = parseBackfillArgs(process.argv.slice(2));
    const influx = connectInflux(options.influx, logger.child({ module: "influx" }));
    const api = new SmartCitizenClient({ apiBase: options.apiBase, timeoutMs: 60_000 });

    try {
        await runBackfill(options, {
            api,
            sink: influx.sink,
            log: logger.child({ module: "backfill" }),
            sleep: (ms) => sleep(ms),
        });
    } finally {
        await influx.sink.close();
    }
}

main().catch((err) => {
    logger.fatal({ err }, "backfill failed");
    process.exit(1);
});
