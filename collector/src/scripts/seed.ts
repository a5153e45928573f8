import { connectInflux } from "../influx";
import { createLogger } from "../logger";
import { parseSeedArgs, runSeed } from "../seed";

// Usage: npm run seed -- [--hours 24] [--seed 42] [--influxdb-url URL] [--token TOKEN]

const logger = createLogger({ level: "info", pretty: Boolean(process.stdout.isTTY) });

async function main(): Promise<void> {
    const options = parseSeedArgs(process.argv.slice(2));
    const influx = connectInflux(options.influx, logger.child({ module: "influx" }));

    try {
        await runSeed(options, { sink: influx.sink, log: logger.child({ module: "seed" }) });
    } finally {
        await influx.sink.close();
    }
    logger.info("done");
}

main().catch((err) => {
    logger.fatal({ err }, "seed failed");
    process.exit(1);
});
