#!/usr/bin/env node
import "dotenv/config";

import { loadConfig } from "../../libs/config/config";
import { MigrationError, errorMessage } from "../../libs/errors";
import { log, setLogLevel } from "../../libs/obs/log";
import { main } from "../../services/migrate/handler";

async function run() {
    const config = loadConfig(process.argv.slice(2));
    setLogLevel(config.logLevel);
    await main(config);
}

run().catch((err: unknown) => {
    log.error("migration-failed", {
        error: errorMessage(err),
        details: err instanceof MigrationError ? err.details : undefined,
    });
    process.exitCode = err instanceof MigrationError ? err.exitCode : 1;
});
