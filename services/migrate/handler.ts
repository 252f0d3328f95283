import { iterDocuments, newReadStats } from "../../libs/adapters/csv/healthcare";
import { ConfigError } from "../../libs/errors";
import type { MigrationConfig } from "../../libs/config/config";
import { log } from "../../libs/obs/log";
import { metricCount, metricMs } from "../../libs/obs/metrics";
import { connectMongo, redactUri, type StoreClient } from "../../libs/store/mongo";

import { ensureUniqueIndex } from "./indexes";
import { insertOrUpsert, newWriteStats } from "./writer";

export const PREVIEW_LIMIT = 5;

export interface MigrationDeps {
    connect?: (uri: string) => Promise<StoreClient>;
    now?: () => Date;
}

export interface MigrationSummary {
    mode: "UPSERT" | "INSERT";
    dryRun: boolean;
    rowsRead: number;
    rowsSkipped: number;
    written: number;
    failedBatches: number;
}

/**
 * Runs the CSV → MongoDB migration described by `config`.
 *
 * In dry-run mode only the first batch is transformed and up to five documents
 * are printed to stdout as JSON; the store is never contacted. Missing columns,
 * index failures and connection errors reject; failed write batches do not.
 */
export async function main(config: MigrationConfig, deps: MigrationDeps = {}): Promise<MigrationSummary> {
    const t0 = Date.now();
    if (!config.csvPath) {
        throw new ConfigError("--csv or CSV_PATH env is required.");
    }

    const mode = config.upsert ? "UPSERT" : "INSERT";
    const readStats = newReadStats();
    const writeStats = newWriteStats();
    const summary = (written: number): MigrationSummary => ({
        mode,
        dryRun: config.dryRun,
        rowsRead: readStats.rowsRead,
        rowsSkipped: readStats.rowsSkipped,
        written,
        failedBatches: writeStats.failedBatches,
    });

    log.info("reading-csv", { path: config.csvPath, chunkSize: config.chunkSize });
    const batches = iterDocuments(config.csvPath, config.chunkSize, { stats: readStats, now: deps.now });

    if (config.dryRun) {
        const first = await batches.next();
        if (first.done) {
            log.warn("csv-empty", { path: config.csvPath });
            return summary(0);
        }
        await batches.return();
        const preview = first.value.slice(0, PREVIEW_LIMIT);
        log.info("dry-run-preview", { count: preview.length });
        console.log(JSON.stringify(preview, null, 2));
        return summary(0);
    }

    log.info("connecting", { uri: redactUri(config.mongoUri), db: config.dbName, collection: config.collectionName });
    const client = await (deps.connect ?? connectMongo)(config.mongoUri);

    let written: number;
    try {
        const collection = client.collection(config.dbName, config.collectionName);
        if (config.createIndexes) {
            await ensureUniqueIndex(collection);
        }
        log.info("mode", { mode });
        written = await insertOrUpsert(collection, batches, config.batchSize, config.upsert, {
            now: deps.now,
            stats: writeStats,
        });
    } finally {
        await client.close();
    }

    log.info("written", {
        written,
        db: config.dbName,
        collection: config.collectionName,
        rowsRead: readStats.rowsRead,
        rowsSkipped: readStats.rowsSkipped,
        failedBatches: writeStats.failedBatches,
    });

    const d = { service: "migrate", mode };
    await metricCount("rows_read_count", readStats.rowsRead, d);
    await metricCount("rows_skipped_count", readStats.rowsSkipped, d);
    await metricCount("documents_written_count", written, d);
    await metricCount("batch_error_count", writeStats.failedBatches, d);
    await metricMs("migrate_time_ms", Date.now() - t0, d);

    return summary(written);
}
