import { parseArgs } from "node:util";
import { z } from "zod";

import { ConfigError, errorMessage } from "../errors";
import { LOG_LEVELS } from "../obs/log";

const positiveInt = z.coerce.number().int().positive();

export const MigrationConfigSchema = z.object({
    csvPath: z.string().min(1).optional(),
    mongoUri: z.string().min(1),
    dbName: z.string().min(1),
    collectionName: z.string().min(1),
    batchSize: positiveInt,
    chunkSize: positiveInt,
    dryRun: z.boolean(),
    upsert: z.boolean(),
    createIndexes: z.boolean(),
    logLevel: z.string().transform(s => s.toUpperCase()).pipe(z.enum(LOG_LEVELS)),
});

export type MigrationConfig = z.infer<typeof MigrationConfigSchema>;

const OPTIONS = {
    csv: { type: "string" },
    "mongo-uri": { type: "string" },
    db: { type: "string" },
    collection: { type: "string" },
    "batch-size": { type: "string" },
    chunksize: { type: "string" },
    "dry-run": { type: "boolean" },
    "create-indexes": { type: "boolean" },
    upsert: { type: "boolean" },
    "no-upsert": { type: "boolean" },
    "log-level": { type: "string" },
} as const;

function parseFlags(argv: string[]) {
    try {
        return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }).values;
    } catch (err) {
        throw new ConfigError(errorMessage(err));
    }
}

/**
 * Builds the run configuration: command-line flags first, then environment
 * variables (CSV_PATH, MONGO_URI, MONGO_DB, MONGO_COLLECTION, BATCH_SIZE,
 * CHUNK_SIZE, LOG_LEVEL), then defaults.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): MigrationConfig {
    const flags = parseFlags(argv);
    if (flags.upsert && flags["no-upsert"]) {
        throw new ConfigError("--upsert and --no-upsert are mutually exclusive");
    }

    const result = MigrationConfigSchema.safeParse({
        csvPath: flags.csv ?? (env.CSV_PATH || undefined),
        mongoUri: flags["mongo-uri"] ?? env.MONGO_URI ?? "mongodb://localhost:27017",
        dbName: flags.db ?? env.MONGO_DB ?? "healthcare",
        collectionName: flags.collection ?? env.MONGO_COLLECTION ?? "patients",
        batchSize: flags["batch-size"] ?? env.BATCH_SIZE ?? 1000,
        chunkSize: flags.chunksize ?? env.CHUNK_SIZE ?? 5000,
        dryRun: flags["dry-run"] ?? false,
        upsert: !flags["no-upsert"],
        createIndexes: flags["create-indexes"] ?? false,
        logLevel: flags["log-level"] ?? env.LOG_LEVEL ?? "INFO",
    });
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
    }
    return result.data;
}
