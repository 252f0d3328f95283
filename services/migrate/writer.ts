import { MongoServerError, type AnyBulkWriteOperation } from "mongodb";

import { log } from "../../libs/obs/log";
import type { AdmissionCollection } from "../../libs/store/mongo";
import { naturalKeyOf, type AdmissionDocument } from "../../libs/validation/dto";

export interface WriteStats {
    batches: number;
    failedBatches: number;
}

export interface WriteOptions {
    /** Clock for last_modified_at on upsert. */
    now?: () => Date;
    stats?: WriteStats;
}

export function newWriteStats(): WriteStats {
    return { batches: 0, failedBatches: 0 };
}

type WriteErrorDetail = { index: number | null; code: number | null; message: string };

// Unordered bulk failures carry per-document writeErrors; other server errors do not
// and are left to propagate.
function isBulkWriteError(err: unknown): err is MongoServerError {
    return err instanceof MongoServerError && "writeErrors" in err;
}

function describeWriteErrors(err: MongoServerError): WriteErrorDetail[] {
    const raw: unknown = err.writeErrors;
    const list: unknown[] = Array.isArray(raw) ? raw : [raw];
    return list.map(e => {
        const target = typeof e === "object" && e !== null ? e : {};
        const index: unknown = Reflect.get(target, "index");
        const code: unknown = Reflect.get(target, "code");
        const message: unknown = Reflect.get(target, "errmsg");
        return {
            index: typeof index === "number" ? index : null,
            code: typeof code === "number" ? code : null,
            message: typeof message === "string" ? message : String(message ?? ""),
        };
    });
}

export function toUpsertOp(doc: AdmissionDocument, writtenAt: Date): AnyBulkWriteOperation<AdmissionDocument> {
    const { ingested_at, ...fields } = doc;
    return {
        updateOne: {
            filter: naturalKeyOf(doc),
            update: {
                $set: { ...fields, last_modified_at: writtenAt },
                $setOnInsert: { ingested_at },
            },
            upsert: true,
        },
    };
}

/**
 * Writes one batch and returns its count.
 *
 * Insert mode returns the number of inserted documents, or on a partial failure
 * the number of documents that failed (a lower bound on failures). Upsert mode
 * returns upserted + modified, or 0 when any operation of the batch failed. Bulk
 * failures are logged and swallowed; other driver errors propagate.
 */
export async function bulkWrite(
    collection: AdmissionCollection,
    docs: AdmissionDocument[],
    upsert: boolean,
    opts: WriteOptions = {},
): Promise<number> {
    if (docs.length === 0) return 0;
    if (opts.stats) opts.stats.batches++;

    if (!upsert) {
        try {
            const res = await collection.insertMany(docs, { ordered: false });
            return res.insertedCount;
        } catch (err) {
            if (!isBulkWriteError(err)) throw err;
            if (opts.stats) opts.stats.failedBatches++;
            const writeErrors = describeWriteErrors(err);
            log.error("bulk-write-error", { mode: "INSERT", message: err.message, writeErrors });
            return writeErrors.length;
        }
    }

    const writtenAt = opts.now?.() ?? new Date();
    const ops = docs.map(d => toUpsertOp(d, writtenAt));
    try {
        const res = await collection.bulkWrite(ops, { ordered: false });
        return res.upsertedCount + res.modifiedCount;
    } catch (err) {
        if (!isBulkWriteError(err)) throw err;
        if (opts.stats) opts.stats.failedBatches++;
        log.error("bulk-write-error", { mode: "UPSERT", message: err.message, writeErrors: describeWriteErrors(err) });
        return 0;
    }
}

/**
 * Regroups the reader's batches into write batches of `batchSize` and writes them
 * one at a time. Returns the sum of the per-batch counts.
 */
export async function insertOrUpsert(
    collection: AdmissionCollection,
    batches: AsyncIterable<AdmissionDocument[]> | Iterable<AdmissionDocument[]>,
    batchSize: number,
    upsert: boolean,
    opts: WriteOptions = {},
): Promise<number> {
    let total = 0;
    let buffer: AdmissionDocument[] = [];

    const flush = async () => {
        const written = await bulkWrite(collection, buffer, upsert, opts);
        log.info("batch-written", { size: buffer.length, written });
        total += written;
        buffer = [];
    };

    for await (const docs of batches) {
        for (const doc of docs) {
            buffer.push(doc);
            if (buffer.length >= batchSize) await flush();
        }
    }
    if (buffer.length > 0) await flush();
    return total;
}
