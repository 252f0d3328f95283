import { createReadStream } from "fs";
import type { Readable } from "stream";
import { parse } from "csv-parse";

import { SchemaValidationError } from "../../errors";
import { rowToAdmission } from "../../mappers/admission";
import { log } from "../../obs/log";
import { EXPECTED_COLUMNS, type AdmissionDocument, type RawRecord } from "../../validation/dto";

export interface ReadStats {
    rowsRead: number;
    rowsSkipped: number;
}

export interface ReadOptions {
    /** Counters updated as chunks are transformed. */
    stats?: ReadStats;
    /** Clock used to stamp ingested_at / last_modified_at. */
    now?: () => Date;
}

export function newReadStats(): ReadStats {
    return { rowsRead: 0, rowsSkipped: 0 };
}

/**
 * Fails when an expected column is missing; extra columns are ignored with a warning.
 */
export function validateColumns(columns: readonly string[]): void {
    const expected: readonly string[] = EXPECTED_COLUMNS;
    const missing = expected.filter(c => !columns.includes(c));
    const extra = columns.filter(c => !expected.includes(c));
    if (missing.length > 0) {
        throw new SchemaValidationError(`Missing expected columns: ${missing.join(", ")}`, { missing });
    }
    if (extra.length > 0) {
        log.warn("extra-columns-ignored", { extra });
    }
}

function transformChunk(rows: RawRecord[], opts: ReadOptions): AdmissionDocument[] {
    const now = opts.now?.() ?? new Date();
    const docs: AdmissionDocument[] = [];
    for (const row of rows) {
        const doc = rowToAdmission(row, now);
        if (doc) docs.push(doc);
    }
    if (opts.stats) {
        opts.stats.rowsRead += rows.length;
        opts.stats.rowsSkipped += rows.length - docs.length;
    }
    return docs;
}

/**
 * Streams healthcare CSV text and yields the documents of each chunk of at most
 * `chunkSize` rows. Chunks whose rows were all skipped yield nothing.
 *
 * The header is validated once, before the first chunk (a header-only input is
 * validated too). Only one chunk is held in memory at a time.
 */
export async function* iterDocumentsFromStream(
    input: Readable,
    chunkSize: number,
    opts: ReadOptions = {},
): AsyncGenerator<AdmissionDocument[], void, undefined> {
    const header: string[] = [];
    const parser = input.pipe(parse({
        bom: true,
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
        columns: (names: string[]) => {
            header.push(...names);
            return names;
        },
    }));
    // pipe() does not forward source errors (e.g. ENOENT).
    input.once("error", err => parser.destroy(err));

    let validated = false;
    let chunk: RawRecord[] = [];
    try {
        for await (const record of parser) {
            if (!validated) {
                validateColumns(header);
                validated = true;
            }
            chunk.push(record);
            if (chunk.length >= chunkSize) {
                const docs = transformChunk(chunk, opts);
                chunk = [];
                if (docs.length > 0) yield docs;
            }
        }
        if (!validated) validateColumns(header);
        if (chunk.length > 0) {
            const docs = transformChunk(chunk, opts);
            if (docs.length > 0) yield docs;
        }
    } finally {
        parser.destroy();
        input.destroy();
    }
}

/** File variant of {@link iterDocumentsFromStream}; the file is opened on the first pull. */
export async function* iterDocuments(
    csvPath: string,
    chunkSize: number,
    opts: ReadOptions = {},
): AsyncGenerator<AdmissionDocument[], void, undefined> {
    yield* iterDocumentsFromStream(createReadStream(csvPath), chunkSize, opts);
}
