import {
    MongoServerError,
    type AnyBulkWriteOperation,
    type BulkWriteOptions,
    type CreateIndexesOptions,
    type Document,
    type IndexSpecification,
} from "mongodb";

import { NATURAL_KEY_FIELDS, type AdmissionDocument } from "../validation/dto";
import type { AdmissionCollection } from "./mongo";

type Rejection = { code: number; errmsg: string };
type WriteErrorDoc = Rejection & { index: number };

function sameValue(a: unknown, b: unknown): boolean {
    if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
    return a === b;
}

function sameKey(a: Document, b: Document): boolean {
    return NATURAL_KEY_FIELDS.every(f => sameValue(a[f], b[f]));
}

function bulkError(writeErrors: WriteErrorDoc[]): MongoServerError {
    return new MongoServerError({
        message: `${writeErrors.length} write error(s)`,
        code: writeErrors[0].code,
        writeErrors,
    });
}

/**
 * In-process stand-in for an admission collection, for tests. Keeps documents in
 * an array, honours a unique natural-key index once created, and reports
 * unordered bulk failures the way the driver does (a server error carrying
 * `writeErrors`, after the other operations were applied).
 */
export class InMemoryAdmissionCollection implements AdmissionCollection {
    readonly docs: Document[] = [];
    readonly indexes = new Map<string, { unique: boolean }>();
    /** Documents matching this predicate fail to write with code 121. */
    rejectWhen?: (doc: Document) => boolean;
    private nextId = 1;

    private uniqueKey(): boolean {
        return [...this.indexes.values()].some(i => i.unique);
    }

    private rejection(doc: Document, except?: Document): Rejection | null {
        if (this.rejectWhen?.(doc)) {
            return { code: 121, errmsg: "Document failed validation" };
        }
        if (this.uniqueKey() && this.docs.some(d => d !== except && sameKey(d, doc))) {
            return { code: 11000, errmsg: "E11000 duplicate key error index: uniq_admission" };
        }
        return null;
    }

    async insertMany(docs: AdmissionDocument[], options: BulkWriteOptions): Promise<{ insertedCount: number }> {
        const writeErrors: WriteErrorDoc[] = [];
        let insertedCount = 0;
        for (const [index, doc] of docs.entries()) {
            const problem = this.rejection(doc);
            if (problem) {
                writeErrors.push({ index, ...problem });
                if (options.ordered !== false) break;
                continue;
            }
            this.docs.push({ ...doc, _id: this.nextId++ });
            insertedCount++;
        }
        if (writeErrors.length > 0) throw bulkError(writeErrors);
        return { insertedCount };
    }

    async bulkWrite(
        operations: AnyBulkWriteOperation<AdmissionDocument>[],
        options: BulkWriteOptions,
    ): Promise<{ upsertedCount: number; modifiedCount: number }> {
        const writeErrors: WriteErrorDoc[] = [];
        let upsertedCount = 0;
        let modifiedCount = 0;
        for (const [index, op] of operations.entries()) {
            if (!("updateOne" in op) || Array.isArray(op.updateOne.update)) {
                throw new Error("InMemoryAdmissionCollection only supports updateOne with an update document");
            }
            const filter: Document = op.updateOne.filter;
            const set: Document = op.updateOne.update.$set ?? {};
            const setOnInsert: Document = op.updateOne.update.$setOnInsert ?? {};
            const existing = this.docs.find(d => Object.entries(filter).every(([k, v]) => sameValue(d[k], v)));

            const candidate = existing ? { ...existing, ...set } : { ...filter, ...set, ...setOnInsert };
            const problem = this.rejection(candidate, existing);
            if (problem) {
                writeErrors.push({ index, ...problem });
                if (options.ordered !== false) break;
                continue;
            }
            if (existing) {
                if (Object.keys(set).some(k => !sameValue(existing[k], set[k]))) modifiedCount++;
                Object.assign(existing, set);
            } else if (op.updateOne.upsert) {
                this.docs.push({ ...candidate, _id: this.nextId++ });
                upsertedCount++;
            }
        }
        if (writeErrors.length > 0) throw bulkError(writeErrors);
        return { upsertedCount, modifiedCount };
    }

    async createIndex(_indexSpec: IndexSpecification, options: CreateIndexesOptions): Promise<string> {
        const name = options.name ?? "natural_key";
        const unique = options.unique ?? false;
        const current = this.indexes.get(name);
        if (current) {
            if (current.unique !== unique) {
                throw new MongoServerError({ message: `Index already exists with different options: ${name}`, code: 85 });
            }
            return name;
        }
        if (unique && this.docs.some((d, i) => this.docs.findIndex(o => sameKey(o, d)) !== i)) {
            throw new MongoServerError({ message: `E11000 duplicate key error index: ${name}`, code: 11000 });
        }
        this.indexes.set(name, { unique });
        return name;
    }
}
