import {
    MongoClient,
    type AnyBulkWriteOperation,
    type BulkWriteOptions,
    type BulkWriteResult,
    type CreateIndexesOptions,
    type IndexSpecification,
    type InsertManyResult,
} from "mongodb";

import type { AdmissionDocument } from "../validation/dto";

/**
 * The slice of a MongoDB collection the migration writes through. A driver
 * `Collection<AdmissionDocument>` satisfies it.
 */
export interface AdmissionCollection {
    insertMany(docs: AdmissionDocument[], options: BulkWriteOptions): Promise<Pick<InsertManyResult, "insertedCount">>;
    bulkWrite(
        operations: AnyBulkWriteOperation<AdmissionDocument>[],
        options: BulkWriteOptions,
    ): Promise<Pick<BulkWriteResult, "upsertedCount" | "modifiedCount">>;
    createIndex(indexSpec: IndexSpecification, options: CreateIndexesOptions): Promise<string>;
}

export interface StoreClient {
    collection(dbName: string, collectionName: string): AdmissionCollection;
    close(): Promise<void>;
}

export async function connectMongo(uri: string): Promise<StoreClient> {
    const client = await MongoClient.connect(uri);
    return {
        collection: (dbName, collectionName) => client.db(dbName).collection<AdmissionDocument>(collectionName),
        close: () => client.close(),
    };
}

/** Masks the password of a connection string for logging. */
export function redactUri(uri: string): string {
    return uri.replace(/\/\/([^:@/]+):([^@/]*)@/, "//$1:***@");
}
