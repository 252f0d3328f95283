import type { IndexSpecification } from "mongodb";

import { IndexProvisioningError, errorMessage } from "../../libs/errors";
import { log } from "../../libs/obs/log";
import type { AdmissionCollection } from "../../libs/store/mongo";

export const NATURAL_KEY_INDEX_NAME = "uniq_admission";

export const NATURAL_KEY_INDEX: IndexSpecification = {
    name: 1,
    gender: 1,
    blood_type: 1,
    date_of_admission: 1,
    hospital: 1,
};

/**
 * Creates the unique compound index on the natural key. Re-creating an identical
 * index is a no-op on the server; anything else (duplicate keys already stored,
 * a conflicting index under the same name) aborts the run before any write.
 */
export async function ensureUniqueIndex(collection: AdmissionCollection): Promise<string> {
    try {
        const name = await collection.createIndex(NATURAL_KEY_INDEX, { unique: true, name: NATURAL_KEY_INDEX_NAME });
        log.info("index-ensured", { index: name });
        return name;
    } catch (err) {
        log.error("index-create-failed", { index: NATURAL_KEY_INDEX_NAME, error: errorMessage(err) });
        throw new IndexProvisioningError(`Failed to create index ${NATURAL_KEY_INDEX_NAME}: ${errorMessage(err)}`, err);
    }
}
