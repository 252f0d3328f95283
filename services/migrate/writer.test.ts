import { InMemoryAdmissionCollection } from "../../libs/store/in-memory";
import { SOURCE_TAG, type AdmissionDocument } from "../../libs/validation/dto";
import { ensureUniqueIndex } from "./indexes";
import { bulkWrite, insertOrUpsert, newWriteStats, toUpsertOp } from "./writer";

const T1 = new Date("2024-01-01T00:00:00.000Z");
const T2 = new Date("2024-06-01T00:00:00.000Z");

function admission(name: string, stamp = T1, extra: Partial<AdmissionDocument> = {}): AdmissionDocument {
    return {
        name,
        age: 40,
        gender: "female",
        blood_type: "o-",
        medical_condition: "Asthma",
        date_of_admission: new Date("2023-11-05T00:00:00.000Z"),
        doctor: "Dr. Y",
        hospital: "general",
        insurance_provider: "Acme",
        billing_amount: 250.75,
        room_number: "12",
        admission_type: "Elective",
        discharge_date: null,
        medication: null,
        test_results: "Normal",
        ingested_at: stamp,
        last_modified_at: stamp,
        source: SOURCE_TAG,
        ...extra,
    };
}

let error: jest.SpyInstance;

beforeEach(() => {
    error = jest.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
    error.mockRestore();
});

// INFO and ERROR lines both go through console.error.
function logged(event: string) {
    return error.mock.calls.map(c => JSON.parse(String(c[0]))).filter(line => line.event === event);
}

test("toUpsertOp sets ingested_at only on insert", () => {
    const doc = admission("ann");
    const { ingested_at, ...fields } = doc;
    const op = toUpsertOp(doc, T2);

    expect(op).toEqual({
        updateOne: {
            filter: {
                name: "ann",
                gender: "female",
                blood_type: "o-",
                date_of_admission: new Date("2023-11-05T00:00:00.000Z"),
                hospital: "general",
            },
            update: {
                $set: { ...fields, last_modified_at: T2 },
                $setOnInsert: { ingested_at },
            },
            upsert: true,
        },
    });
    expect(ingested_at).toEqual(T1);
});

test("regroups reader batches into write batches of batchSize", async () => {
    const coll = new InMemoryAdmissionCollection();
    const calls = jest.spyOn(coll, "bulkWrite");

    const written = await insertOrUpsert(coll, [[admission("a"), admission("b"), admission("c")], [admission("d"), admission("e")]], 2, true);

    expect(written).toBe(5);
    expect(calls.mock.calls.map(c => c[0].length)).toEqual([2, 2, 1]);
    expect(coll.docs).toHaveLength(5);
});

test("accepts an async batch sequence", async () => {
    const coll = new InMemoryAdmissionCollection();
    async function* batches() {
        yield [admission("a")];
        yield [admission("b")];
    }

    expect(await insertOrUpsert(coll, batches(), 10, true)).toBe(2);
});

test("re-running an upsert keeps ingested_at and advances last_modified_at", async () => {
    const coll = new InMemoryAdmissionCollection();
    await ensureUniqueIndex(coll);

    const first = await insertOrUpsert(coll, [[admission("a"), admission("b")]], 10, true, { now: () => T1 });
    const second = await insertOrUpsert(coll, [[admission("a", T2), admission("b", T2)]], 10, true, { now: () => T2 });

    expect(first).toBe(2);
    expect(second).toBe(2);
    expect(coll.docs).toHaveLength(2);
    for (const doc of coll.docs) {
        expect(doc.ingested_at).toEqual(T1);
        expect(doc.last_modified_at).toEqual(T2);
    }
});

test("upsert merges attribute changes into the existing document", async () => {
    const coll = new InMemoryAdmissionCollection();
    await insertOrUpsert(coll, [[admission("a")]], 10, true, { now: () => T1 });
    await insertOrUpsert(coll, [[admission("a", T2, { test_results: "Abnormal", age: 41 })]], 10, true, { now: () => T2 });

    expect(coll.docs).toHaveLength(1);
    expect(coll.docs[0]).toMatchObject({ test_results: "Abnormal", age: 41, ingested_at: T1, last_modified_at: T2 });
});

test("upsert batch with a failed operation counts zero for the whole batch", async () => {
    // Conservative undercount: the operations that did succeed are applied but not counted.
    const coll = new InMemoryAdmissionCollection();
    coll.rejectWhen = doc => doc.name === "bad";
    const stats = newWriteStats();

    const written = await insertOrUpsert(coll, [[admission("a"), admission("bad")], [admission("c")]], 2, true, { stats });

    expect(written).toBe(1);
    expect(coll.docs.map(d => d.name)).toEqual(["a", "c"]);
    expect(stats).toEqual({ batches: 2, failedBatches: 1 });
    expect(logged("bulk-write-error")).toHaveLength(1);
});

test("logs the write errors of a failed upsert batch", async () => {
    const coll = new InMemoryAdmissionCollection();
    coll.rejectWhen = doc => doc.name === "bad";

    expect(await bulkWrite(coll, [admission("ok"), admission("bad")], true)).toBe(0);

    const [line] = logged("bulk-write-error");
    expect(line).toMatchObject({
        level: "ERROR",
        event: "bulk-write-error",
        mode: "UPSERT",
        writeErrors: [{ index: 1, code: 121, message: "Document failed validation" }],
    });
});

test("plain insert returns the inserted count", async () => {
    const coll = new InMemoryAdmissionCollection();

    expect(await insertOrUpsert(coll, [[admission("a"), admission("b")]], 10, false)).toBe(2);
    expect(coll.docs.map(d => d._id)).toEqual([1, 2]);
});

test("plain insert reports failed documents and continues", async () => {
    const coll = new InMemoryAdmissionCollection();
    await ensureUniqueIndex(coll);
    await insertOrUpsert(coll, [[admission("a")]], 10, false);

    const written = await insertOrUpsert(coll, [[admission("a"), admission("b"), admission("c")], [admission("d")]], 3, false);

    // First batch: one duplicate key, reported as 1; second batch: 1 inserted.
    expect(written).toBe(2);
    expect(coll.docs.map(d => d.name)).toEqual(["a", "b", "c", "d"]);
    const [line] = logged("bulk-write-error");
    expect(line.mode).toBe("INSERT");
    expect(line.writeErrors).toEqual([{ index: 0, code: 11000, message: "E11000 duplicate key error index: uniq_admission" }]);
});

test("an empty batch is not sent", async () => {
    const coll = new InMemoryAdmissionCollection();
    const calls = jest.spyOn(coll, "bulkWrite");

    expect(await bulkWrite(coll, [], true)).toBe(0);
    expect(await insertOrUpsert(coll, [[], []], 10, true)).toBe(0);
    expect(calls).not.toHaveBeenCalled();
});

test("errors other than bulk write failures propagate", async () => {
    const coll = new InMemoryAdmissionCollection();
    jest.spyOn(coll, "bulkWrite").mockRejectedValue(new Error("connection reset"));

    await expect(insertOrUpsert(coll, [[admission("a")]], 10, true)).rejects.toThrow("connection reset");
});
