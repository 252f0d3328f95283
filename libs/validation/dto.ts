import { z } from "zod";

/** Tag written to every document this pipeline produces. */
export const SOURCE_TAG = "csv_migration_v2";

/** Header of the healthcare CSV export (case-sensitive, any order). */
export const EXPECTED_COLUMNS = [
    "Name",
    "Age",
    "Gender",
    "Blood Type",
    "Medical Condition",
    "Date of Admission",
    "Doctor",
    "Hospital",
    "Insurance Provider",
    "Billing Amount",
    "Room Number",
    "Admission Type",
    "Discharge Date",
    "Medication",
    "Test Results",
] as const;

/** One parsed CSV row, cells still untyped. */
export type RawRecord = Record<string, unknown>;

const text = z.string().min(1);

export const AdmissionDocumentSchema = z.object({
    name: text,
    age: z.number().int().nullable(),
    gender: text,
    blood_type: text,
    medical_condition: text.nullable(),
    date_of_admission: z.date(),
    doctor: text.nullable(),
    hospital: text,
    insurance_provider: text.nullable(),
    billing_amount: z.number().finite().nullable(),
    room_number: text.nullable(),
    admission_type: text.nullable(),
    discharge_date: z.date().nullable(),
    medication: text.nullable(),
    test_results: text.nullable(),
    ingested_at: z.date(),
    last_modified_at: z.date(),
    source: z.literal(SOURCE_TAG),
});

export type AdmissionDocument = z.infer<typeof AdmissionDocumentSchema>;

/** Fields that identify one patient admission; unique together in the collection. */
export const NATURAL_KEY_FIELDS = ["name", "gender", "blood_type", "date_of_admission", "hospital"] as const;

type NaturalKey = Pick<AdmissionDocument, (typeof NATURAL_KEY_FIELDS)[number]>;

export function naturalKeyOf(doc: AdmissionDocument): NaturalKey {
    return {
        name: doc.name,
        gender: doc.gender,
        blood_type: doc.blood_type,
        date_of_admission: doc.date_of_admission,
        hospital: doc.hospital,
    };
}
