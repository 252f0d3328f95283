import { coerceDate, coerceFloat, coerceInt, coerceString, normalizeLower } from "../coercion/coerce";
import { log } from "../obs/log";
import { AdmissionDocumentSchema, SOURCE_TAG, type AdmissionDocument, type RawRecord } from "../validation/dto";

/**
 * Maps one CSV row to an admission document.
 *
 * Returns `null` (and logs a warning) when any natural-key field is missing, so an
 * incomplete key never reaches the unique index. Other fields that fail to coerce
 * are stored as null.
 */
export function rowToAdmission(row: RawRecord, now: Date = new Date()): AdmissionDocument | null {
    const name = normalizeLower(row["Name"]);
    const gender = normalizeLower(row["Gender"]);
    const blood_type = normalizeLower(row["Blood Type"]);
    const hospital = normalizeLower(row["Hospital"]);
    const date_of_admission = coerceDate(row["Date of Admission"]);

    if (!name || !gender || !blood_type || !hospital || !date_of_admission) {
        log.warn("row-skipped-incomplete-key", {
            key: { name, gender, blood_type, date_of_admission, hospital },
        });
        return null;
    }

    return AdmissionDocumentSchema.parse({
        name,
        age: coerceInt(row["Age"]),
        gender,
        blood_type,
        medical_condition: coerceString(row["Medical Condition"]),
        date_of_admission,
        doctor: coerceString(row["Doctor"]),
        hospital,
        insurance_provider: coerceString(row["Insurance Provider"]),
        billing_amount: coerceFloat(row["Billing Amount"]),
        room_number: coerceString(row["Room Number"]),
        admission_type: coerceString(row["Admission Type"]),
        discharge_date: coerceDate(row["Discharge Date"]),
        medication: coerceString(row["Medication"]),
        test_results: coerceString(row["Test Results"]),
        ingested_at: now,
        last_modified_at: now,
        source: SOURCE_TAG,
    });
}
