import { isValid, parse } from "date-fns";

/**
 * Cell coercion for the healthcare CSV.
 *
 * Every function here returns `null` for missing or malformed input instead of
 * throwing: a bad cell nulls one field, it never stops the row.
 */

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

// "2022-02-01", "2022-02-01T10:00:00+02:00": keep the calendar date as written.
const ISO_DATE_PREFIX = /^(\d{4}-\d{1,2}-\d{1,2})(?:[T ].*)?$/;

const YEAR_FIRST = /^\d{4}\D/;
const YEAR_FIRST_FORMATS = ["yyyy-MM-dd", "yyyy/MM/dd", "yyyy.MM.dd"];

// Day-first wins for ambiguous numeric dates. Two-digit year formats come first:
// "yyyy" would otherwise read "22" as the year 22.
const DAY_FIRST_FORMATS = [
    "dd/MM/yy",
    "dd-MM-yy",
    "dd.MM.yy",
    "dd/MM/yyyy",
    "dd-MM-yyyy",
    "dd.MM.yyyy",
    "dd/MM/yyyy HH:mm",
    "dd/MM/yyyy HH:mm:ss",
    "dd-MM-yyyy HH:mm",
    "dd-MM-yyyy HH:mm:ss",
    "dd.MM.yyyy HH:mm",
    "dd.MM.yyyy HH:mm:ss",
    "dd MMM yyyy",
    "dd MMMM yyyy",
    "dd-MMM-yyyy",
    "MMM dd, yyyy",
    "MMMM dd, yyyy",
];

// Tried only when no day-first reading exists, e.g. "12/25/2022".
const MONTH_FIRST_FORMATS = DAY_FIRST_FORMATS
    .filter(f => /^dd[/.-]MM(?!M)/.test(f))
    .map(f => f.replace(/^dd([/.-])MM/, "MM$1dd"));

// Cell texts read as missing, same set pandas uses by default. Case-sensitive.
const MISSING_MARKERS = new Set([
    "#N/A", "#N/A N/A", "#NA", "-1.#IND", "-1.#QNAN", "-NaN", "-nan", "1.#IND", "1.#QNAN",
    "<NA>", "N/A", "NA", "NULL", "NaN", "None", "n/a", "nan", "null",
]);

function isMissing(v: unknown): v is null | undefined {
    return v === null || v === undefined || (typeof v === "number" && Number.isNaN(v));
}

function toUtcMidnight(year: number, monthIndex: number, day: number): Date {
    // Date.UTC would map years 0-99 to 1900-1999.
    const d = new Date(0);
    d.setUTCFullYear(year, monthIndex, day);
    return d;
}

export function coerceString(v: unknown): string | null {
    if (isMissing(v)) return null;
    if (v instanceof Date) return isValid(v) ? v.toISOString() : null;
    const s = String(v).trim();
    return s !== "" && !MISSING_MARKERS.has(s) ? s : null;
}

export function normalizeLower(v: unknown): string | null {
    const s = coerceString(v);
    return s ? s.toLowerCase() : null;
}

function parseDecimal(v: unknown, stripCommas: boolean): number | null {
    if (typeof v === "number") return Number.isFinite(v) ? v : null;
    let s = coerceString(v);
    if (s === null) return null;
    if (stripCommas) s = s.replace(/,/g, "");
    if (!DECIMAL.test(s)) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
}

/** "42", "42.9" and "4.2e1" all give 42. */
export function coerceInt(v: unknown): number | null {
    const n = parseDecimal(v, false);
    return n === null ? null : Math.trunc(n);
}

/** Thousands separators are dropped: "1,200.50" gives 1200.5. */
export function coerceFloat(v: unknown): number | null {
    return parseDecimal(v, true);
}

/**
 * Parses a date, day-first when ambiguous ("03/04/2021" is 3 April 2021) and
 * month-first only when the day-first reading is impossible ("12/25/2022"), then
 * truncates it to UTC midnight of that calendar day. Time of day and any offset
 * are discarded.
 */
export function coerceDate(v: unknown): Date | null {
    if (v instanceof Date) {
        return isValid(v) ? toUtcMidnight(v.getUTCFullYear(), v.getUTCMonth(), v.getUTCDate()) : null;
    }
    let s = coerceString(v);
    if (s === null) return null;

    const iso = ISO_DATE_PREFIX.exec(s);
    if (iso) s = iso[1];

    const reference = new Date();
    const formats = YEAR_FIRST.test(s) ? YEAR_FIRST_FORMATS : [...DAY_FIRST_FORMATS, ...MONTH_FIRST_FORMATS];
    for (const format of formats) {
        const parsed = parse(s, format, reference);
        if (isValid(parsed)) {
            return toUtcMidnight(parsed.getFullYear(), parsed.getMonth(), parsed.getDate());
        }
    }
    return null;
}
