/**
 * Field Normalizers
 *
 * Pure, total functions that coerce one raw metadata cell into the canonical
 * form the sequence archive expects. Every normalizer is idempotent once its
 * input is canonical. Values a normalizer cannot recognize are returned
 * unchanged; reporting them is the table validator's job.
 */

import { isVocabularyField, lookupLayoutSynonym, lookupSampleSource, SRA_VOCABULARIES, Vocabulary } from './vocabularies';

export type FieldNormalizer = (raw: string) => string;

// ===== COLLECTION DATE =====

export const DATE_SENTINELS = ['not collected', 'not provided', 'unknown'] as const;

export const EMPTY_DATE_VALUE = 'not collected';

const SENTINEL_SET: ReadonlySet<string> = new Set<string>(DATE_SENTINELS);

const MONTHS: Record<string, string> = {
    Jan: '01', Feb: '02', Mar: '03', Apr: '04',
    May: '05', Jun: '06', Jul: '07', Aug: '08',
    Sep: '09', Oct: '10', Nov: '11', Dec: '12',
};

const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_YEAR_MONTH = /^\d{4}-\d{2}$/;
const ISO_YEAR = /^\d{4}$/;
const AMBIGUOUS_DMY = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const DAY_MON_YEAR = /^(\d{1,2})[-/\s]([A-Za-z]{3})[-/\s](\d{4})$/;
const MON_YEAR = /^([A-Za-z]{3})[-/\s](\d{4})$/;
const YEAR_MONTH_DAY = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/;

export type DateStatus =
    | 'canonical'     // already ISO, returned as-is
    | 'sentinel'      // not collected / not provided / unknown
    | 'empty'         // blank input mapped to "not collected"
    | 'reformatted'   // recognized non-canonical format, converted
    | 'unrecognized'; // returned unchanged

export interface DateParseResult {
    value: string;
    status: DateStatus;
}

function isSentinel(value: string): boolean {
    return SENTINEL_SET.has(value.toLowerCase());
}

function isIsoShape(value: string): boolean {
    return ISO_DATETIME.test(value) || ISO_DATE.test(value) || ISO_YEAR_MONTH.test(value) || ISO_YEAR.test(value);
}

function monthFromAbbreviation(abbr: string): string | undefined {
    const key = abbr.charAt(0).toUpperCase() + abbr.slice(1).toLowerCase();
    return MONTHS[key];
}

function pad2(value: string): string {
    return value.padStart(2, '0');
}

function parseAmbiguousSlashDate(first: string, second: string, year: string): string {
    const firstNum = Number.parseInt(first, 10);
    const secondNum = Number.parseInt(second, 10);
    if (Number.isNaN(firstNum) || Number.isNaN(secondNum)) {
        return `${year}-01-01`;
    }

    // month/day/year unless the first number cannot be a month
    let month = firstNum > 12 ? second : first;
    let day = firstNum > 12 ? first : second;

    const monthNum = Number.parseInt(month, 10);
    const dayNum = Number.parseInt(day, 10);
    if (monthNum < 1 || monthNum > 12) month = '01';
    if (dayNum < 1 || dayNum > 31) day = '01';

    return `${year}-${pad2(month)}-${pad2(day)}`;
}

/**
 * Parse a collection date, reporting how the value was handled.
 */
export function parseCollectionDate(raw: string | null | undefined): DateParseResult {
    const value = (raw ?? '').trim();

    if (value === '') {
        return { value: EMPTY_DATE_VALUE, status: 'empty' };
    }
    if (isSentinel(value)) {
        return { value, status: 'sentinel' };
    }
    if (isIsoShape(value)) {
        return { value, status: 'canonical' };
    }

    // Range of two dates, unless the whole value is a single D/D/YYYY date
    if (value.includes('/') && !AMBIGUOUS_DMY.test(value)) {
        const parts = value.split('/');
        if (parts.length === 2 && parts[0].trim() !== '' && parts[1].trim() !== '') {
            const start = parseCollectionDate(parts[0]);
            const end = parseCollectionDate(parts[1]);
            if (start.status !== 'unrecognized' && end.status !== 'unrecognized') {
                const joined = `${start.value}/${end.value}`;
                const unchanged = start.status !== 'reformatted' && end.status !== 'reformatted' && joined === value;
                return { value: joined, status: unchanged ? 'canonical' : 'reformatted' };
            }
        }
    }

    const ambiguous = AMBIGUOUS_DMY.exec(value);
    if (ambiguous) {
        const [, first, second, year] = ambiguous;
        return { value: parseAmbiguousSlashDate(first, second, year), status: 'reformatted' };
    }

    const dayMonYear = DAY_MON_YEAR.exec(value);
    if (dayMonYear) {
        const [, day, mon, year] = dayMonYear;
        const month = monthFromAbbreviation(mon);
        if (month) {
            return { value: `${year}-${month}-${pad2(day)}`, status: 'reformatted' };
        }
    }

    const monYear = MON_YEAR.exec(value);
    if (monYear) {
        const [, mon, year] = monYear;
        const month = monthFromAbbreviation(mon);
        if (month) {
            return { value: `${year}-${month}`, status: 'reformatted' };
        }
    }

    const ymd = YEAR_MONTH_DAY.exec(value);
    if (ymd) {
        const [, year, month, day] = ymd;
        return { value: `${year}-${pad2(month)}-${pad2(day)}`, status: 'reformatted' };
    }

    return { value: raw ?? '', status: 'unrecognized' };
}

export function normalizeCollectionDate(raw: string): string {
    return parseCollectionDate(raw).value;
}

/**
 * True when the value is already in a canonical date form (including sentinels and ranges).
 */
export function isCanonicalDate(value: string): boolean {
    if (isSentinel(value) || isIsoShape(value)) return true;
    const parts = value.split('/');
    return parts.length === 2 && isIsoShape(parts[0]) && isIsoShape(parts[1]);
}

// ===== GEOGRAPHIC LOCATION =====

const GEO_COUNTRY_REGION = /^[A-Za-z\s]+:[A-Za-z\s]+$/;
const GEO_COUNTRY_ONLY = /^[A-Za-z\s]+$/;
const GEO_STRICT = /^[A-Za-z\s]+:\s+[A-Za-z0-9\s:]+$/;

/**
 * Lenient repair: bare country names gain a trailing colon, everything else passes through.
 */
export function normalizeGeoLocName(raw: string): string {
    const value = raw.trim();
    if (value === '') return '';
    if (GEO_COUNTRY_REGION.test(value)) return value;
    if (GEO_COUNTRY_ONLY.test(value)) return `${value}:`;
    return value;
}

/**
 * Strict classifier: "Country: region[: locality]" with a space after the first colon.
 */
export function isValidGeoLocName(value: string): boolean {
    return GEO_STRICT.test(value);
}

// ===== LATITUDE / LONGITUDE =====

const LAT_LON_CANONICAL = /^\d+(?:\.\d+)? [NS] \d+(?:\.\d+)? [EW]$/;
const LAT_LON_DECIMAL = /^(-?\d+(?:\.\d+)?)(?:\s*,\s*|\s+)(-?\d+(?:\.\d+)?)$/;
const LAT_LON_STRICT = /^-?\d+(\.\d+)?\s+[NS]\s+-?\d+(\.\d+)?\s+[EW]$/;

function splitSign(value: string): { magnitude: string; negative: boolean } {
    const magnitude = value.replace(/^-/, '');
    return { magnitude, negative: value.startsWith('-') && Number(magnitude) !== 0 };
}

/**
 * Convert a signed decimal pair ("36.9513, -122.0733") into "36.9513 N 122.0733 W".
 */
export function normalizeLatLon(raw: string): string {
    const value = raw.trim();
    if (value === '') return '';
    if (LAT_LON_CANONICAL.test(value)) return value;

    const decimal = LAT_LON_DECIMAL.exec(value);
    if (decimal) {
        const lat = splitSign(decimal[1]);
        const lon = splitSign(decimal[2]);
        return `${lat.magnitude} ${lat.negative ? 'S' : 'N'} ${lon.magnitude} ${lon.negative ? 'W' : 'E'}`;
    }

    return value;
}

export function isValidLatLon(value: string): boolean {
    return LAT_LON_STRICT.test(value);
}

// ===== SYNONYM FIELDS =====

export function normalizeLibraryLayout(raw: string): string {
    return lookupLayoutSynonym(raw) ?? raw;
}

export function normalizeSampleSource(raw: string): string {
    return lookupSampleSource(raw) ?? raw;
}

// ===== CONTROLLED VOCABULARY =====

export type CoercionStatus =
    | 'kept'        // member of the valid set
    | 'synonym'     // mapped from a known synonym
    | 'defaulted'   // empty or invalid, replaced with the configured default
    | 'invalid'     // invalid and no default available, left as-is
    | 'empty';      // empty and no default available

export interface CoercionResult {
    value: string;
    status: CoercionStatus;
}

/**
 * Coerce a value into a field's closed vocabulary, falling back to the default.
 */
export function coerceVocabulary(
    field: string,
    raw: string,
    defaultValue?: string,
    vocabulary: Vocabulary = SRA_VOCABULARIES
): CoercionResult {
    if (!isVocabularyField(field)) {
        return { value: raw, status: 'kept' };
    }

    const validValues = vocabulary[field];

    if (field === 'library_layout' && raw.trim() !== '') {
        const canonical = lookupLayoutSynonym(raw);
        if (canonical) {
            return { value: canonical, status: canonical === raw ? 'kept' : 'synonym' };
        }
    }

    if (validValues.includes(raw)) {
        return { value: raw, status: 'kept' };
    }

    const hasDefault = defaultValue !== undefined && defaultValue !== '';
    if (raw.trim() === '') {
        return hasDefault ? { value: defaultValue, status: 'defaulted' } : { value: raw, status: 'empty' };
    }

    return hasDefault ? { value: defaultValue, status: 'defaulted' } : { value: raw, status: 'invalid' };
}
