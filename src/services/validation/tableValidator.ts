/**
 * Table Validator
 *
 * Applies the field normalizers across a whole metadata table, fills defaults,
 * and reports every anomaly as a structured issue. Steps run in a fixed order
 * because later checks rely on earlier repairs (e.g. layout synonyms are
 * resolved before the paired/single filename check).
 *
 * Nothing here throws for bad data: the caller always gets a best-effort table
 * plus the full issue list, unless strict mode is requested.
 */

import logger from '../../utils/logger';
import { StrictModeError } from '../../utils/errors';
import type {
    MetadataRow,
    MetadataTable,
    SubmissionConfig,
    TableRole,
    ValidationIssue,
    ValidationOutcome,
} from '../../types/metadata';
import {
    coerceVocabulary,
    isValidGeoLocName,
    isValidLatLon,
    parseCollectionDate,
} from '../standards/fieldNormalizers';
import { getFieldSpec, getRequiredColumns, PRIMARY_KEY } from '../standards/fieldRegistry';
import { isVocabularyField, SRA_VOCABULARIES, Vocabulary } from '../standards/vocabularies';

export interface ValidateOptions {
    // Throw StrictModeError at the end of the run if any issue was recorded
    strict?: boolean;
    // 'strict' also reports geo_loc_name values failing the strict classifier
    geoCheck?: 'off' | 'strict';
    vocabulary?: Vocabulary;
}

// Spreadsheet export artifacts that stand in for a missing key at the table tail
const PLACEHOLDER_KEYS = new Set(['nan', 'none', 'null', 'n/a', '#n/a']);

const ROLE_LABEL: Record<TableRole, string> = {
    sample: 'sample metadata',
    project: 'project metadata',
};

function isBlank(value: string | undefined): boolean {
    return value === undefined || value.trim() === '';
}

function cloneTable(table: MetadataTable): MetadataTable {
    const columns = [...table.columns];
    const rows = table.rows.map(row => {
        const copy: MetadataRow = {};
        for (const column of columns) {
            copy[column] = row[column] ?? '';
        }
        return copy;
    });
    return { columns, rows };
}

function addColumn(table: MetadataTable, column: string, fill: string): void {
    table.columns.push(column);
    for (const row of table.rows) {
        row[column] = fill;
    }
}

class IssueCollector {
    readonly issues: ValidationIssue[] = [];

    constructor(private readonly role: TableRole) {}

    warn(issue: Omit<ValidationIssue, 'severity' | 'table'>): void {
        this.issues.push({ severity: 'warning', table: this.role, ...issue });
    }

    error(issue: Omit<ValidationIssue, 'severity' | 'table'>): void {
        this.issues.push({ severity: 'error', table: this.role, ...issue });
    }
}

function reportRaggedRows(source: MetadataTable, collector: IssueCollector): void {
    for (const ragged of source.raggedRows ?? []) {
        collector.warn({
            code: 'RAGGED_ROW',
            row: ragged.row,
            message: `Row ${ragged.row + 1} has ${ragged.fieldCount} fields, header has ${ragged.expected}`,
        });
    }
}

function dropEmptyKeyRows(table: MetadataTable, collector: IssueCollector): void {
    const dropped: number[] = [];
    table.rows = table.rows.filter((row, index) => {
        if (isBlank(row[PRIMARY_KEY])) {
            dropped.push(index);
            return false;
        }
        return true;
    });
    if (dropped.length > 0) {
        collector.warn({
            code: 'EMPTY_KEY_ROWS_DROPPED',
            column: PRIMARY_KEY,
            rows: dropped,
            message: `Removed ${dropped.length} rows with empty ${PRIMARY_KEY}`,
        });
    }
}

/**
 * Exact-match duplicate keys, each reported once with every row index it appears at.
 */
export function findDuplicateKeys(table: MetadataTable, column: string = PRIMARY_KEY): Map<string, number[]> {
    const positions = new Map<string, number[]>();
    table.rows.forEach((row, index) => {
        const key = row[column] ?? '';
        const seen = positions.get(key);
        if (seen) {
            seen.push(index);
        } else {
            positions.set(key, [index]);
        }
    });
    return new Map([...positions].filter(([, rows]) => rows.length > 1));
}

function reportDuplicateKeys(table: MetadataTable, collector: IssueCollector): void {
    for (const [key, rows] of findDuplicateKeys(table)) {
        collector.warn({
            code: 'DUPLICATE_KEY',
            column: PRIMARY_KEY,
            key,
            rows,
            message: `Duplicate ${PRIMARY_KEY} '${key}' appears ${rows.length} times (rows ${rows.join(', ')})`,
        });
    }
}

function ensureRequiredColumns(
    table: MetadataTable,
    role: TableRole,
    defaults: Record<string, string>,
    collector: IssueCollector
): void {
    for (const column of getRequiredColumns(role)) {
        if (table.columns.includes(column)) continue;
        const fill = defaults[column] ?? '';
        addColumn(table, column, fill);
        collector.warn({
            code: 'MISSING_COLUMN',
            column,
            message: fill
                ? `Missing required column '${column}', added with default '${fill}'`
                : `Missing required column '${column}', added empty`,
        });
    }
}

function applyDefaults(table: MetadataTable, defaults: Record<string, string>, collector: IssueCollector): void {
    for (const column of table.columns) {
        if (column === PRIMARY_KEY) continue;
        const fill = defaults[column];
        if (fill === undefined || fill === '') continue;

        let filled = 0;
        for (const row of table.rows) {
            if (isBlank(row[column])) {
                row[column] = fill;
                filled++;
            }
        }
        if (filled > 0) {
            collector.warn({
                code: 'DEFAULTS_APPLIED',
                column,
                message: `Applied default value '${fill}' to ${filled} empty cells in column '${column}'`,
            });
        }
    }
}

function normalizeDates(table: MetadataTable, column: string, collector: IssueCollector): void {
    let emptyFilled = 0;
    table.rows.forEach((row, index) => {
        const raw = row[column] ?? '';
        const parsed = parseCollectionDate(raw);
        const key = row[PRIMARY_KEY];

        switch (parsed.status) {
            case 'empty':
                emptyFilled++;
                row[column] = parsed.value;
                break;
            case 'reformatted':
                row[column] = parsed.value;
                collector.warn({
                    code: 'DATE_REFORMATTED',
                    column,
                    row: index,
                    key,
                    message: `Reformatted ${column} '${raw}' to '${parsed.value}' for sample ${key}`,
                });
                break;
            case 'unrecognized':
                collector.warn({
                    code: 'DATE_UNRECOGNIZED',
                    column,
                    row: index,
                    key,
                    message: `Unrecognized ${column} format '${raw}' for sample ${key}`,
                });
                break;
            default:
                row[column] = parsed.value;
        }
    });

    if (emptyFilled > 0) {
        collector.warn({
            code: 'DEFAULTS_APPLIED',
            column,
            message: `Set ${emptyFilled} empty cells in column '${column}' to '${parseCollectionDate('').value}'`,
        });
    }
}

function applyNormalizers(table: MetadataTable, options: ValidateOptions, collector: IssueCollector): void {
    for (const column of table.columns) {
        const spec = getFieldSpec(column);
        if (!spec) continue;

        if (spec.kind === 'date') {
            normalizeDates(table, column, collector);
            continue;
        }

        const normalize = spec.normalizer;
        if (!normalize) continue;

        table.rows.forEach((row, index) => {
            const raw = row[column] ?? '';
            if (isBlank(raw)) return;

            const key = row[PRIMARY_KEY];
            const value = normalize(raw);
            if (value !== raw) {
                row[column] = value;
                collector.warn({
                    code: 'VALUE_NORMALIZED',
                    column,
                    row: index,
                    key,
                    message: `Normalized ${column} '${raw}' to '${value}' for sample ${key}`,
                });
            }

            if (spec.kind === 'lat_lon' && !isValidLatLon(value)) {
                collector.warn({
                    code: 'LAT_LON_INVALID',
                    column,
                    row: index,
                    key,
                    message: `Invalid lat_lon format for sample ${key}: ${value}`,
                });
            }
            if (spec.kind === 'geo' && options.geoCheck === 'strict' && !isValidGeoLocName(value)) {
                collector.warn({
                    code: 'GEO_LOC_INVALID',
                    column,
                    row: index,
                    key,
                    message: `Invalid geo_loc_name format for sample ${key}: ${value}`,
                });
            }
        });
    }
}

function coerceVocabularies(
    table: MetadataTable,
    defaults: Record<string, string>,
    vocabulary: Vocabulary,
    collector: IssueCollector
): void {
    for (const column of table.columns) {
        if (!isVocabularyField(column)) continue;

        table.rows.forEach((row, index) => {
            const raw = row[column] ?? '';
            const key = row[PRIMARY_KEY];
            const result = coerceVocabulary(column, raw, defaults[column], vocabulary);
            row[column] = result.value;

            switch (result.status) {
                case 'synonym':
                    collector.warn({
                        code: 'VALUE_NORMALIZED',
                        column,
                        row: index,
                        key,
                        message: `Normalized ${column} '${raw}' to '${result.value}' for sample ${key}`,
                    });
                    break;
                case 'defaulted':
                    collector.warn({
                        code: 'VOCAB_DEFAULTED',
                        column,
                        row: index,
                        key,
                        message: isBlank(raw)
                            ? `Set empty ${column} to default value '${result.value}' for sample ${key}`
                            : `Invalid ${column} value '${raw}' for sample ${key}, set to default value '${result.value}'`,
                    });
                    break;
                case 'invalid':
                    collector.warn({
                        code: 'VOCAB_INVALID',
                        column,
                        row: index,
                        key,
                        message: `Invalid ${column} value '${raw}' for sample ${key} and no default configured`,
                    });
                    break;
                default:
                    break;
            }
        });
    }
}

function checkSampleCrossFields(table: MetadataTable, collector: IssueCollector): void {
    table.rows.forEach((row, index) => {
        const key = row[PRIMARY_KEY];
        const layout = row.library_layout;
        const hasSecondFile = !isBlank(row.filename2);

        if (layout === 'paired' && !hasSecondFile) {
            collector.warn({
                code: 'PAIRED_MISSING_FILENAME2',
                column: 'filename2',
                row: index,
                key,
                message: `Sample ${key} is marked as paired but missing second filename`,
            });
        } else if (layout === 'single' && hasSecondFile) {
            collector.warn({
                code: 'SINGLE_HAS_FILENAME2',
                column: 'filename2',
                row: index,
                key,
                message: `Sample ${key} is marked as single but has a second filename`,
            });
        }
    });
}

function checkProjectCrossFields(table: MetadataTable, collector: IssueCollector): void {
    table.rows.forEach((row, index) => {
        if (row.sample_source !== 'host-associated' || !isBlank(row.host)) return;
        const key = row[PRIMARY_KEY];
        collector.warn({
            code: 'HOST_MISSING',
            column: 'host',
            row: index,
            key,
            message: `Sample ${key} is host-associated but 'host' is empty`,
        });
    });
}

function defaultLibraryIds(table: MetadataTable, collector: IssueCollector): void {
    if (!table.columns.includes('library_ID')) {
        addColumn(table, 'library_ID', '');
    }
    let filled = 0;
    for (const row of table.rows) {
        if (isBlank(row.library_ID)) {
            row.library_ID = row[PRIMARY_KEY];
            filled++;
        }
    }
    if (filled > 0) {
        collector.warn({
            code: 'LIBRARY_ID_DEFAULTED',
            column: 'library_ID',
            message: `Set library_ID to sample_name for ${filled} rows`,
        });
    }
}

function trimTrailingRows(table: MetadataTable, collector: IssueCollector): void {
    let end = table.rows.length;
    while (end > 0) {
        const key = (table.rows[end - 1][PRIMARY_KEY] ?? '').trim().toLowerCase();
        if (key !== '' && !PLACEHOLDER_KEYS.has(key)) break;
        end--;
    }
    const trimmed = table.rows.length - end;
    if (trimmed === 0) return;

    const rows = Array.from({ length: trimmed }, (_, i) => end + i);
    table.rows = table.rows.slice(0, end);
    collector.warn({
        code: 'TRAILING_ROWS_TRIMMED',
        column: PRIMARY_KEY,
        rows,
        message: `Trimmed ${trimmed} trailing rows without a valid ${PRIMARY_KEY}`,
    });
}

/**
 * Validate and repair one metadata table.
 */
export function validateTable(
    source: MetadataTable,
    role: TableRole,
    config: SubmissionConfig,
    options: ValidateOptions = {}
): ValidationOutcome {
    const collector = new IssueCollector(role);
    const table = cloneTable(source);
    const defaults = config.default_values;
    const vocabulary = options.vocabulary ?? SRA_VOCABULARIES;

    if (!table.columns.includes(PRIMARY_KEY)) {
        collector.error({
            code: 'MISSING_KEY_COLUMN',
            column: PRIMARY_KEY,
            message: `${ROLE_LABEL[role]} has no '${PRIMARY_KEY}' column`,
        });
        return finish(table, collector, role, options);
    }

    reportRaggedRows(source, collector);
    dropEmptyKeyRows(table, collector);
    trimTrailingRows(table, collector);
    reportDuplicateKeys(table, collector);
    ensureRequiredColumns(table, role, defaults, collector);
    applyDefaults(table, defaults, collector);
    applyNormalizers(table, options, collector);
    coerceVocabularies(table, defaults, vocabulary, collector);

    if (role === 'sample') {
        checkSampleCrossFields(table, collector);
        defaultLibraryIds(table, collector);
    } else {
        checkProjectCrossFields(table, collector);
    }

    return finish(table, collector, role, options);
}

function finish(
    table: MetadataTable,
    collector: IssueCollector,
    role: TableRole,
    options: ValidateOptions
): ValidationOutcome {
    const { issues } = collector;
    logger.info(`Validated ${ROLE_LABEL[role]}: ${table.rows.length} rows, ${issues.length} issues`);
    for (const issue of issues) {
        logger.debug(`[${issue.code}] ${issue.message}`);
    }

    if (options.strict && issues.length > 0) {
        throw new StrictModeError(issues);
    }
    return { table, issues };
}

export function validateSampleTable(
    table: MetadataTable,
    config: SubmissionConfig,
    options?: ValidateOptions
): ValidationOutcome {
    return validateTable(table, 'sample', config, options);
}

export function validateProjectTable(
    table: MetadataTable,
    config: SubmissionConfig,
    options?: ValidateOptions
): ValidationOutcome {
    return validateTable(table, 'project', config, options);
}
