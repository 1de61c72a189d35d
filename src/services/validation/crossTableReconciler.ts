/**
 * Cross-Table Reconciler
 *
 * Compares the sample and project tables by sample_name. Both tables must
 * describe the same set of samples before submission.
 */

import path from 'path';
import type { MetadataTable, ValidationIssue } from '../../types/metadata';
import { FILENAME_COLUMNS, PRIMARY_KEY } from '../standards/fieldRegistry';

export interface ReconciliationResult {
    onlyInSample: Set<string>;
    onlyInProject: Set<string>;
}

export interface FilenameMismatch {
    key: string;
    column: string;
    sampleFile: string;
    projectFile: string;
}

export function keySet(table: MetadataTable): Set<string> {
    const keys = new Set<string>();
    for (const row of table.rows) {
        const key = row[PRIMARY_KEY] ?? '';
        if (key.trim() !== '') keys.add(key);
    }
    return keys;
}

/**
 * Set difference of sample_name values in both directions.
 */
export function reconcile(sampleTable: MetadataTable, projectTable: MetadataTable): ReconciliationResult {
    const sampleKeys = keySet(sampleTable);
    const projectKeys = keySet(projectTable);
    return {
        onlyInSample: new Set([...sampleKeys].filter(key => !projectKeys.has(key))),
        onlyInProject: new Set([...projectKeys].filter(key => !sampleKeys.has(key))),
    };
}

/**
 * Remove every row whose key is in `keys`. Returns a new table.
 */
export function dropByKey(table: MetadataTable, keys: Iterable<string>): MetadataTable {
    const drop = new Set(keys);
    return {
        columns: [...table.columns],
        rows: table.rows.filter(row => !drop.has(row[PRIMARY_KEY] ?? '')).map(row => ({ ...row })),
    };
}

function basename(value: string): string {
    // win32 handles both separators
    return path.win32.basename(value.trim());
}

function firstRowByKey(table: MetadataTable): Map<string, Record<string, string>> {
    const byKey = new Map<string, Record<string, string>>();
    for (const row of table.rows) {
        const key = row[PRIMARY_KEY] ?? '';
        if (!byKey.has(key)) byKey.set(key, row);
    }
    return byKey;
}

/**
 * For keys in both tables, compare basenames of filename columns the two tables share.
 */
export function compareFilenames(sampleTable: MetadataTable, projectTable: MetadataTable): FilenameMismatch[] {
    const sharedColumns = FILENAME_COLUMNS.filter(
        column => sampleTable.columns.includes(column) && projectTable.columns.includes(column)
    );
    if (sharedColumns.length === 0) return [];

    const projectRows = firstRowByKey(projectTable);
    const mismatches: FilenameMismatch[] = [];

    for (const [key, sampleRow] of firstRowByKey(sampleTable)) {
        const projectRow = projectRows.get(key);
        if (!projectRow) continue;

        for (const column of sharedColumns) {
            const sampleFile = sampleRow[column] ?? '';
            const projectFile = projectRow[column] ?? '';
            if (sampleFile.trim() === '' || projectFile.trim() === '') continue;
            if (basename(sampleFile) !== basename(projectFile)) {
                mismatches.push({ key, column, sampleFile, projectFile });
            }
        }
    }
    return mismatches;
}

export function reconciliationIssues(
    result: ReconciliationResult,
    mismatches: FilenameMismatch[] = []
): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    for (const key of result.onlyInSample) {
        issues.push({
            severity: 'warning',
            code: 'ONLY_IN_SAMPLE',
            table: 'sample',
            column: PRIMARY_KEY,
            key,
            message: `Sample ${key} is in sample metadata but missing from project metadata`,
        });
    }
    for (const key of result.onlyInProject) {
        issues.push({
            severity: 'warning',
            code: 'ONLY_IN_PROJECT',
            table: 'project',
            column: PRIMARY_KEY,
            key,
            message: `Sample ${key} is in project metadata but missing from sample metadata`,
        });
    }
    for (const mismatch of mismatches) {
        issues.push({
            severity: 'warning',
            code: 'FILENAME_MISMATCH',
            column: mismatch.column,
            key: mismatch.key,
            message: `Sample ${mismatch.key} references '${mismatch.sampleFile}' in sample metadata but '${mismatch.projectFile}' in project metadata (${mismatch.column})`,
        });
    }
    return issues;
}
