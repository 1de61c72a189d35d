/**
 * File Existence Resolver
 *
 * Resolves every file referenced by a sample table against a base directory
 * and classifies it present or missing. Large tables are checked through a
 * bounded pool of concurrent workers; results are written into a slot per
 * reference, so the output order never depends on completion order.
 */

import fs from 'fs';
import path from 'path';
import logger from '../../utils/logger';
import type { FilePresenceRecord, MetadataTable, ValidationIssue } from '../../types/metadata';
import { FILENAME_COLUMNS, PRIMARY_KEY } from '../standards/fieldRegistry';

export type ResolveMode = 'sequential' | 'concurrent' | 'auto';

export interface ResolveOptions {
    mode?: ResolveMode;
    maxWorkers?: number;
    // In auto mode, tables with at least this many references run concurrently
    concurrentThreshold?: number;
}

export interface FileReference {
    referencedPath: string;
    resolvedPath: string;
    key: string;
    column: string;
    row: number;
}

export interface MissingFile {
    column: string;
    path: string;
}

export interface ResolutionSummary {
    allPresent: boolean;
    present: FilePresenceRecord[];
    missing: FilePresenceRecord[];
    missingByKey: Map<string, MissingFile[]>;
    resolvedPaths: string[];
}

export const DEFAULT_MAX_WORKERS = 10;
export const DEFAULT_CONCURRENT_THRESHOLD = 50;
const PROGRESS_INTERVAL = 10;

export function resolveReferencePath(value: string, baseDir?: string): string {
    if (path.isAbsolute(value)) return value;
    return path.resolve(baseDir ?? process.cwd(), value);
}

/**
 * Every non-empty cell of every filename-bearing column, in row then column order.
 */
export function collectFileReferences(table: MetadataTable, baseDir?: string): FileReference[] {
    const columns = FILENAME_COLUMNS.filter(column => table.columns.includes(column));
    const references: FileReference[] = [];

    table.rows.forEach((row, index) => {
        const key = row[PRIMARY_KEY] || `Row_${index}`;
        for (const column of columns) {
            const value = (row[column] ?? '').trim();
            if (value === '') continue;
            references.push({
                referencedPath: value,
                resolvedPath: resolveReferencePath(value, baseDir),
                key,
                column,
                row: index,
            });
        }
    });
    return references;
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.promises.access(filePath, fs.constants.F_OK);
        return true;
    } catch (error) {
        const code = error instanceof Error && 'code' in error ? error.code : undefined;
        if (code !== 'ENOENT' && code !== 'ENOTDIR') {
            logger.warn(`Could not check ${filePath} (${String(code)}), treating as missing`);
        }
        return false;
    }
}

async function checkSequential(references: FileReference[]): Promise<FilePresenceRecord[]> {
    const records: FilePresenceRecord[] = [];
    for (const reference of references) {
        records.push({ ...reference, exists: await fileExists(reference.resolvedPath) });
    }
    return records;
}

async function checkConcurrent(references: FileReference[], maxWorkers: number): Promise<FilePresenceRecord[]> {
    const slots: Array<FilePresenceRecord | undefined> = new Array(references.length);
    let cursor = 0;
    let checked = 0;

    const worker = async (): Promise<void> => {
        while (cursor < references.length) {
            const index = cursor++;
            const reference = references[index];
            slots[index] = { ...reference, exists: await fileExists(reference.resolvedPath) };
            checked++;
            if (checked % PROGRESS_INTERVAL === 0 || checked === references.length) {
                logger.debug(`Checked ${checked}/${references.length} files`);
            }
        }
    };

    const workerCount = Math.max(1, Math.min(maxWorkers, references.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return slots.map((record, index) => {
        if (!record) {
            throw new Error(`File check for ${references[index].resolvedPath} did not complete`);
        }
        return record;
    });
}

/**
 * Check existence of every file the table references.
 */
export async function resolveFiles(
    table: MetadataTable,
    baseDir?: string,
    options: ResolveOptions = {}
): Promise<FilePresenceRecord[]> {
    const references = collectFileReferences(table, baseDir);
    const maxWorkers = options.maxWorkers ?? DEFAULT_MAX_WORKERS;
    const threshold = options.concurrentThreshold ?? DEFAULT_CONCURRENT_THRESHOLD;
    const mode = options.mode ?? 'auto';
    const concurrent = mode === 'concurrent' || (mode === 'auto' && references.length >= threshold);

    if (references.length === 0) {
        logger.warn('No file references found in sample metadata');
        return [];
    }

    logger.info(
        concurrent
            ? `Checking existence of ${references.length} files using ${maxWorkers} workers`
            : `Checking existence of ${references.length} files`
    );

    const records = concurrent ? await checkConcurrent(references, maxWorkers) : await checkSequential(references);
    const missing = records.filter(record => !record.exists).length;
    logger.info(`Found ${records.length - missing} existing files, ${missing} missing files`);
    return records;
}

/**
 * Present paths with duplicates removed, first occurrence kept.
 */
export function uniqueResolvedPaths(records: FilePresenceRecord[]): string[] {
    const seen = new Set<string>();
    const paths: string[] = [];
    for (const record of records) {
        if (!record.exists || seen.has(record.resolvedPath)) continue;
        seen.add(record.resolvedPath);
        paths.push(record.resolvedPath);
    }
    return paths;
}

export function summarizeResolution(records: FilePresenceRecord[]): ResolutionSummary {
    const present = records.filter(record => record.exists);
    const missing = records.filter(record => !record.exists);
    const missingByKey = new Map<string, MissingFile[]>();

    for (const record of missing) {
        const entries = missingByKey.get(record.key) ?? [];
        entries.push({ column: record.column, path: record.resolvedPath });
        missingByKey.set(record.key, entries);
    }

    return {
        allPresent: missing.length === 0,
        present,
        missing,
        missingByKey,
        resolvedPaths: uniqueResolvedPaths(records),
    };
}

export function keysWithMissingFiles(records: FilePresenceRecord[]): string[] {
    return [...new Set(records.filter(record => !record.exists).map(record => record.key))];
}

export function missingFileIssues(records: FilePresenceRecord[]): ValidationIssue[] {
    return records
        .filter(record => !record.exists)
        .map(record => ({
            severity: 'warning' as const,
            code: 'FILE_MISSING' as const,
            table: 'sample' as const,
            column: record.column,
            row: record.row,
            key: record.key,
            message: `File not found for sample ${record.key} (${record.column}): ${record.resolvedPath}`,
        }));
}
