/**
 * Sequence File Discovery
 *
 * Finds FASTQ files in a directory and groups them into read pairs by
 * filename convention. Used to seed metadata templates.
 */

import fs from 'fs';
import path from 'path';
import logger from '../../utils/logger';

export const FASTQ_EXTENSIONS = ['.fastq', '.fq', '.fastq.gz', '.fq.gz'] as const;

export interface CollectOptions {
    recursive?: boolean;
}

export interface FilePair {
    sampleName: string;
    file1: string;
    file2?: string;
}

interface PairRule {
    pattern: RegExp;
    mate: string;
}

// Forward-read markers and the text that replaces them in the reverse-read name
const PAIR_RULES: readonly PairRule[] = [
    { pattern: /_R1([._])/, mate: '_R2$1' },
    { pattern: /_1\./, mate: '_2.' },
    { pattern: /_forward/, mate: '_reverse' },
    { pattern: /_f\./, mate: '_r.' },
];

export function isFastqFile(name: string): boolean {
    const lower = name.toLowerCase();
    return FASTQ_EXTENSIONS.some(ext => lower.endsWith(ext));
}

async function walk(dir: string, recursive: boolean, found: string[]): Promise<void> {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            if (recursive) await walk(fullPath, recursive, found);
        } else if (entry.isFile() && isFastqFile(entry.name)) {
            found.push(fullPath);
        }
    }
}

/**
 * Absolute paths of every FASTQ file under `dir`, sorted.
 */
export async function collectFastqFiles(dir: string, options: CollectOptions = {}): Promise<string[]> {
    const found: string[] = [];
    await walk(path.resolve(dir), options.recursive ?? true, found);
    found.sort();
    logger.info(`Found ${found.length} FASTQ files in ${dir}`);
    return found;
}

/**
 * Sample name implied by a read file: the basename without its read marker and FASTQ extension.
 */
export function sampleNameFromFile(fileName: string): string {
    return path
        .basename(fileName)
        .replace(/_R?[12]\..*$/, '')
        .replace(/_(?:forward|reverse|f|r)(?:\..*)?$/, '')
        .replace(/\.(?:fastq|fq)(?:\.gz)?$/i, '');
}

function expectedMate(name: string): string | undefined {
    for (const rule of PAIR_RULES) {
        if (rule.pattern.test(name)) {
            return name.replace(rule.pattern, rule.mate);
        }
    }
    return undefined;
}

/**
 * Group files into forward/reverse pairs. Pairs come first, in the order of
 * their forward file, followed by every unmatched file as a single.
 */
export function detectFilePairs(files: string[]): FilePair[] {
    const byName = new Map<string, string>();
    for (const file of files) {
        byName.set(path.basename(file), file);
    }

    const paired = new Set<string>();
    const pairs: FilePair[] = [];

    for (const file of files) {
        const name = path.basename(file);
        if (paired.has(name)) continue;
        const mateName = expectedMate(name);
        if (mateName === undefined || mateName === name) continue;

        const mate = byName.get(mateName);
        if (mate === undefined || paired.has(mateName)) continue;

        paired.add(name);
        paired.add(mateName);
        pairs.push({ sampleName: sampleNameFromFile(name), file1: file, file2: mate });
    }

    const singles: FilePair[] = files
        .filter(file => !paired.has(path.basename(file)))
        .map(file => ({ sampleName: sampleNameFromFile(file), file1: file }));

    logger.info(`Detected ${pairs.length} paired samples and ${singles.length} single files`);
    return [...pairs, ...singles];
}
