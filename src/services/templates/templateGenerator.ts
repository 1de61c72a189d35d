/**
 * Template Generator
 *
 * Seeds sample and project metadata tables from the FASTQ files found in a
 * directory, so a submitter starts from rows that already match their data.
 */

import path from 'path';
import logger from '../../utils/logger';
import type { MetadataRow, MetadataTable, SubmissionConfig } from '../../types/metadata';
import { PRIMARY_KEY, PROJECT_TEMPLATE_COLUMNS } from '../standards/fieldRegistry';
import { collectFastqFiles, detectFilePairs, FilePair } from '../files/sequenceFiles';
import { saveMetadataTable } from '../io/metadataIO';

export const SAMPLE_TEMPLATE_NAME = 'sample-metadata-template.txt';
export const PROJECT_TEMPLATE_NAME = 'bioproject-metadata-template.txt';

const SAMPLE_BASE_COLUMNS = [
    PRIMARY_KEY,
    'title',
    'filename',
    'filename2',
    'filepath',
    'filepath2',
    'library_layout',
] as const;

export interface GeneratedTemplates {
    samplePath: string;
    projectPath: string;
    sampleCount: number;
}

function pushColumn(columns: string[], column: string): void {
    if (!columns.includes(column)) columns.push(column);
}

export function buildSampleTemplate(pairs: FilePair[], config: SubmissionConfig): MetadataTable {
    const columns: string[] = [...SAMPLE_BASE_COLUMNS];
    for (const key of Object.keys(config.default_values)) pushColumn(columns, key);
    for (const key of Object.keys(config.contact)) pushColumn(columns, `contact_${key}`);
    pushColumn(columns, 'bioproject_id');
    pushColumn(columns, 'biosample_id');

    const rows = pairs.map(pair => {
        const row: MetadataRow = {};
        for (const column of columns) row[column] = '';

        Object.assign(row, config.default_values);
        for (const [key, value] of Object.entries(config.contact)) {
            row[`contact_${key}`] = value;
        }
        row[PRIMARY_KEY] = pair.sampleName;
        row.title = `Metagenome from ${pair.sampleName}`;
        row.filename = path.basename(pair.file1);
        row.filepath = pair.file1;
        row.filename2 = pair.file2 ? path.basename(pair.file2) : '';
        row.filepath2 = pair.file2 ?? '';
        row.library_layout = pair.file2 ? 'paired' : 'single';
        return row;
    });

    return { columns, rows };
}

/**
 * Project rows keyed by the same sample names as the sample template. With no
 * names, a single row with an empty key is produced.
 */
export function buildProjectTemplate(config: SubmissionConfig, sampleNames: string[] = []): MetadataTable {
    const columns: string[] = [PRIMARY_KEY, ...PROJECT_TEMPLATE_COLUMNS];
    for (const key of ['organism', 'host']) pushColumn(columns, key);

    const names = sampleNames.length > 0 ? sampleNames : [''];
    const rows = names.map(name => {
        const row: MetadataRow = {};
        for (const column of columns) {
            row[column] = config.default_values[column] ?? '';
        }
        row[PRIMARY_KEY] = name;
        return row;
    });

    return { columns, rows };
}

/**
 * Write both templates into `outputDir`. Returns null when `fileDir` holds no FASTQ files.
 */
export async function generateTemplates(
    fileDir: string,
    outputDir: string,
    config: SubmissionConfig
): Promise<GeneratedTemplates | null> {
    const files = await collectFastqFiles(fileDir);
    if (files.length === 0) {
        logger.warn(`No FASTQ files found in ${fileDir}`);
        return null;
    }

    const pairs = detectFilePairs(files);
    const sampleTable = buildSampleTemplate(pairs, config);
    const projectTable = buildProjectTemplate(config, pairs.map(pair => pair.sampleName));

    const samplePath = await saveMetadataTable(sampleTable, path.join(outputDir, SAMPLE_TEMPLATE_NAME));
    const projectPath = await saveMetadataTable(projectTable, path.join(outputDir, PROJECT_TEMPLATE_NAME));

    logger.info(`Generated templates for ${pairs.length} samples in ${outputDir}`);
    return { samplePath, projectPath, sampleCount: pairs.length };
}
