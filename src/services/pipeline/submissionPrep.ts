/**
 * Submission Preparation
 *
 * Runs the full pre-submission pass over a sample table and a project table:
 * validate both, reconcile their keys, check backing files, optionally drop
 * samples whose files are missing, and hand back the cleaned tables together
 * with the deduplicated list of files to upload.
 */

import path from 'path';
import logger from '../../utils/logger';
import { StrictModeError } from '../../utils/errors';
import type {
    FilePresenceRecord,
    MetadataTable,
    SubmissionConfig,
    ValidationIssue,
} from '../../types/metadata';
import { loadSubmissionConfig } from '../../config/settings';
import { loadInstrumentModels, Vocabulary, withInstrumentModels } from '../standards/vocabularies';
import { validateProjectTable, validateSampleTable } from '../validation/tableValidator';
import {
    compareFilenames,
    dropByKey,
    reconcile,
    reconciliationIssues,
} from '../validation/crossTableReconciler';
import {
    keysWithMissingFiles,
    missingFileIssues,
    resolveFiles,
    ResolveOptions,
    uniqueResolvedPaths,
} from '../files/fileResolver';
import {
    loadMetadataTable,
    saveMetadataTable,
    validatedOutputPath,
    writeFileList,
} from '../io/metadataIO';

export const FILE_LIST_NAME = 'file-list.txt';

// Decides whether samples with missing files are removed from both tables
export type DropMissingPolicy = (keys: string[]) => boolean | Promise<boolean>;

export interface PrepareOptions {
    strict?: boolean;
    geoCheck?: 'off' | 'strict';
    vocabulary?: Vocabulary;
    dropMissingPolicy?: DropMissingPolicy;
    resolveOptions?: ResolveOptions;
}

export interface PrepareInput extends PrepareOptions {
    sampleTable: MetadataTable;
    projectTable: MetadataTable;
    config: SubmissionConfig;
    fileDir?: string;
}

export interface SubmissionResult {
    sampleTable: MetadataTable;
    projectTable: MetadataTable;
    issues: ValidationIssue[];
    files: FilePresenceRecord[];
    resolvedPaths: string[];
    droppedKeys: string[];
}

export interface PrepareFromFilesInput extends PrepareOptions {
    samplePath: string;
    projectPath: string;
    configPath?: string;
    config?: SubmissionConfig;
    // Spreadsheet listing accepted instrument models
    instrumentModelsPath?: string;
    fileDir?: string;
    outputDir?: string;
}

export interface WrittenOutputs {
    samplePath: string;
    projectPath: string;
    fileListPath?: string;
}

export async function prepareSubmission(input: PrepareInput): Promise<SubmissionResult> {
    const { config, fileDir } = input;
    const validateOptions = { geoCheck: input.geoCheck, vocabulary: input.vocabulary };

    const sample = validateSampleTable(input.sampleTable, config, validateOptions);
    const project = validateProjectTable(input.projectTable, config, validateOptions);
    let sampleTable = sample.table;
    let projectTable = project.table;
    const issues: ValidationIssue[] = [...sample.issues, ...project.issues];

    const reconciliation = reconcile(sampleTable, projectTable);
    issues.push(...reconciliationIssues(reconciliation, compareFilenames(sampleTable, projectTable)));

    let files: FilePresenceRecord[] = [];
    let droppedKeys: string[] = [];

    if (fileDir !== undefined) {
        files = await resolveFiles(sampleTable, fileDir, {
            maxWorkers: config.performance.max_workers,
            ...input.resolveOptions,
        });
        issues.push(...missingFileIssues(files));

        const missingKeys = keysWithMissingFiles(files);
        if (missingKeys.length > 0 && input.dropMissingPolicy && (await input.dropMissingPolicy(missingKeys))) {
            sampleTable = dropByKey(sampleTable, missingKeys);
            projectTable = dropByKey(projectTable, missingKeys);
            droppedKeys = missingKeys;
            issues.push({
                severity: 'warning',
                code: 'SAMPLES_DROPPED',
                message: `Removed ${missingKeys.length} samples with missing files: ${missingKeys.join(', ')}`,
            });
            logger.warn(`Removed ${missingKeys.length} samples with missing files`);
        }
    }

    const dropped = new Set(droppedKeys);
    const resolvedPaths = uniqueResolvedPaths(files.filter(record => !dropped.has(record.key)));

    logger.info(
        `Prepared submission: ${sampleTable.rows.length} samples, ${resolvedPaths.length} files, ${issues.length} issues`
    );

    if (input.strict && issues.length > 0) {
        throw new StrictModeError(issues);
    }

    return { sampleTable, projectTable, issues, files, resolvedPaths, droppedKeys };
}

/**
 * Load both tables from disk, prepare them, and write the `validated-` copies
 * plus the upload file list next to the inputs (or into `outputDir`).
 */
export async function prepareSubmissionFromFiles(
    input: PrepareFromFilesInput
): Promise<SubmissionResult & { outputs: WrittenOutputs }> {
    const config = input.config ?? loadSubmissionConfig(input.configPath);
    const [sampleTable, projectTable] = await Promise.all([
        loadMetadataTable(input.samplePath),
        loadMetadataTable(input.projectPath),
    ]);

    let vocabulary = input.vocabulary;
    if (input.instrumentModelsPath) {
        const models = loadInstrumentModels(await loadMetadataTable(input.instrumentModelsPath));
        vocabulary = withInstrumentModels(models, vocabulary);
    }

    const result = await prepareSubmission({ ...input, sampleTable, projectTable, config, vocabulary });

    const outputs: WrittenOutputs = {
        samplePath: await saveMetadataTable(result.sampleTable, validatedOutputPath(input.samplePath, input.outputDir)),
        projectPath: await saveMetadataTable(result.projectTable, validatedOutputPath(input.projectPath, input.outputDir)),
    };
    if (input.fileDir !== undefined) {
        const listDir = input.outputDir ?? path.dirname(input.samplePath);
        outputs.fileListPath = await writeFileList(result.resolvedPaths, path.join(listDir, FILE_LIST_NAME));
    }

    return { ...result, outputs };
}
