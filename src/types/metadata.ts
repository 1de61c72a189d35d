/**
 * Metadata Types
 *
 * Shared shapes for archive submission metadata: the two linked tables,
 * validation issues, file presence records and the submission config.
 */

export type TableRole = 'sample' | 'project';

export type MetadataRow = Record<string, string>;

export interface RaggedRow {
    row: number;        // 0-based data row index (header excluded)
    fieldCount: number;
    expected: number;
}

export interface MetadataTable {
    columns: string[];
    rows: MetadataRow[];
    // Populated by the loader when a delimited source had misaligned rows
    raggedRows?: RaggedRow[];
}

export type IssueSeverity = 'warning' | 'error';

export type IssueCode =
    | 'MISSING_KEY_COLUMN'
    | 'EMPTY_KEY_ROWS_DROPPED'
    | 'DUPLICATE_KEY'
    | 'MISSING_COLUMN'
    | 'DEFAULTS_APPLIED'
    | 'DATE_UNRECOGNIZED'
    | 'DATE_REFORMATTED'
    | 'VALUE_NORMALIZED'
    | 'GEO_LOC_INVALID'
    | 'LAT_LON_INVALID'
    | 'VOCAB_INVALID'
    | 'VOCAB_DEFAULTED'
    | 'PAIRED_MISSING_FILENAME2'
    | 'SINGLE_HAS_FILENAME2'
    | 'HOST_MISSING'
    | 'LIBRARY_ID_DEFAULTED'
    | 'TRAILING_ROWS_TRIMMED'
    | 'RAGGED_ROW'
    | 'ONLY_IN_SAMPLE'
    | 'ONLY_IN_PROJECT'
    | 'FILENAME_MISMATCH'
    | 'FILE_MISSING'
    | 'SAMPLES_DROPPED';

export interface ValidationIssue {
    severity: IssueSeverity;
    code: IssueCode;
    message: string;
    table?: TableRole;
    column?: string;
    row?: number;
    rows?: number[];
    key?: string;
}

export interface ValidationOutcome {
    table: MetadataTable;
    issues: ValidationIssue[];
}

export interface FilePresenceRecord {
    referencedPath: string;
    resolvedPath: string;
    exists: boolean;
    key: string;
    column: string;
    row: number;
}

export interface PerformanceSettings {
    batch_size: number;
    max_workers: number;
    enable_checkpoints: boolean;
}

export interface SubmissionConfig {
    default_values: Record<string, string>;
    contact: Record<string, string>;
    performance: PerformanceSettings;
}
