/**
 * Field Registry
 *
 * Static description of the columns the validator knows about. Columns not
 * listed here pass through validation untouched.
 */

import type { TableRole } from '../../types/metadata';
import {
    FieldNormalizer,
    normalizeGeoLocName,
    normalizeLatLon,
    normalizeSampleSource,
} from './fieldNormalizers';
import { VocabularyField, VOCABULARY_FIELDS } from './vocabularies';

export const PRIMARY_KEY = 'sample_name';

export type FieldKind = 'key' | 'date' | 'geo' | 'lat_lon' | 'enum' | 'synonym' | 'file' | 'text';

export interface FieldSpec {
    column: string;
    kind: FieldKind;
    // Collection dates are handled separately so their parse status can be reported
    normalizer?: FieldNormalizer;
    vocabulary?: VocabularyField;
}

export const FILENAME_COLUMNS = ['filename', 'filename2', 'filepath', 'filepath2', 'file1', 'file2'] as const;

const FIELD_SPECS: Record<string, FieldSpec> = {
    sample_name: { column: 'sample_name', kind: 'key' },
    collection_date: { column: 'collection_date', kind: 'date' },
    geo_loc_name: { column: 'geo_loc_name', kind: 'geo', normalizer: normalizeGeoLocName },
    lat_lon: { column: 'lat_lon', kind: 'lat_lon', normalizer: normalizeLatLon },
    sample_source: { column: 'sample_source', kind: 'synonym', normalizer: normalizeSampleSource },
    ...Object.fromEntries(
        VOCABULARY_FIELDS.map((field): [string, FieldSpec] => [field, { column: field, kind: 'enum', vocabulary: field }])
    ),
    ...Object.fromEntries(
        FILENAME_COLUMNS.map((column): [string, FieldSpec] => [column, { column, kind: 'file' }])
    ),
};

export const REQUIRED_COLUMNS: Record<TableRole, readonly string[]> = {
    sample: [
        'sample_name',
        'library_ID',
        'title',
        'library_strategy',
        'library_source',
        'library_selection',
        'library_layout',
        'platform',
        'instrument_model',
        'design_description',
        'filetype',
        'filename',
    ],
    project: [
        'sample_name',
        'organism',
        'collection_date',
        'geo_loc_name',
        'lat_lon',
        'sample_source',
    ],
};

// Columns a project template carries even when nothing fills them yet
export const PROJECT_TEMPLATE_COLUMNS = [
    'bioproject_id',
    'project_title',
    'project_description',
    'sample_source',
    'collection_date',
    'geo_loc_name',
    'lat_lon',
    'library_strategy',
    'library_source',
    'library_selection',
    'platform',
    'instrument_model',
    'env_biome',
    'env_feature',
    'env_material',
    'depth',
    'altitude',
    'host',
    'host_tissue',
    'isolation_source',
] as const;

export const BUILTIN_DEFAULT_VALUES: Readonly<Record<string, string>> = {
    // Project-level
    organism: 'Homo sapiens',
    geo_loc_name: 'United States: Ohio: Cincinnati',
    lat_lon: '39.10 N 84.51 W',

    // Sample-level
    title: 'metagenomics project',
    library_strategy: 'WGS',
    library_source: 'METAGENOMIC',
    library_selection: 'RANDOM',
    library_layout: 'paired',
    platform: 'ILLUMINA',
    instrument_model: 'Illumina NovaSeq X',
    filetype: 'fastq',
};

export function getFieldSpec(column: string): FieldSpec | undefined {
    return FIELD_SPECS[column];
}

export function getRequiredColumns(role: TableRole): string[] {
    return [...REQUIRED_COLUMNS[role]];
}
