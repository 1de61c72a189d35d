/**
 * Archive Controlled Vocabularies
 *
 * Closed value sets the sequence archive accepts for library and platform
 * fields. The lists themselves live in data/sraVocabularies.json.
 */

import vocabularyData from '../../data/sraVocabularies.json';
import type { MetadataTable } from '../../types/metadata';

export const VOCABULARY_FIELDS = [
    'library_strategy',
    'library_source',
    'library_selection',
    'library_layout',
    'platform',
    'filetype',
    'instrument_model',
] as const;

export type VocabularyField = (typeof VOCABULARY_FIELDS)[number];

export type Vocabulary = Record<VocabularyField, readonly string[]>;

export const SRA_VOCABULARIES: Vocabulary = {
    library_strategy: vocabularyData.library_strategy,
    library_source: vocabularyData.library_source,
    library_selection: vocabularyData.library_selection,
    library_layout: vocabularyData.library_layout,
    platform: vocabularyData.platform,
    filetype: vocabularyData.filetype,
    instrument_model: vocabularyData.instrument_model,
};

export const SAMPLE_SOURCES = ['environmental', 'host-associated'] as const;

const SAMPLE_SOURCE_SYNONYMS: Record<string, (typeof SAMPLE_SOURCES)[number]> = {
    'environmental': 'environmental',
    'environment': 'environmental',
    'host-associated': 'host-associated',
    'host': 'host-associated',
    'host associated': 'host-associated',
};

const LAYOUT_SYNONYMS: Record<string, 'paired' | 'single'> = {
    paired: 'paired',
    pair: 'paired',
    pe: 'paired',
    single: 'single',
    se: 'single',
};

const VOCABULARY_FIELD_SET: ReadonlySet<string> = new Set<string>(VOCABULARY_FIELDS);

export function isVocabularyField(column: string): column is VocabularyField {
    return VOCABULARY_FIELD_SET.has(column);
}

/**
 * Map a library layout synonym to its canonical token, or undefined if unknown.
 */
export function lookupLayoutSynonym(value: string): 'paired' | 'single' | undefined {
    return LAYOUT_SYNONYMS[value.trim().toLowerCase()];
}

export function lookupSampleSource(value: string): (typeof SAMPLE_SOURCES)[number] | undefined {
    return SAMPLE_SOURCE_SYNONYMS[value.trim().toLowerCase()];
}

/**
 * Derive an instrument model list from a spreadsheet of models.
 * Uses `instrument_model`, else the first column mentioning instrument/model,
 * else the first column. Falls back to the built-in list when empty.
 */
export function loadInstrumentModels(table: MetadataTable): string[] {
    const column =
        table.columns.find(c => c === 'instrument_model') ??
        table.columns.find(c => /instrument|model/i.test(c)) ??
        table.columns[0];

    if (column !== undefined) {
        const models = table.rows
            .map(row => (row[column] ?? '').trim())
            .filter(value => value !== '');
        if (models.length > 0) return models;
    }

    return [...SRA_VOCABULARIES.instrument_model];
}

/**
 * Vocabulary with the instrument model list replaced.
 */
export function withInstrumentModels(models: readonly string[], base: Vocabulary = SRA_VOCABULARIES): Vocabulary {
    return { ...base, instrument_model: models };
}
