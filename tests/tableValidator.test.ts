/**
 * Table Validator Tests - Jest
 *
 * Run: npm test
 */

import { buildSubmissionConfig, DEFAULT_PERFORMANCE } from '../src/config/settings';
import { StrictModeError } from '../src/utils/errors';
import {
  findDuplicateKeys,
  validateProjectTable,
  validateSampleTable,
  validateTable,
} from '../src/services/validation/tableValidator';
import type { MetadataTable, SubmissionConfig, ValidationIssue } from '../src/types/metadata';

const config = buildSubmissionConfig({}, {});

const emptyDefaults: SubmissionConfig = {
  default_values: {},
  contact: {},
  performance: { ...DEFAULT_PERFORMANCE },
};

function keyTable(keys: string[]): MetadataTable {
  return { columns: ['sample_name'], rows: keys.map(key => ({ sample_name: key })) };
}

function codes(issues: ValidationIssue[]): string[] {
  return issues.map(issue => issue.code);
}

const cleanSampleRow = {
  sample_name: 'S1',
  library_ID: 'L1',
  title: 'soil metagenome',
  library_strategy: 'WGS',
  library_source: 'METAGENOMIC',
  library_selection: 'RANDOM',
  library_layout: 'paired',
  platform: 'ILLUMINA',
  instrument_model: 'Illumina MiSeq',
  design_description: 'shotgun',
  filetype: 'fastq',
  filename: 'S1_R1.fastq.gz',
  filename2: 'S1_R2.fastq.gz',
};

describe('validateSampleTable', () => {
  it('should flag a paired sample without a second filename and leave the row intact', () => {
    const table: MetadataTable = {
      columns: ['sample_name', 'library_layout', 'filename', 'filename2'],
      rows: [{ sample_name: 'S1', library_layout: 'paired', filename: 'S1_R1.fastq.gz', filename2: '' }],
    };

    const { table: result, issues } = validateSampleTable(table, config);

    const paired = issues.filter(issue => issue.code === 'PAIRED_MISSING_FILENAME2');
    expect(paired).toHaveLength(1);
    expect(paired[0]).toMatchObject({
      severity: 'warning',
      table: 'sample',
      key: 'S1',
      row: 0,
      message: 'Sample S1 is marked as paired but missing second filename',
    });
    expect(result.rows[0]).toMatchObject({
      sample_name: 'S1',
      library_layout: 'paired',
      filename: 'S1_R1.fastq.gz',
      filename2: '',
    });
  });

  it('should flag a single sample that has a second filename', () => {
    const table: MetadataTable = {
      columns: ['sample_name', 'library_layout', 'filename', 'filename2'],
      rows: [{ sample_name: 'S2', library_layout: 'single', filename: 'a.fq', filename2: 'b.fq' }],
    };

    const { issues } = validateSampleTable(table, config);

    expect(issues.find(issue => issue.code === 'SINGLE_HAS_FILENAME2')?.message).toBe(
      'Sample S2 is marked as single but has a second filename'
    );
  });

  it('should resolve layout synonyms before the pairing check', () => {
    const table: MetadataTable = {
      columns: ['sample_name', 'library_layout', 'filename', 'filename2'],
      rows: [{ sample_name: 'S1', library_layout: 'PE', filename: 'S1_R1.fq', filename2: '' }],
    };

    const { table: result, issues } = validateSampleTable(table, config);

    expect(result.rows[0].library_layout).toBe('paired');
    expect(codes(issues)).toContain('VALUE_NORMALIZED');
    expect(codes(issues)).toContain('PAIRED_MISSING_FILENAME2');
  });

  it('should add missing required columns with their defaults', () => {
    const { table: result, issues } = validateSampleTable(keyTable(['S1']), config);

    expect(result.columns).toEqual(
      expect.arrayContaining(['library_ID', 'title', 'platform', 'filetype', 'design_description', 'filename'])
    );
    expect(result.rows[0]).toMatchObject({
      title: 'metagenomics project',
      platform: 'ILLUMINA',
      filetype: 'fastq',
      design_description: '',
      library_ID: 'S1',
    });
    expect(issues.find(issue => issue.column === 'platform')?.message).toBe(
      "Missing required column 'platform', added with default 'ILLUMINA'"
    );
    expect(issues.find(issue => issue.column === 'design_description')?.message).toBe(
      "Missing required column 'design_description', added empty"
    );
  });

  it('should fill empty cells from defaults and report one issue per column', () => {
    const table: MetadataTable = {
      columns: Object.keys(cleanSampleRow),
      rows: [
        { ...cleanSampleRow, title: '' },
        { ...cleanSampleRow, sample_name: 'S2', title: '' },
      ],
    };

    const { table: result, issues } = validateSampleTable(table, config);

    expect(result.rows.map(row => row.title)).toEqual(['metagenomics project', 'metagenomics project']);
    expect(issues).toEqual([
      {
        severity: 'warning',
        table: 'sample',
        code: 'DEFAULTS_APPLIED',
        column: 'title',
        message: "Applied default value 'metagenomics project' to 2 empty cells in column 'title'",
      },
    ]);
  });

  it('should default invalid vocabulary values and report them', () => {
    const table: MetadataTable = {
      columns: Object.keys(cleanSampleRow),
      rows: [{ ...cleanSampleRow, platform: 'illumina' }],
    };

    const { table: result, issues } = validateSampleTable(table, config);

    expect(result.rows[0].platform).toBe('ILLUMINA');
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      code: 'VOCAB_DEFAULTED',
      column: 'platform',
      key: 'S1',
      message: "Invalid platform value 'illumina' for sample S1, set to default value 'ILLUMINA'",
    });
  });

  it('should leave invalid vocabulary values when no default is configured', () => {
    const table: MetadataTable = {
      columns: Object.keys(cleanSampleRow),
      rows: [{ ...cleanSampleRow, filetype: 'cram' }],
    };

    const { table: result, issues } = validateSampleTable(table, emptyDefaults);

    expect(result.rows[0].filetype).toBe('cram');
    expect(codes(issues)).toEqual(['VOCAB_INVALID']);
  });

  it('should return no issues for a clean table', () => {
    const table: MetadataTable = { columns: Object.keys(cleanSampleRow), rows: [{ ...cleanSampleRow }] };

    const { table: result, issues } = validateSampleTable(table, config, { strict: true });

    expect(issues).toEqual([]);
    expect(result.rows[0]).toEqual(cleanSampleRow);
  });

  it('should not mutate the input table', () => {
    const table: MetadataTable = {
      columns: ['sample_name', 'library_layout'],
      rows: [{ sample_name: 'S1', library_layout: 'PE' }],
    };

    validateSampleTable(table, config);

    expect(table.columns).toEqual(['sample_name', 'library_layout']);
    expect(table.rows).toEqual([{ sample_name: 'S1', library_layout: 'PE' }]);
  });
});

describe('validateTable structure checks', () => {
  it('should report duplicate keys once without removing rows', () => {
    const { table: result, issues } = validateTable(keyTable(['a', 'a', 'b']), 'project', config);

    const duplicates = issues.filter(issue => issue.code === 'DUPLICATE_KEY');
    expect(duplicates).toHaveLength(1);
    expect(duplicates[0]).toMatchObject({
      key: 'a',
      rows: [0, 1],
      message: "Duplicate sample_name 'a' appears 2 times (rows 0, 1)",
    });
    expect(result.rows.map(row => row.sample_name)).toEqual(['a', 'a', 'b']);
  });

  it('should drop rows with an empty key and count them', () => {
    const { table: result, issues } = validateTable(keyTable(['a', '', 'b', '  ']), 'project', config);

    expect(result.rows.map(row => row.sample_name)).toEqual(['a', 'b']);
    const dropped = issues.find(issue => issue.code === 'EMPTY_KEY_ROWS_DROPPED');
    expect(dropped).toMatchObject({ rows: [1, 3], message: 'Removed 2 rows with empty sample_name' });
  });

  it('should return an error when the key column is missing', () => {
    const table: MetadataTable = { columns: ['name'], rows: [{ name: 'x' }] };

    const { table: result, issues } = validateTable(table, 'sample', config);

    expect(issues).toEqual([
      {
        severity: 'error',
        table: 'sample',
        code: 'MISSING_KEY_COLUMN',
        column: 'sample_name',
        message: "sample metadata has no 'sample_name' column",
      },
    ]);
    expect(result).toEqual(table);
  });

  it('should report ragged rows from the loader', () => {
    const table: MetadataTable = {
      ...keyTable(['a', 'b', 'c']),
      raggedRows: [{ row: 2, fieldCount: 3, expected: 4 }],
    };

    const { issues } = validateTable(table, 'project', config);

    expect(issues.find(issue => issue.code === 'RAGGED_ROW')).toMatchObject({
      row: 2,
      message: 'Row 3 has 3 fields, header has 4',
    });
  });

  it('should trim trailing rows whose key is a placeholder', () => {
    const { table: result, issues } = validateTable(keyTable(['a', 'b', 'nan', 'N/A']), 'project', config);

    expect(result.rows.map(row => row.sample_name)).toEqual(['a', 'b']);
    expect(issues.find(issue => issue.code === 'TRAILING_ROWS_TRIMMED')).toMatchObject({
      rows: [2, 3],
      message: 'Trimmed 2 trailing rows without a valid sample_name',
    });
  });

  it('should not report issues against trimmed trailing rows', () => {
    const { table: result, issues } = validateTable(keyTable(['a', 'b', 'nan', 'nan']), 'sample', config);

    expect(result.rows.map(row => row.sample_name)).toEqual(['a', 'b']);
    expect(codes(issues)).not.toContain('DUPLICATE_KEY');
    expect(issues.find(issue => issue.code === 'LIBRARY_ID_DEFAULTED')?.message).toBe(
      'Set library_ID to sample_name for 2 rows'
    );

    const trimmed = issues.find(issue => issue.code === 'TRAILING_ROWS_TRIMMED');
    expect(trimmed?.rows).toEqual([2, 3]);

    const others = issues.filter(issue => issue.code !== 'TRAILING_ROWS_TRIMMED');
    const referenced = others.flatMap(issue => [...(issue.row === undefined ? [] : [issue.row]), ...(issue.rows ?? [])]);
    expect(referenced.filter(row => row >= 2)).toEqual([]);
  });

  it('should throw a StrictModeError carrying every issue in strict mode', () => {
    let caught: unknown;
    try {
      validateTable(keyTable(['a', 'a']), 'project', config, { strict: true });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(StrictModeError);
    if (caught instanceof StrictModeError) {
      expect(caught.code).toBe('STRICT_MODE_VIOLATION');
      expect(caught.issues.map(issue => issue.code)).toContain('DUPLICATE_KEY');
    }
  });
});

describe('validateProjectTable', () => {
  const projectTable: MetadataTable = {
    columns: ['sample_name', 'collection_date', 'geo_loc_name', 'lat_lon', 'sample_source', 'host'],
    rows: [
      {
        sample_name: 'P1',
        collection_date: '7/24/2017',
        geo_loc_name: 'Canada',
        lat_lon: '36.9513, -122.0733',
        sample_source: 'host',
        host: '',
      },
      {
        sample_name: 'P2',
        collection_date: '',
        geo_loc_name: 'USA: Ohio',
        lat_lon: '39.10 N 84.51 W',
        sample_source: 'environmental',
        host: '',
      },
    ],
  };

  it('should normalize project fields', () => {
    const { table: result } = validateProjectTable(projectTable, config);

    expect(result.rows[0]).toEqual({
      sample_name: 'P1',
      collection_date: '2017-07-24',
      geo_loc_name: 'Canada:',
      lat_lon: '36.9513 N 122.0733 W',
      sample_source: 'host-associated',
      host: '',
      organism: 'Homo sapiens',
    });
    expect(result.rows[1].collection_date).toBe('not collected');
  });

  it('should report each repair', () => {
    const { issues } = validateProjectTable(projectTable, config);

    expect(codes(issues)).toEqual([
      'MISSING_COLUMN',
      'DATE_REFORMATTED',
      'DEFAULTS_APPLIED',
      'VALUE_NORMALIZED',
      'VALUE_NORMALIZED',
      'VALUE_NORMALIZED',
      'HOST_MISSING',
    ]);
    expect(issues.find(issue => issue.code === 'DEFAULTS_APPLIED')?.message).toBe(
      "Set 1 empty cells in column 'collection_date' to 'not collected'"
    );
    expect(issues.find(issue => issue.code === 'HOST_MISSING')).toMatchObject({ key: 'P1', column: 'host' });
  });

  it('should apply the strict geo classifier only when asked', () => {
    const lenient = validateProjectTable(projectTable, config);
    const strict = validateProjectTable(projectTable, config, { geoCheck: 'strict' });

    expect(codes(lenient.issues)).not.toContain('GEO_LOC_INVALID');
    const geo = strict.issues.filter(issue => issue.code === 'GEO_LOC_INVALID');
    expect(geo).toHaveLength(1);
    expect(geo[0].message).toBe('Invalid geo_loc_name format for sample P1: Canada:');
  });

  it('should flag unrecognized dates and bad coordinates without changing them', () => {
    const table: MetadataTable = {
      columns: ['sample_name', 'organism', 'collection_date', 'geo_loc_name', 'lat_lon', 'sample_source'],
      rows: [
        {
          sample_name: 'P3',
          organism: 'soil metagenome',
          collection_date: 'summer 2020',
          geo_loc_name: 'USA: Ohio',
          lat_lon: 'somewhere',
          sample_source: 'environmental',
        },
      ],
    };

    const { table: result, issues } = validateProjectTable(table, config);

    expect(result.rows[0].collection_date).toBe('summer 2020');
    expect(result.rows[0].lat_lon).toBe('somewhere');
    expect(issues.map(issue => issue.message)).toEqual([
      "Unrecognized collection_date format 'summer 2020' for sample P3",
      'Invalid lat_lon format for sample P3: somewhere',
    ]);
  });
});

describe('findDuplicateKeys', () => {
  it('should map each duplicated key to its row indices', () => {
    const duplicates = findDuplicateKeys(keyTable(['x', 'y', 'x', 'y', 'z']));
    expect([...duplicates.entries()]).toEqual([
      ['x', [0, 2]],
      ['y', [1, 3]],
    ]);
  });
});
