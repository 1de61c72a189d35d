/**
 * Cross-Table Reconciler Tests - Jest
 *
 * Run: npm test
 */

import {
  compareFilenames,
  dropByKey,
  keySet,
  reconcile,
  reconciliationIssues,
} from '../src/services/validation/crossTableReconciler';
import type { MetadataTable } from '../src/types/metadata';

function keyTable(keys: string[]): MetadataTable {
  return { columns: ['sample_name'], rows: keys.map(key => ({ sample_name: key })) };
}

describe('reconcile', () => {
  it('should compute set differences in both directions', () => {
    const result = reconcile(keyTable(['S1', 'S2', 'S3']), keyTable(['S2', 'S3', 'S4']));

    expect([...result.onlyInSample]).toEqual(['S1']);
    expect([...result.onlyInProject]).toEqual(['S4']);
  });

  it('should return disjoint sets', () => {
    const result = reconcile(keyTable(['a', 'b']), keyTable(['c']));
    const overlap = [...result.onlyInSample].filter(key => result.onlyInProject.has(key));

    expect(overlap).toEqual([]);
  });

  it('should return empty sets for identical key sets', () => {
    const result = reconcile(keyTable(['a', 'b']), keyTable(['b', 'a', 'a']));

    expect(result.onlyInSample.size).toBe(0);
    expect(result.onlyInProject.size).toBe(0);
  });

  it('should ignore blank keys', () => {
    expect([...keySet(keyTable(['a', '', ' ']))]).toEqual(['a']);
  });
});

describe('dropByKey', () => {
  it('should remove every row with a listed key and keep the rest in order', () => {
    const table = keyTable(['a', 'b', 'a', 'c']);

    const result = dropByKey(table, ['a']);

    expect(result.rows.map(row => row.sample_name)).toEqual(['b', 'c']);
    expect(table.rows).toHaveLength(4);
  });

  it('should leave both tables with the same key set after a symmetric drop', () => {
    const sample = keyTable(['S1', 'S2', 'S3']);
    const project = keyTable(['S1', 'S2', 'S3']);

    const drop = ['S2'];
    const result = reconcile(dropByKey(sample, drop), dropByKey(project, drop));

    expect(result.onlyInSample.size).toBe(0);
    expect(result.onlyInProject.size).toBe(0);
  });
});

describe('compareFilenames', () => {
  it('should compare basenames of shared filename columns', () => {
    const sample: MetadataTable = {
      columns: ['sample_name', 'filename'],
      rows: [
        { sample_name: 'S1', filename: '/data/run1/S1_R1.fastq.gz' },
        { sample_name: 'S2', filename: 'S2_R1.fastq.gz' },
      ],
    };
    const project: MetadataTable = {
      columns: ['sample_name', 'filename'],
      rows: [
        { sample_name: 'S1', filename: 'C:\\uploads\\S1_R1.fastq.gz' },
        { sample_name: 'S2', filename: 'S2_1.fastq.gz' },
      ],
    };

    expect(compareFilenames(sample, project)).toEqual([
      { key: 'S2', column: 'filename', sampleFile: 'S2_R1.fastq.gz', projectFile: 'S2_1.fastq.gz' },
    ]);
  });

  it('should return nothing when the tables share no filename column', () => {
    const sample: MetadataTable = { columns: ['sample_name', 'filename'], rows: [{ sample_name: 'S1', filename: 'a' }] };
    expect(compareFilenames(sample, keyTable(['S1']))).toEqual([]);
  });
});

describe('reconciliationIssues', () => {
  it('should produce one issue per key and per filename mismatch', () => {
    const issues = reconciliationIssues(
      { onlyInSample: new Set(['S1']), onlyInProject: new Set(['S4']) },
      [{ key: 'S2', column: 'filename', sampleFile: 'a.fq', projectFile: 'b.fq' }]
    );

    expect(issues.map(issue => issue.code)).toEqual(['ONLY_IN_SAMPLE', 'ONLY_IN_PROJECT', 'FILENAME_MISMATCH']);
    expect(issues[0].message).toBe('Sample S1 is in sample metadata but missing from project metadata');
    expect(issues[1].message).toBe('Sample S4 is in project metadata but missing from sample metadata');
    expect(issues[2]).toMatchObject({ severity: 'warning', key: 'S2', column: 'filename' });
  });
});
