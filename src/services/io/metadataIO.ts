import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { Parser } from 'json2csv';
import * as XLSX from 'xlsx';
import logger from '../../utils/logger';
import { errorMessage, MetadataIOError } from '../../utils/errors';
import type { MetadataRow, MetadataTable, RaggedRow } from '../../types/metadata';

type TableFormat = 'tsv' | 'csv' | 'xlsx' | 'xls';

const FORMAT_BY_EXT: Record<string, TableFormat> = {
  '.txt': 'tsv',
  '.tsv': 'tsv',
  '.csv': 'csv',
  '.xlsx': 'xlsx',
  '.xls': 'xls',
};

export const VALIDATED_PREFIX = 'validated-';

function formatFor(filePath: string): TableFormat {
  const ext = path.extname(filePath).toLowerCase();
  const format = FORMAT_BY_EXT[ext];
  if (!format) {
    throw new MetadataIOError(
      `Unsupported file format: ${ext || '(none)'}. Use tab-delimited .txt/.tsv, .csv, or Excel .xlsx/.xls`,
      filePath
    );
  }
  return format;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

// Workbook dates arrive as local midnight
function formatCellDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

function cellToString(cell: unknown): string {
  if (cell === null || cell === undefined) return '';
  if (cell instanceof Date) return formatCellDate(cell);
  return String(cell).trim();
}

/**
 * Build a table from a header row plus data rows, recording rows whose field
 * count differs from the header.
 */
export function tableFromRecords(records: unknown[][]): MetadataTable {
  if (records.length === 0) {
    return { columns: [], rows: [] };
  }

  const columns = records[0].map(cellToString);
  const rows: MetadataRow[] = [];
  const raggedRows: RaggedRow[] = [];

  records.slice(1).forEach((record, index) => {
    if (record.length !== columns.length) {
      raggedRows.push({ row: index, fieldCount: record.length, expected: columns.length });
    }
    const row: MetadataRow = {};
    columns.forEach((column, i) => {
      row[column] = cellToString(record[i]);
    });
    rows.push(row);
  });

  return raggedRows.length > 0 ? { columns, rows, raggedRows } : { columns, rows };
}

function isRecordList(value: unknown): value is unknown[][] {
  return Array.isArray(value) && value.every(record => Array.isArray(record));
}

export function parseDelimited(content: string, delimiter: string): MetadataTable {
  const records: unknown = parse(content, {
    delimiter,
    bom: true,
    skip_empty_lines: true,
    relax_quotes: true,
    relax_column_count: true,
  });
  if (!isRecordList(records)) {
    throw new Error('Delimited parser returned an unexpected shape');
  }
  return tableFromRecords(records);
}

export function parseWorkbook(buffer: Buffer): MetadataTable {
  const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  const firstSheetName = workbook.SheetNames[0];
  if (!firstSheetName) return { columns: [], rows: [] };

  const sheet = workbook.Sheets[firstSheetName];
  const records = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: '',
    // Cell text follows each cell's own number format, which can drop the century
    raw: true,
    blankrows: false,
  });
  return tableFromRecords(records);
}

/**
 * Load a metadata table from a tab-delimited, comma-delimited or Excel file.
 */
export async function loadMetadataTable(filePath: string): Promise<MetadataTable> {
  const format = formatFor(filePath);

  let buffer: Buffer;
  try {
    buffer = await fs.promises.readFile(filePath);
  } catch (error) {
    throw new MetadataIOError(`Error loading metadata file ${filePath}: ${errorMessage(error)}`, filePath);
  }

  let table: MetadataTable;
  try {
    table =
      format === 'xlsx' || format === 'xls'
        ? parseWorkbook(buffer)
        : parseDelimited(buffer.toString('utf-8'), format === 'tsv' ? '\t' : ',');
  } catch (error) {
    throw new MetadataIOError(`Error parsing metadata file ${filePath}: ${errorMessage(error)}`, filePath);
  }

  logger.info(`📊 Loaded ${table.rows.length} rows from ${filePath}`);
  return table;
}

const TAB_BREAKING = /[\t\r\n]+/g;

/**
 * Unquoted TSV cannot carry tabs or line breaks, so they collapse to a space.
 */
function flattenForTabs(table: MetadataTable): MetadataTable {
  let flattened = 0;
  const flatten = (value: string): string => {
    const cleaned = value.replace(TAB_BREAKING, ' ');
    if (cleaned !== value) flattened++;
    return cleaned;
  };

  const columns = table.columns.map(flatten);
  const rows = table.rows.map(row => {
    const out: MetadataRow = {};
    table.columns.forEach((column, i) => {
      out[columns[i]] = flatten(row[column] ?? '');
    });
    return out;
  });

  if (flattened > 0) {
    logger.warn(`Replaced tabs or line breaks with spaces in ${flattened} cells for tab-delimited output`);
  }
  return { columns, rows };
}

export function formatDelimited(table: MetadataTable, delimiter: string): string {
  const tabbed = delimiter === '\t';
  const output = tabbed ? flattenForTabs(table) : table;
  const parser = new Parser<MetadataRow>({
    fields: output.columns,
    delimiter,
    // Archive templates are plain TSV; only CSV output needs quoting
    quote: tabbed ? '' : '"',
    eol: '\n',
  });
  return `${parser.parse(output.rows)}\n`;
}

function workbookBuffer(table: MetadataTable, format: 'xlsx' | 'xls'): Buffer {
  const sheet = XLSX.utils.aoa_to_sheet([table.columns, ...table.rows.map(row => table.columns.map(c => row[c] ?? ''))]);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, 'Sheet1');
  const output: unknown = XLSX.write(workbook, { type: 'buffer', bookType: format === 'xls' ? 'biff8' : 'xlsx' });
  if (!Buffer.isBuffer(output)) {
    throw new Error('Workbook writer did not return a buffer');
  }
  return output;
}

/**
 * Save a table in the format implied by the output extension.
 */
export async function saveMetadataTable(table: MetadataTable, outputPath: string): Promise<string> {
  const format = formatFor(outputPath);

  try {
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    if (format === 'xlsx' || format === 'xls') {
      await fs.promises.writeFile(outputPath, workbookBuffer(table, format));
    } else {
      await fs.promises.writeFile(outputPath, formatDelimited(table, format === 'tsv' ? '\t' : ','), 'utf-8');
    }
  } catch (error) {
    throw new MetadataIOError(`Error saving metadata file to ${outputPath}: ${errorMessage(error)}`, outputPath);
  }

  logger.info(`Saved validated metadata to ${outputPath}`);
  return outputPath;
}

export function validatedOutputPath(inputPath: string, outputDir?: string): string {
  return path.join(outputDir ?? path.dirname(inputPath), `${VALIDATED_PREFIX}${path.basename(inputPath)}`);
}

/**
 * Newline-separated list of resolved file paths for the upload step.
 */
export async function writeFileList(paths: string[], outputPath: string): Promise<string> {
  try {
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.promises.writeFile(outputPath, paths.length > 0 ? `${paths.join('\n')}\n` : '', 'utf-8');
  } catch (error) {
    throw new MetadataIOError(`Error writing file list to ${outputPath}: ${errorMessage(error)}`, outputPath);
  }
  logger.info(`Created ${outputPath} with ${paths.length} files`);
  return outputPath;
}
