/**
 * Spreadsheet Rendering
 *
 * Serializes records into a single-sheet .xlsx workbook with ExcelJS.
 * Layout is fixed: styled header row, bordered wrapped body cells and
 * constant column widths.
 */

import ExcelJS from 'exceljs';
import type { Alignment, Borders, Row } from 'exceljs';
import {
  config,
  logger,
  RenderError,
  SPREADSHEET_COLUMNS,
  type ExtractionResult,
  type SpreadsheetColumn,
  type SpreadsheetRow,
} from '@doc-structurer/shared';

export const COLUMN_WIDTHS: Record<SpreadsheetColumn, number> = {
  key: 30,
  value: 50,
  comments: 40,
};

const HEADER_FILL_ARGB = 'FF4F81BD';
const HEADER_FONT_ARGB = 'FFFFFFFF';

// Pinned so identical rows always produce identical workbook properties
const WORKBOOK_TIMESTAMP = new Date(Date.UTC(2024, 0, 1));

const THIN_BORDER: Partial<Borders> = {
  top: { style: 'thin' },
  left: { style: 'thin' },
  bottom: { style: 'thin' },
  right: { style: 'thin' },
};

const CELL_ALIGNMENT: Partial<Alignment> = {
  vertical: 'top',
  wrapText: true,
};

// Cell text that readers would decode as an `_xHHHH_` escape, and the
// control characters XML 1.0 cannot carry
const ESCAPE_LIKE_PATTERN = /_(?=x[0-9A-Fa-f]{4}_)/g;
const CONTROL_CHAR_PATTERN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

/**
 * Encode text so a workbook reader gets back exactly the same string.
 *
 * A literal `_xHHHH_` keeps its characters by escaping the leading
 * underscore as `_x005F_`; control characters become `_x00HH_`.
 */
export function escapeCellText(text: string): string {
  return text
    .replace(ESCAPE_LIKE_PATTERN, '_x005F_')
    .replace(
      CONTROL_CHAR_PATTERN,
      (char) => `_x${char.charCodeAt(0).toString(16).toUpperCase().padStart(4, '0')}_`
    );
}

function escapeRow(row: SpreadsheetRow): SpreadsheetRow {
  return {
    key: escapeCellText(row.key),
    value: escapeCellText(row.value),
    comments: row.comments === null ? null : escapeCellText(row.comments),
  };
}

/**
 * Map an ExtractionResult onto spreadsheet rows, preserving order.
 */
export function recordsToRows(records: ExtractionResult): SpreadsheetRow[] {
  return records.map((record) => ({
    key: record.key,
    value: record.value,
    comments: record.comments,
  }));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check that a row carries exactly the expected columns with text values.
 */
export function assertSpreadsheetRow(row: unknown, index: number): SpreadsheetRow {
  if (!isPlainObject(row)) {
    throw new RenderError(`Row ${index} is not an object`);
  }

  const columns = Object.keys(row).sort();
  const expected = [...SPREADSHEET_COLUMNS].sort();
  if (columns.length !== expected.length || columns.some((column, i) => column !== expected[i])) {
    throw new RenderError(
      `Row ${index} has columns [${Object.keys(row).join(', ')}], expected [${SPREADSHEET_COLUMNS.join(', ')}]`
    );
  }

  const { key, value, comments } = row;
  if (typeof key !== 'string' || typeof value !== 'string') {
    throw new RenderError(`Row ${index} must have text in "key" and "value"`);
  }
  if (comments !== null && typeof comments !== 'string') {
    throw new RenderError(`Row ${index} must have text or null in "comments"`);
  }

  return { key, value, comments };
}

function styleRow(row: Row, header: boolean): void {
  for (let col = 1; col <= SPREADSHEET_COLUMNS.length; col++) {
    const cell = row.getCell(col);
    cell.alignment = CELL_ALIGNMENT;
    cell.border = THIN_BORDER;

    if (header) {
      cell.font = { bold: true, color: { argb: HEADER_FONT_ARGB } };
      cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL_ARGB } };
    }
  }
}

/**
 * Render rows into an .xlsx payload.
 *
 * Row 1 holds the headers `key`, `value`, `comments`; each input row follows
 * in order. Throws RenderError before building anything if a row is malformed.
 */
export async function renderSpreadsheet(rows: readonly unknown[]): Promise<Buffer> {
  const validRows = rows.map((row, index) => assertSpreadsheetRow(row, index));

  const workbook = new ExcelJS.Workbook();
  workbook.created = WORKBOOK_TIMESTAMP;
  workbook.modified = WORKBOOK_TIMESTAMP;

  const worksheet = workbook.addWorksheet(config.sheetName);
  worksheet.columns = SPREADSHEET_COLUMNS.map((column) => ({
    header: column,
    key: column,
    width: COLUMN_WIDTHS[column],
  }));

  styleRow(worksheet.getRow(1), true);

  for (const row of validRows) {
    styleRow(worksheet.addRow(escapeRow(row)), false);
  }

  try {
    const buffer = Buffer.from(await workbook.xlsx.writeBuffer());

    logger.debug('Spreadsheet rendered', {
      rows: validRows.length,
      bytes: buffer.length,
    });

    return buffer;
  } catch (error) {
    throw new RenderError(
      `Unable to write spreadsheet: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}
