import type { ResolvedValue, TableRows } from '../../types';
import type { TabularDataSource } from '../../types/collaborators';
import { BackendError, FormatError, NotFoundError, errorMessage } from '../../errors';
import { cellText, formatTextTable } from '../../utils/tableUtils';
import { isCellRef } from '../../utils/cellRef';
import { failure, text, type Resolver } from './types';

const WORKBOOK_FILE = /\.xlsx?$/i;

function sheetLookup(source: TabularDataSource): Map<string, string> {
  return new Map(source.listSheets().map(sheet => [sheet.toLowerCase(), sheet]));
}

function sheetKey(name: string): string {
  return name.trim().replace(/^'+|'+$/g, '').toLowerCase();
}

function resolveSheet(source: TabularDataSource, name: string): string {
  const sheet = sheetLookup(source).get(sheetKey(name));
  if (!sheet) {
    throw new NotFoundError(`Sheet not found: ${name.trim()}`);
  }
  return sheet;
}

function firstSheet(source: TabularDataSource): string {
  const [sheet] = source.listSheets();
  if (sheet === undefined) {
    throw new NotFoundError('Workbook has no sheets');
  }
  return sheet;
}

/** `[sheet!]ref`; without a sheet the first sheet is used. */
function sheetAndRef(source: TabularDataSource, params: string): { sheet: string; ref: string } {
  const parts = params.split('!');
  if (parts.length < 2) {
    return { sheet: firstSheet(source), ref: params.trim() };
  }
  return {
    sheet: resolveSheet(source, parts[0]),
    ref: parts.slice(1).join('!').trim()
  };
}

function tableValue(rows: TableRows, tableMode: boolean): ResolvedValue {
  if (tableMode && rows.length > 0) {
    return { kind: 'table', rows };
  }
  return text(formatTextTable(rows));
}

function readCell(source: TabularDataSource, params: string): ResolvedValue {
  const { sheet, ref } = sheetAndRef(source, params);
  return text(cellText(source.readCell(sheet, ref)));
}

function readLast(source: TabularDataSource, params: string): ResolvedValue {
  const parts = params.split('!');
  if (parts.length >= 3) {
    const sheet = resolveSheet(source, parts[0]);
    const title = parts.slice(2).join('!');
    return text(cellText(source.readTitledLast(sheet, parts[1].trim(), title)));
  }
  const { sheet, ref } = sheetAndRef(source, params);
  return text(cellText(source.readLastInColumn(sheet, ref)));
}

function readRange(source: TabularDataSource, params: string, tableMode: boolean): ResolvedValue {
  const { sheet, ref } = sheetAndRef(source, params);
  if (!ref) {
    throw new FormatError('Range reference is empty');
  }

  let rows: TableRows;
  if (ref.includes(':') || (isCellRef(ref) && !source.hasNamedRange(ref))) {
    rows = source.readRange(sheet, ref);
  } else {
    rows = source.readNamedRange(ref);
  }
  return tableValue(rows, tableMode);
}

function readColumns(source: TabularDataSource, params: string, tableMode: boolean): ResolvedValue {
  const parts = params.split('!');
  if (parts.length < 2) {
    throw new FormatError('Invalid COLUMN format');
  }

  const sheet = resolveSheet(source, parts[0]);
  const tokens = parts[1]
    .trim()
    .replace(/^"+|"+$/g, '')
    .split(',')
    .map(token => token.trim())
    .filter(token => token.length > 0);
  if (!tokens.length) {
    throw new FormatError('No columns given');
  }

  const startRow = parts.length > 2 ? parts[2].trim() : '';
  let rows: TableRows;
  if (/^\d+$/.test(startRow)) {
    rows = source.readColumns(sheet, { titles: tokens, row: Number(startRow) });
  } else if (!tokens.some(token => /\d/.test(token))) {
    rows = source.readColumns(sheet, { titles: tokens, row: 1 });
  } else {
    rows = source.readColumns(sheet, { refs: tokens });
  }
  return tableValue(rows, tableMode);
}

/**
 * Shorthands without a subtype: `:A5` (last in column), `A1:B3` (range),
 * `A1` (cell, or a named range when the token is not a cell reference).
 */
function resolveShorthand(source: TabularDataSource, content: string, tableMode: boolean): ResolvedValue {
  const trimmed = content.trim();
  if (trimmed.startsWith(':')) {
    return readLast(source, trimmed.slice(1));
  }
  if (trimmed.includes(':')) {
    return readRange(source, trimmed, tableMode);
  }
  if (isCellRef(trimmed)) {
    return readCell(source, trimmed);
  }
  return readRange(source, trimmed, tableMode);
}

export function resolveWithSource(source: TabularDataSource, content: string, tableMode: boolean): ResolvedValue {
  const parts = content.split('!');
  if (parts.length < 2 || content.trim().startsWith(':')) {
    return resolveShorthand(source, content, tableMode);
  }

  const subtype = parts[0].trim().toUpperCase();
  const params = parts.slice(1).join('!');

  switch (subtype) {
    case 'CELL':
      return readCell(source, params);
    case 'LAST':
      return readLast(source, params);
    case 'RANGE':
      return readRange(source, params, tableMode);
    case 'COLUMN':
      return readColumns(source, params, tableMode);
  }

  // Sheet-qualified shorthand: Sheet1!A1, Sheet1!A1:B3
  if (sheetLookup(source).has(sheetKey(parts[0]))) {
    const ref = params.trim();
    return ref.includes(':') ? readRange(source, content, tableMode) : readCell(source, content);
  }

  throw new FormatError(`Unknown XL type: ${subtype}`);
}

export const resolveTabular: Resolver = async (directive, _depth, context) => {
  try {
    const parts = directive.params.split('!');
    let source = context.workbook;
    let content = directive.params;

    if (WORKBOOK_FILE.test(parts[0].trim())) {
      source = await context.workbooks.open(parts[0].trim());
      content = parts.slice(1).join('!');
    }

    if (!content.trim()) {
      throw new FormatError('Invalid Excel reference');
    }
    if (!source) {
      throw new BackendError('No workbook loaded');
    }

    return resolveWithSource(source, content, context.tableMode);
  } catch (error) {
    console.warn(`⚠️ XL keyword failed (${directive.rawSpan}):`, errorMessage(error));
    return failure(`Error processing XL: ${errorMessage(error)}`);
  }
};
