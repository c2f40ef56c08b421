import fs from 'fs/promises';
import path from 'path';
import { addDays, addSeconds, format } from 'date-fns';
import type { CellValue, TableRows } from '../types';
import type { ColumnSelection, TabularDataSource } from '../types/collaborators';
import { FormatError, NotFoundError } from '../errors';
import {
  attribute,
  childrenNamed,
  descendantsNamed,
  firstChild,
  parseXml,
  readPackageParts,
  textContent,
  type XmlElement
} from '../utils/ooxml';
import { formatCellRef, parseCellRef, parseColumnRef, parseRangeRef, type CellPosition } from '../utils/cellRef';

interface SheetData {
  name: string;
  cells: Map<string, CellValue>;
  maxRow: number;
  maxColumn: number;
}

const WORKBOOK_PART = 'xl/workbook.xml';
const WORKBOOK_RELS_PART = 'xl/_rels/workbook.xml.rels';
const SHARED_STRINGS_PART = 'xl/sharedStrings.xml';
const STYLES_PART = 'xl/styles.xml';

// Built-in number formats that display dates or times
const DATE_FORMAT_IDS = new Set([14, 15, 16, 17, 18, 19, 20, 21, 22, 45, 46, 47]);
const EXCEL_EPOCH = new Date(1899, 11, 30);

function resolveTarget(target: string): string {
  if (target.startsWith('/')) {
    return target.slice(1);
  }
  return path.posix.normalize(path.posix.join('xl', target));
}

function readSharedStrings(root: XmlElement | null): string[] {
  if (!root) return [];
  return childrenNamed(root, 'si').map(item =>
    // phonetic runs (rPh) carry their own <t> elements that are not part of the value
    item.children
      .filter(child => child.name !== 'rPh')
      .flatMap(child => child.name === 't' ? [child] : descendantsNamed(child, 't'))
      .map(textContent)
      .join('')
  );
}

function isDateFormatCode(code: string): boolean {
  // quoted literals, escaped characters and [Red]/[$-409] sections are not date tokens
  const tokens = code.replace(/"[^"]*"/g, '').replace(/\\./g, '').replace(/\[[^\]]*\]/g, '');
  return /[ymdhs]/i.test(tokens);
}

/**
 * For each cell format (`cellXfs` index), whether it displays a date.
 */
function readDateStyles(root: XmlElement | null): boolean[] {
  if (!root) return [];

  const customDateIds = new Set<number>();
  const numFmts = firstChild(root, 'numFmts');
  for (const numFmt of numFmts ? childrenNamed(numFmts, 'numFmt') : []) {
    const code = attribute(numFmt, 'formatCode') ?? '';
    if (isDateFormatCode(code)) {
      customDateIds.add(Number(attribute(numFmt, 'numFmtId')));
    }
  }

  const cellXfs = firstChild(root, 'cellXfs');
  return (cellXfs ? childrenNamed(cellXfs, 'xf') : []).map(xf => {
    const id = Number(attribute(xf, 'numFmtId') ?? '0');
    return DATE_FORMAT_IDS.has(id) || customDateIds.has(id);
  });
}

/**
 * Render an Excel date serial (days since 1899-12-30, fraction = time of day).
 */
export function formatExcelDate(serial: number): string {
  const days = Math.floor(serial);
  const seconds = Math.round((serial - days) * 86400);
  const date = addSeconds(addDays(EXCEL_EPOCH, days), seconds);
  return format(date, seconds === 0 ? 'yyyy-MM-dd' : 'yyyy-MM-dd HH:mm:ss');
}

function readCellValue(cell: XmlElement, sharedStrings: string[], dateStyles: boolean[]): CellValue {
  const type = attribute(cell, 't') ?? 'n';

  if (type === 'inlineStr') {
    const inline = firstChild(cell, 'is');
    const text = inline ? descendantsNamed(inline, 't').map(textContent).join('') : '';
    return text === '' ? null : text;
  }

  const valueNode = firstChild(cell, 'v');
  if (!valueNode) return null;
  const raw = textContent(valueNode);
  if (raw === '') return null;

  switch (type) {
    case 's': {
      const text = sharedStrings[Number(raw)];
      return text === undefined || text === '' ? null : text;
    }
    case 'b':
      return raw === '1' ? 'TRUE' : 'FALSE';
    case 'str':
    case 'e':
      return raw;
    default: {
      const numeric = Number(raw);
      if (!Number.isFinite(numeric)) return raw;
      const style = attribute(cell, 's');
      return style !== undefined && dateStyles[Number(style)] ? formatExcelDate(numeric) : numeric;
    }
  }
}

function readSheet(name: string, root: XmlElement, sharedStrings: string[], dateStyles: boolean[]): SheetData {
  const sheet: SheetData = { name, cells: new Map(), maxRow: 0, maxColumn: 0 };
  const sheetData = firstChild(root, 'sheetData');
  if (!sheetData) return sheet;

  let rowNumber = 0;
  for (const row of childrenNamed(sheetData, 'row')) {
    const explicitRow = attribute(row, 'r');
    rowNumber = explicitRow ? Number(explicitRow) : rowNumber + 1;

    let columnNumber = 0;
    for (const cell of childrenNamed(row, 'c')) {
      const ref = attribute(cell, 'r');
      const position: CellPosition = ref ? parseCellRef(ref) : { row: rowNumber, column: columnNumber + 1 };
      columnNumber = position.column;

      const value = readCellValue(cell, sharedStrings, dateStyles);
      if (value === null) continue;

      sheet.cells.set(formatCellRef(position), value);
      sheet.maxRow = Math.max(sheet.maxRow, position.row);
      sheet.maxColumn = Math.max(sheet.maxColumn, position.column);
    }
  }

  return sheet;
}

function splitSheetReference(reference: string): { sheet: string; range: string } {
  const separator = reference.lastIndexOf('!');
  if (separator === -1) {
    throw new FormatError(`Invalid range reference: ${reference}`);
  }
  let sheet = reference.slice(0, separator);
  if (sheet.startsWith("'") && sheet.endsWith("'")) {
    sheet = sheet.slice(1, -1).replace(/''/g, "'");
  }
  return { sheet, range: reference.slice(separator + 1) };
}

/**
 * In-memory view of an .xlsx workbook: cell values only, no formulas. Cells
 * with a date number format read as date text.
 */
export class Workbook implements TabularDataSource {
  private constructor(
    private readonly sheets: Map<string, SheetData>,
    private readonly definedNames: Map<string, string>
  ) {}

  static async load(filePath: string): Promise<Workbook> {
    const buffer = await fs.readFile(filePath);
    return Workbook.fromBuffer(buffer);
  }

  static async fromBuffer(buffer: Buffer): Promise<Workbook> {
    return Workbook.fromParts(await readPackageParts(buffer));
  }

  /**
   * Build a workbook from its package parts (path → XML).
   */
  static async fromParts(parts: Map<string, string>): Promise<Workbook> {
    const workbookXml = parts.get(WORKBOOK_PART);
    if (!workbookXml) {
      throw new FormatError('Not an Excel workbook: xl/workbook.xml is missing');
    }

    const workbookRoot = await parseXml(workbookXml);
    const relsXml = parts.get(WORKBOOK_RELS_PART);
    const relsRoot = relsXml ? await parseXml(relsXml) : null;
    const sharedXml = parts.get(SHARED_STRINGS_PART);
    const sharedStrings = readSharedStrings(sharedXml ? await parseXml(sharedXml) : null);
    const stylesXml = parts.get(STYLES_PART);
    const dateStyles = readDateStyles(stylesXml ? await parseXml(stylesXml) : null);

    const targets = new Map<string, string>();
    if (relsRoot) {
      for (const relationship of childrenNamed(relsRoot, 'Relationship')) {
        const id = attribute(relationship, 'Id');
        const target = attribute(relationship, 'Target');
        if (id && target) {
          targets.set(id, resolveTarget(target));
        }
      }
    }

    const sheets = new Map<string, SheetData>();
    const sheetList = firstChild(workbookRoot, 'sheets');
    const sheetEntries = sheetList ? childrenNamed(sheetList, 'sheet') : [];

    for (const [index, entry] of sheetEntries.entries()) {
      const name = attribute(entry, 'name');
      if (!name) continue;
      const relationshipId = attribute(entry, 'r:id');
      const partPath = (relationshipId && targets.get(relationshipId)) || `xl/worksheets/sheet${index + 1}.xml`;
      const sheetXml = parts.get(partPath);
      const sheet = sheetXml
        ? readSheet(name, await parseXml(sheetXml), sharedStrings, dateStyles)
        : { name, cells: new Map<string, CellValue>(), maxRow: 0, maxColumn: 0 };
      sheets.set(name, sheet);
    }

    const definedNames = new Map<string, string>();
    const namesNode = firstChild(workbookRoot, 'definedNames');
    if (namesNode) {
      for (const definedName of childrenNamed(namesNode, 'definedName')) {
        const name = attribute(definedName, 'name');
        if (name) {
          definedNames.set(name.toLowerCase(), textContent(definedName).trim());
        }
      }
    }

    return new Workbook(sheets, definedNames);
  }

  listSheets(): string[] {
    return Array.from(this.sheets.keys());
  }

  hasNamedRange(name: string): boolean {
    return this.definedNames.has(name.trim().toLowerCase());
  }

  readCell(sheet: string, ref: string): CellValue {
    return this.valueAt(this.sheet(sheet), parseCellRef(ref));
  }

  readRange(sheet: string, range: string): TableRows {
    const data = this.sheet(sheet);
    const { from, to } = parseRangeRef(range);
    const rows: TableRows = [];
    for (let row = from.row; row <= to.row; row++) {
      const values: CellValue[] = [];
      for (let column = from.column; column <= to.column; column++) {
        values.push(this.valueAt(data, { row, column }));
      }
      rows.push(values);
    }
    return rows;
  }

  readNamedRange(name: string): TableRows {
    const reference = this.definedNames.get(name.trim().toLowerCase());
    if (reference === undefined) {
      throw new NotFoundError(`Named range not found: ${name}`);
    }
    const { sheet, range } = splitSheetReference(reference);
    return this.readRange(sheet, range);
  }

  readLastInColumn(sheet: string, ref: string): CellValue {
    return this.lastBelow(this.sheet(sheet), parseCellRef(ref));
  }

  readTitledLast(sheet: string, ref: string, title: string): CellValue {
    const data = this.sheet(sheet);
    const origin = parseCellRef(ref);
    const column = this.findTitle(data, origin.row, title, origin.column);
    return this.lastBelow(data, { row: origin.row, column });
  }

  readColumns(sheet: string, selection: ColumnSelection): TableRows {
    const data = this.sheet(sheet);
    let headerRow: number;
    let columns: number[];

    if ('titles' in selection) {
      headerRow = selection.row;
      columns = selection.titles.map(title => this.findTitle(data, headerRow, title, 1));
    } else {
      const positions = selection.refs.map(ref => {
        const column = parseColumnRef(ref);
        return column === null ? parseCellRef(ref) : { row: null, column };
      });
      const rowsGiven = new Set(positions.flatMap(position => position.row === null ? [] : [position.row]));
      if (rowsGiven.size > 1) {
        throw new FormatError(`Column references must share a row: ${selection.refs.join(',')}`);
      }
      headerRow = Array.from(rowsGiven)[0] ?? 1;
      columns = positions.map(position => position.column);
    }

    const rows: TableRows = [];
    for (let row = headerRow; row <= Math.max(headerRow, data.maxRow); row++) {
      const values = columns.map(column => this.valueAt(data, { row, column }));
      if (row > headerRow && values.every(value => value === null)) break;
      rows.push(values);
    }
    return rows;
  }

  private sheet(name: string): SheetData {
    const data = this.sheets.get(name);
    if (!data) {
      throw new NotFoundError(`Sheet not found: ${name}`);
    }
    return data;
  }

  private valueAt(data: SheetData, position: CellPosition): CellValue {
    return data.cells.get(formatCellRef(position)) ?? null;
  }

  private lastBelow(data: SheetData, start: CellPosition): CellValue {
    let current = this.valueAt(data, start);
    if (current === null) return null;

    for (let row = start.row + 1; row <= data.maxRow; row++) {
      const next = this.valueAt(data, { row, column: start.column });
      if (next === null) break;
      current = next;
    }
    return current;
  }

  private findTitle(data: SheetData, row: number, title: string, fromColumn: number): number {
    const wanted = title.trim().toLowerCase();
    for (let column = fromColumn; column <= data.maxColumn; column++) {
      const value = this.valueAt(data, { row, column });
      if (value !== null && String(value).trim().toLowerCase() === wanted) {
        return column;
      }
    }
    throw new NotFoundError(`Column title not found: ${title}`);
  }
}
