import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Document, HeadingLevel, Packer, Paragraph, Table, TableCell, TableRow } from 'docx';
import { Workbook } from '../src/services/workbook';
import { formatCellRef } from '../src/utils/cellRef';
import type { DataDirectories } from '../src/engine/resolvers/types';
import type { SummarizerService, SummaryRequest } from '../src/types/collaborators';

export type FixtureCell = string | number | boolean | null;

function escapeXml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

function cellXml(ref: string, value: FixtureCell): string {
  if (value === null) return '';
  if (typeof value === 'number') return `<c r="${ref}"><v>${value}</v></c>`;
  if (typeof value === 'boolean') return `<c r="${ref}" t="b"><v>${value ? 1 : 0}</v></c>`;
  return `<c r="${ref}" t="inlineStr"><is><t>${escapeXml(value)}</t></is></c>`;
}

function sheetXml(rows: FixtureCell[][]): string {
  const body = rows
    .map((row, rowIndex) => {
      const cells = row.map((value, columnIndex) =>
        cellXml(formatCellRef({ row: rowIndex + 1, column: columnIndex + 1 }), value)
      );
      return `<row r="${rowIndex + 1}">${cells.join('')}</row>`;
    })
    .join('');
  return `<?xml version="1.0" encoding="UTF-8"?><worksheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main"><sheetData>${body}</sheetData></worksheet>`;
}

/**
 * Package parts of a workbook with one worksheet per entry and optional
 * defined names (`name → 'Sheet!$A$1:$B$2'`).
 */
export function workbookParts(
  sheets: Record<string, FixtureCell[][]>,
  names: Record<string, string> = {}
): Map<string, string> {
  const parts = new Map<string, string>();
  const entries = Object.entries(sheets);

  const sheetList = entries
    .map(([name], index) => `<sheet name="${escapeXml(name)}" sheetId="${index + 1}" r:id="rId${index + 1}"/>`)
    .join('');
  const definedNames = Object.entries(names)
    .map(([name, reference]) => `<definedName name="${escapeXml(name)}">${escapeXml(reference)}</definedName>`)
    .join('');

  parts.set(
    'xl/workbook.xml',
    '<?xml version="1.0" encoding="UTF-8"?>'
      + '<workbook xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main" '
      + 'xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships">'
      + `<sheets>${sheetList}</sheets>`
      + (definedNames ? `<definedNames>${definedNames}</definedNames>` : '')
      + '</workbook>'
  );
  parts.set(
    'xl/_rels/workbook.xml.rels',
    '<?xml version="1.0" encoding="UTF-8"?>'
      + '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">'
      + entries
        .map((_entry, index) => `<Relationship Id="rId${index + 1}" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/worksheet" Target="worksheets/sheet${index + 1}.xml"/>`)
        .join('')
      + '</Relationships>'
  );
  entries.forEach(([, rows], index) => {
    parts.set(`xl/worksheets/sheet${index + 1}.xml`, sheetXml(rows));
  });

  return parts;
}

export const BUDGET_ROWS: FixtureCell[][] = [
  ['Region', 'Q1', 'Q2', 'Total'],
  ['North', 100, 150, 250],
  ['South', 200, 50, 250],
  ['Sum', 300, 200, 500]
];

export function budgetWorkbook(): Promise<Workbook> {
  return Workbook.fromParts(workbookParts(
    { Budget: BUDGET_ROWS, Notes: [['Prepared by', 'Joe']] },
    { Summary: 'Budget!$A$1:$B$2' }
  ));
}

/**
 * Sheet `Plan` holding the serial 45306 (2024-01-15) under four cell formats:
 * built-in date, custom date-time, custom quoted literal, general.
 */
export function datedWorkbook(): Promise<Workbook> {
  const parts = workbookParts({ Plan: [[45306, 45306.5, 45306, 45306]] });
  const sheet = parts.get('xl/worksheets/sheet1.xml') ?? '';
  parts.set('xl/worksheets/sheet1.xml', sheet
    .replace('<c r="A1">', '<c r="A1" s="1">')
    .replace('<c r="B1">', '<c r="B1" s="2">')
    .replace('<c r="C1">', '<c r="C1" s="3">'));
  parts.set(
    'xl/styles.xml',
    '<?xml version="1.0" encoding="UTF-8"?>'
      + '<styleSheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main">'
      + '<numFmts count="2">'
      + '<numFmt numFmtId="164" formatCode="dd/mm/yyyy hh:mm"/>'
      + '<numFmt numFmtId="165" formatCode="&quot;Day&quot; 0"/>'
      + '</numFmts>'
      + '<cellXfs count="4"><xf numFmtId="0"/><xf numFmtId="14"/><xf numFmtId="164"/><xf numFmtId="165"/></cellXfs>'
      + '</styleSheet>'
  );
  return Workbook.fromParts(parts);
}

export async function makeTempDir(prefix = 'keyword-docs-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function makeDirs(root: string): Promise<DataDirectories> {
  const dirs: DataDirectories = {
    templates: path.join(root, 'templates'),
    json: path.join(root, 'json'),
    ai: path.join(root, 'ai'),
    excel: path.join(root, 'excel'),
    output: path.join(root, 'output')
  };
  await Promise.all(Object.values(dirs).map(dir => fs.mkdir(dir, { recursive: true })));
  return dirs;
}

export type FixtureBlock =
  | { heading: string }
  | { text: string }
  | { table: string[][] };

export async function docxBuffer(blocks: FixtureBlock[]): Promise<Buffer> {
  const children = blocks.map(block => {
    if ('heading' in block) {
      return new Paragraph({ text: block.heading, heading: HeadingLevel.HEADING_1 });
    }
    if ('text' in block) {
      return new Paragraph({ text: block.text });
    }
    return new Table({
      rows: block.table.map(row => new TableRow({
        children: row.map(cell => new TableCell({ children: [new Paragraph({ text: cell })] }))
      }))
    });
  });

  return Packer.toBuffer(new Document({ sections: [{ properties: {}, children }] }));
}

export async function writeDocx(filePath: string, blocks: FixtureBlock[]): Promise<string> {
  await fs.writeFile(filePath, await docxBuffer(blocks));
  return filePath;
}

export class FakeSummarizer implements SummarizerService {
  readonly requests: SummaryRequest[] = [];

  constructor(private readonly reply: string | Error) {}

  async summarize(request: SummaryRequest): Promise<string> {
    this.requests.push(request);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}
