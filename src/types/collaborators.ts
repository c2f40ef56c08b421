import type { CellValue, SubDocumentRef, TableRows } from './index';

export type ColumnSelection =
  | { titles: string[]; row: number }
  | { refs: string[] };

/**
 * Read access to a loaded workbook. Sheet names passed in are already
 * resolved to their canonical spelling.
 */
export interface TabularDataSource {
  listSheets(): string[];
  hasNamedRange(name: string): boolean;
  readCell(sheet: string, ref: string): CellValue;
  readRange(sheet: string, range: string): TableRows;
  readNamedRange(name: string): TableRows;
  readLastInColumn(sheet: string, ref: string): CellValue;
  readTitledLast(sheet: string, ref: string, title: string): CellValue;
  readColumns(sheet: string, selection: ColumnSelection): TableRows;
}

export interface SinkRun {
  text: string;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  /** Half-points, as stored in OOXML. */
  size?: number;
  font?: string;
  color?: string;
}

export interface SinkParagraph {
  runs: SinkRun[];
  style?: string;
  alignment?: 'left' | 'center' | 'right' | 'both';
  indent?: { left?: number; right?: number; firstLine?: number; hanging?: number };
  spacing?: { before?: number; after?: number; line?: number };
}

export interface DocumentSink {
  addParagraph(paragraph: SinkParagraph): void;
  addTable(rows: TableRows): void;
  addSubDocument(document: SubDocumentRef): Promise<void>;
  save(outputPath: string): Promise<string>;
}

export interface SummaryRequest {
  text: string;
  prompt: string;
  maxWords: number;
  temperature: number;
}

export interface SummarizerService {
  summarize(request: SummaryRequest): Promise<string>;
}

export interface InputValueMap {
  get(key: string): string | undefined;
}

function stripBraces(key: string): string {
  const trimmed = key.trim();
  if (trimmed.startsWith('{{') && trimmed.endsWith('}}')) {
    return trimmed.slice(2, -2);
  }
  return trimmed;
}

export function createInputValueMap(values: Record<string, string> = {}): InputValueMap {
  const entries = new Map<string, string>();
  for (const [key, value] of Object.entries(values)) {
    entries.set(stripBraces(key), value);
  }
  return {
    get: (key: string) => entries.get(stripBraces(key))
  };
}
