export const DIRECTIVE_TYPES = ['XL', 'INPUT', 'TEMPLATE', 'JSON', 'AI'] as const;

export type KnownDirectiveType = typeof DIRECTIVE_TYPES[number];

// UNKNOWN covers `{{foo!bar}}`-style spans whose first field names no directive type
export type DirectiveType = KnownDirectiveType | 'UNKNOWN';

export interface Directive {
  /** The full `{{...}}` span as it appears in the text. */
  rawSpan: string;
  content: string;
  fields: string[];
  type: DirectiveType;
  /** Everything after the type token, rejoined with `!`. */
  params: string;
  offset: number;
}

export type CellValue = string | number | null;
export type TableRows = CellValue[][];

export interface SubDocumentRef {
  path: string;
  /** Written for this run (a copied section); removed once the output is saved. */
  generated?: boolean;
}

export type ResolvedValue =
  | { kind: 'text'; text: string }
  | { kind: 'table'; rows: TableRows }
  | { kind: 'subdocument'; document: SubDocumentRef }
  | { kind: 'error'; message: string };

export interface SectionQuery {
  start: string;
  end: string | null;
  includeTitle: boolean;
}

export type MatchTier =
  | 'EXACT'
  | 'NORMALIZED_EXACT'
  | 'CONTAINS'
  | 'REVERSE_CONTAINS'
  | 'EXACT_FALLBACK';

export interface SectionMatch {
  /** First block after the matched heading. */
  startIndex: number;
  /** Exclusive end of the section body. */
  endIndex: number;
  matchedHeading: string;
  matchTier: MatchTier;
}

export interface Block {
  text: string;
  isHeading: boolean;
}

export interface ArtifactOutcome {
  text: string;
  keyword: string;
  table?: TableRows;
  docxTemplate?: SubDocumentRef;
}

export type ParseOutcome = string | ArtifactOutcome;

export type XlSubtype = 'CELL' | 'LAST' | 'RANGE' | 'COLUMN' | 'OTHER';

export type InputKind = 'text' | 'area' | 'date' | 'select' | 'check';

export interface InputFieldDescriptor {
  keyword: string;
  kind: InputKind | 'unknown';
  label: string;
  defaultValue: string;
  height?: number;
  format?: string;
  options?: string[];
}

export interface KeywordSummary {
  totalKeywords: number;
  xl: Record<XlSubtype, number>;
  input: Record<InputKind | 'other', number>;
  template: number;
  json: number;
  ai: number;
  other: number;
  needsExcel: boolean;
  workbookFiles: string[];
  inputFields: InputFieldDescriptor[];
}
