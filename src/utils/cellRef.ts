import { FormatError } from '../errors';

export interface CellPosition {
  /** 1-based */
  row: number;
  /** 1-based */
  column: number;
}

const CELL_REF = /^\$?([A-Za-z]{1,3})\$?(\d+)$/;
const COLUMN_REF = /^\$?([A-Za-z]{1,3})$/;

export function isCellRef(token: string): boolean {
  return CELL_REF.test(token.trim());
}

export function columnIndex(letters: string): number {
  let index = 0;
  for (const letter of letters.toUpperCase()) {
    index = index * 26 + (letter.charCodeAt(0) - 64);
  }
  return index;
}

export function columnLetters(index: number): string {
  let letters = '';
  let remaining = index;
  while (remaining > 0) {
    const offset = (remaining - 1) % 26;
    letters = String.fromCharCode(65 + offset) + letters;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return letters;
}

export function parseCellRef(ref: string): CellPosition {
  const match = ref.trim().match(CELL_REF);
  if (!match || Number(match[2]) < 1) {
    throw new FormatError(`Invalid cell reference: ${ref}`);
  }
  return { column: columnIndex(match[1]), row: Number(match[2]) };
}

/** Column part of a bare column reference such as `B` or `$B`, if the token is one. */
export function parseColumnRef(ref: string): number | null {
  const match = ref.trim().match(COLUMN_REF);
  return match ? columnIndex(match[1]) : null;
}

export function formatCellRef(position: CellPosition): string {
  return `${columnLetters(position.column)}${position.row}`;
}

export function parseRangeRef(range: string): { from: CellPosition; to: CellPosition } {
  const [first, second, ...rest] = range.split(':');
  if (rest.length > 0) {
    throw new FormatError(`Invalid range: ${range}`);
  }
  const a = parseCellRef(first);
  const b = second === undefined ? a : parseCellRef(second);
  return {
    from: { row: Math.min(a.row, b.row), column: Math.min(a.column, b.column) },
    to: { row: Math.max(a.row, b.row), column: Math.max(a.column, b.column) }
  };
}
