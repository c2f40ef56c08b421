import type { CellValue, TableRows } from '../types';

export function cellText(value: CellValue): string {
  return value === null ? '' : String(value);
}

/**
 * True when the text reads as a number once thousands separators and
 * dollar signs are dropped. Empty text is not numeric.
 */
export function isNumericText(text: string): boolean {
  const cleaned = text.replace(/[,$]/g, '').trim();
  return cleaned.length > 0 && !Number.isNaN(Number(cleaned));
}

export function parseNumericText(text: string): number {
  return Number(text.replace(/[,$]/g, '').trim());
}

/** `1234.5` → `1,234.50` */
export function formatTableNumber(value: number): string {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2
  });
}

export function columnCount(rows: TableRows): number {
  return rows.reduce((max, row) => Math.max(max, row.length), 0);
}

/**
 * Render a grid as aligned monospace text: numbers right-justified, text
 * left-justified, ` | ` between columns and a dashed rule under the header
 * row when there is more than one row.
 */
export function formatTextTable(rows: TableRows): string {
  const widths = Array.from({ length: columnCount(rows) }, () => 0);
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index], cellText(cell).length);
    });
  }

  const lines: string[] = [];
  rows.forEach((row, rowIndex) => {
    const cells = row.map((cell, index) => {
      const text = cellText(cell);
      return isNumericText(text) ? text.padStart(widths[index]) : text.padEnd(widths[index]);
    });
    lines.push(cells.join(' | '));

    if (rowIndex === 0 && rows.length > 1) {
      lines.push(widths.map(width => '-'.repeat(width)).join('-+-'));
    }
  });

  return lines.join('\n');
}
