import {
  AlignmentType,
  Document,
  HeadingLevel,
  Packer,
  Paragraph,
  ShadingType,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType
} from 'docx';
import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { CellValue, SubDocumentRef, TableRows } from '../types';
import type { DocumentSink, SinkParagraph, SinkRun } from '../types/collaborators';
import { errorMessage } from '../errors';
import { cellText, columnCount, formatTableNumber, isNumericText } from '../utils/tableUtils';
import { readDocx, type DocxParagraph, type DocxTable } from './docxReader';

type BodyChild = Paragraph | Table;

const HEADER_FILL = 'D9D9D9';
const STRIPE_FILL = 'F5F5F5';
const TABLE_FONT_SIZE = 20; // 10pt in half-points
const TABLE_CELL_SPACING = 60; // 3pt in twips

// Styles the generated document defines, so they can be carried over by id
const PORTABLE_STYLES = /^(Heading[1-6]|Title)$/;

const ALIGNMENTS = {
  left: AlignmentType.LEFT,
  center: AlignmentType.CENTER,
  right: AlignmentType.RIGHT,
  both: AlignmentType.JUSTIFIED
};

function createTextRuns(run: SinkRun): TextRun[] {
  return run.text.split('\n').map((line, index) => new TextRun({
    text: line,
    break: index > 0 ? 1 : undefined,
    bold: run.bold,
    italics: run.italic,
    underline: run.underline ? {} : undefined,
    size: run.size,
    font: run.font,
    color: run.color
  }));
}

/**
 * Rebuild a paragraph with its run formatting and paragraph layout.
 */
export function buildParagraph(paragraph: SinkParagraph): Paragraph {
  return new Paragraph({
    children: paragraph.runs.flatMap(createTextRuns),
    style: paragraph.style && PORTABLE_STYLES.test(paragraph.style) ? paragraph.style : undefined,
    alignment: paragraph.alignment ? ALIGNMENTS[paragraph.alignment] : undefined,
    indent: paragraph.indent,
    spacing: paragraph.spacing
  });
}

function plainParagraph(text: string): Paragraph {
  return new Paragraph({ children: [new TextRun({ text })] });
}

function buildCopiedParagraph(paragraph: DocxParagraph): Paragraph {
  try {
    return buildParagraph(paragraph);
  } catch (error) {
    console.warn('⚠️ Could not copy paragraph formatting, keeping text only:', errorMessage(error));
    return plainParagraph(paragraph.text);
  }
}

function tableCellText(value: CellValue): string {
  return typeof value === 'number' ? formatTableNumber(value) : cellText(value);
}

/**
 * Word table for a grid of values: shaded bold header row, numbers
 * right-aligned with two decimals, light stripes on alternate body rows.
 */
export function buildTable(rows: TableRows): Table {
  const width = columnCount(rows);

  return new Table({
    width: { size: 100, type: WidthType.PERCENTAGE },
    rows: rows.map((row, rowIndex) => {
      const isHeader = rowIndex === 0;
      const fill = isHeader ? HEADER_FILL : rowIndex % 2 === 1 ? STRIPE_FILL : undefined;

      return new TableRow({
        tableHeader: isHeader,
        children: Array.from({ length: width }, (_unused, columnIndex) => {
          const value = row[columnIndex] ?? null;
          const text = tableCellText(value);
          const alignment = isHeader
            ? AlignmentType.CENTER
            : isNumericText(cellText(value)) ? AlignmentType.RIGHT : AlignmentType.LEFT;

          return new TableCell({
            shading: fill ? { fill, type: ShadingType.CLEAR, color: 'auto' } : undefined,
            children: [
              new Paragraph({
                alignment,
                spacing: { before: TABLE_CELL_SPACING, after: TABLE_CELL_SPACING },
                children: [new TextRun({ text, bold: isHeader || undefined, size: TABLE_FONT_SIZE })]
              })
            ]
          });
        })
      });
    })
  });
}

function copyTable(table: DocxTable): Table {
  const width = Math.max(1, ...table.rows.map(row => row.length));
  return new Table({
    width: { size: 100, type: WidthType.PERCENTAGE },
    rows: table.rows.map(row => new TableRow({
      children: Array.from({ length: width }, (_unused, columnIndex) => {
        const paragraphs = row[columnIndex] ?? [];
        return new TableCell({
          children: paragraphs.length ? paragraphs.map(buildCopiedParagraph) : [new Paragraph({})]
        });
      })
    }))
  });
}

async function writeDocument(children: BodyChild[], outputPath: string): Promise<string> {
  const doc = new Document({
    sections: [{
      properties: {},
      children
    }]
  });

  const buffer = await Packer.toBuffer(doc);
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, buffer);
  return outputPath;
}

/**
 * Write a standalone document holding a copied section, optionally headed by
 * the section title. Returns the new file's path.
 */
export async function writeSectionDocument(
  paragraphs: DocxParagraph[],
  title: string | null,
  outputDir: string
): Promise<string> {
  const children: BodyChild[] = [];

  if (title !== null) {
    children.push(new Paragraph({ text: title, heading: HeadingLevel.HEADING_1 }));
  }
  children.push(...paragraphs.map(buildCopiedParagraph));

  return writeDocument(children, path.join(outputDir, `section-${uuidv4()}.docx`));
}

/**
 * Collects the body of an output document while keywords are being expanded.
 */
export class DocxAssembler implements DocumentSink {
  private readonly children: BodyChild[] = [];

  get length(): number {
    return this.children.length;
  }

  addParagraph(paragraph: SinkParagraph): void {
    this.children.push(buildParagraph(paragraph));
  }

  addTable(rows: TableRows): void {
    this.children.push(buildTable(rows));
    this.children.push(new Paragraph({}));
  }

  addCopiedTable(table: DocxTable): void {
    this.children.push(copyTable(table));
  }

  async addSubDocument(document: SubDocumentRef): Promise<void> {
    const content = await readDocx(document.path);
    for (const element of content.body) {
      if (element.type === 'paragraph') {
        this.children.push(buildCopiedParagraph(element.paragraph));
      } else {
        this.children.push(copyTable(element.table));
      }
    }
  }

  async save(outputPath: string): Promise<string> {
    return writeDocument(this.children, outputPath);
  }
}
