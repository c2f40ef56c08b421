import fs from 'fs/promises';
import type { Block } from '../types';
import type { SinkParagraph, SinkRun } from '../types/collaborators';
import { FormatError } from '../errors';
import { looksLikeHeading } from '../engine/sectionLocator';
import {
  attribute,
  childrenNamed,
  firstChild,
  parseXml,
  readPackageParts,
  type XmlElement
} from '../utils/ooxml';

export interface DocxParagraph extends SinkParagraph {
  text: string;
  styleName?: string;
}

export interface DocxTable {
  /** rows → cells → paragraphs */
  rows: DocxParagraph[][][];
}

export type DocxBodyElement =
  | { type: 'paragraph'; paragraph: DocxParagraph }
  | { type: 'table'; table: DocxTable };

export interface DocxContent {
  body: DocxBodyElement[];
  /** Top-level body paragraphs only, in order. */
  paragraphs: DocxParagraph[];
}

const DOCUMENT_PART = 'word/document.xml';
const STYLES_PART = 'word/styles.xml';

// Inline containers whose runs belong to the enclosing paragraph
const RUN_CONTAINERS = new Set(['w:hyperlink', 'w:ins', 'w:smartTag', 'w:sdtContent', 'w:sdt', 'w:fldSimple']);

function isToggleOn(element: XmlElement | undefined): boolean | undefined {
  if (!element) return undefined;
  const value = attribute(element, 'w:val');
  return value === undefined || !['0', 'false', 'off', 'none'].includes(value.toLowerCase());
}

function numberAttribute(element: XmlElement | undefined, ...names: string[]): number | undefined {
  for (const name of names) {
    const value = attribute(element, name);
    if (value !== undefined && /^-?\d+$/.test(value)) {
      return Number(value);
    }
  }
  return undefined;
}

function alignmentOf(value: string | undefined): SinkParagraph['alignment'] {
  switch (value) {
    case 'left':
    case 'start':
      return 'left';
    case 'center':
      return 'center';
    case 'right':
    case 'end':
      return 'right';
    case 'both':
    case 'distribute':
      return 'both';
    default:
      return undefined;
  }
}

function runText(run: XmlElement): string {
  let text = '';
  for (const child of run.children) {
    switch (child.name) {
      case 'w:t':
        text += child.children.map(node => node.text).join('');
        break;
      case 'w:tab':
        text += '\t';
        break;
      case 'w:br':
      case 'w:cr':
        text += '\n';
        break;
    }
  }
  return text;
}

function readRun(run: XmlElement): SinkRun {
  const properties = firstChild(run, 'w:rPr');
  const result: SinkRun = { text: runText(run) };

  const bold = isToggleOn(firstChild(properties, 'w:b'));
  const italic = isToggleOn(firstChild(properties, 'w:i'));
  const underline = isToggleOn(firstChild(properties, 'w:u'));
  const size = numberAttribute(firstChild(properties, 'w:sz'), 'w:val');
  const font = attribute(firstChild(properties, 'w:rFonts'), 'w:ascii')
    ?? attribute(firstChild(properties, 'w:rFonts'), 'w:hAnsi');
  const color = attribute(firstChild(properties, 'w:color'), 'w:val');

  if (bold !== undefined) result.bold = bold;
  if (italic !== undefined) result.italic = italic;
  if (underline !== undefined) result.underline = underline;
  if (size !== undefined) result.size = size;
  if (font) result.font = font;
  if (color && /^[0-9A-Fa-f]{6}$/.test(color)) result.color = color.toUpperCase();
  return result;
}

function collectRuns(container: XmlElement): SinkRun[] {
  const runs: SinkRun[] = [];
  for (const child of container.children) {
    if (child.name === 'w:r') {
      runs.push(readRun(child));
    } else if (RUN_CONTAINERS.has(child.name)) {
      runs.push(...collectRuns(child));
    }
  }
  return runs;
}

function readParagraph(element: XmlElement, styleNames: Map<string, string>): DocxParagraph {
  const properties = firstChild(element, 'w:pPr');
  const runs = collectRuns(element);
  const paragraph: DocxParagraph = {
    text: runs.map(run => run.text).join(''),
    runs
  };

  const styleId = attribute(firstChild(properties, 'w:pStyle'), 'w:val');
  if (styleId) {
    paragraph.style = styleId;
    paragraph.styleName = styleNames.get(styleId) ?? styleId;
  }

  const alignment = alignmentOf(attribute(firstChild(properties, 'w:jc'), 'w:val'));
  if (alignment) paragraph.alignment = alignment;

  const indent = firstChild(properties, 'w:ind');
  if (indent) {
    paragraph.indent = {
      left: numberAttribute(indent, 'w:left', 'w:start'),
      right: numberAttribute(indent, 'w:right', 'w:end'),
      firstLine: numberAttribute(indent, 'w:firstLine'),
      hanging: numberAttribute(indent, 'w:hanging')
    };
  }

  const spacing = firstChild(properties, 'w:spacing');
  if (spacing) {
    paragraph.spacing = {
      before: numberAttribute(spacing, 'w:before'),
      after: numberAttribute(spacing, 'w:after'),
      line: numberAttribute(spacing, 'w:line')
    };
  }

  return paragraph;
}

function readTable(element: XmlElement, styleNames: Map<string, string>): DocxTable {
  return {
    rows: childrenNamed(element, 'w:tr').map(row =>
      childrenNamed(row, 'w:tc').map(cell =>
        childrenNamed(cell, 'w:p').map(paragraph => readParagraph(paragraph, styleNames))
      )
    )
  };
}

async function readStyleNames(xml: string | undefined): Promise<Map<string, string>> {
  const names = new Map<string, string>();
  if (!xml) return names;

  const root = await parseXml(xml);
  for (const style of childrenNamed(root, 'w:style')) {
    const id = attribute(style, 'w:styleId');
    const name = attribute(firstChild(style, 'w:name'), 'w:val');
    if (id && name) {
      names.set(id, name);
    }
  }
  return names;
}

export async function readDocxBuffer(buffer: Buffer): Promise<DocxContent> {
  const parts = await readPackageParts(buffer);
  const documentXml = parts.get(DOCUMENT_PART);
  if (!documentXml) {
    throw new FormatError('Not a Word document: word/document.xml is missing');
  }

  const styleNames = await readStyleNames(parts.get(STYLES_PART));
  const root = await parseXml(documentXml);
  const bodyNode = firstChild(root, 'w:body');

  const body: DocxBodyElement[] = [];
  for (const child of bodyNode?.children ?? []) {
    if (child.name === 'w:p') {
      body.push({ type: 'paragraph', paragraph: readParagraph(child, styleNames) });
    } else if (child.name === 'w:tbl') {
      body.push({ type: 'table', table: readTable(child, styleNames) });
    }
  }

  const paragraphs = body.flatMap(element => element.type === 'paragraph' ? [element.paragraph] : []);
  return { body, paragraphs };
}

export async function readDocx(filePath: string): Promise<DocxContent> {
  const buffer = await fs.readFile(filePath);
  return readDocxBuffer(buffer);
}

export function paragraphBlocks(paragraphs: DocxParagraph[]): Block[] {
  return paragraphs.map(paragraph => ({
    text: paragraph.text.trim(),
    isHeading: looksLikeHeading(paragraph.text, paragraph.styleName)
  }));
}
