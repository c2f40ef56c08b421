import type { Directive, KeywordSummary, XlSubtype } from '../types';
import { scanDirectives } from '../engine/directiveGrammar';
import { describeInputField } from '../engine/resolvers/inputResolver';
import { readDocx, type DocxContent } from './docxReader';

const XL_SUBTYPES: XlSubtype[] = ['CELL', 'LAST', 'RANGE', 'COLUMN'];
const WORKBOOK_FILE = /\.xlsx?$/i;

function emptySummary(): KeywordSummary {
  return {
    totalKeywords: 0,
    xl: { CELL: 0, LAST: 0, RANGE: 0, COLUMN: 0, OTHER: 0 },
    input: { text: 0, area: 0, date: 0, select: 0, check: 0, other: 0 },
    template: 0,
    json: 0,
    ai: 0,
    other: 0,
    needsExcel: false,
    workbookFiles: [],
    inputFields: []
  };
}

function xlSubtype(parts: string[]): XlSubtype {
  const head = (parts[0] ?? '').trim().toUpperCase();
  const known = XL_SUBTYPES.find(subtype => subtype === head);
  if (known) return known;

  // {{XL!Sales}} names a range
  return parts.length === 1 && !head.includes(':') ? 'RANGE' : 'OTHER';
}

function countDirective(summary: KeywordSummary, directive: Directive, seenInputs: Set<string>): void {
  summary.totalKeywords++;

  switch (directive.type) {
    case 'XL': {
      let parts = directive.params.split('!');
      if (WORKBOOK_FILE.test(parts[0].trim())) {
        const file = parts[0].trim();
        if (!summary.workbookFiles.includes(file)) {
          summary.workbookFiles.push(file);
        }
        parts = parts.slice(1);
      } else {
        summary.needsExcel = true;
      }
      summary.xl[xlSubtype(parts)]++;
      break;
    }
    case 'INPUT': {
      const field = describeInputField(directive.rawSpan, directive.params);
      summary.input[field.kind === 'unknown' ? 'other' : field.kind]++;
      if (!seenInputs.has(directive.rawSpan)) {
        seenInputs.add(directive.rawSpan);
        summary.inputFields.push(field);
      }
      break;
    }
    case 'TEMPLATE':
      summary.template++;
      break;
    case 'JSON':
      summary.json++;
      break;
    case 'AI':
      summary.ai++;
      break;
    default:
      summary.other++;
  }
}

function visit(summary: KeywordSummary, text: string, seenInputs: Set<string>): void {
  for (const directive of scanDirectives(text)) {
    countDirective(summary, directive, seenInputs);
    // directives embedded in parameters, e.g. a file name asked from the user
    if (directive.params.includes('{{')) {
      visit(summary, directive.params, seenInputs);
    }
  }
}

/**
 * Count the keywords in a list of texts and collect what a form needs to
 * ask for before the document can be processed.
 */
export function analyzeKeywords(texts: Iterable<string>): KeywordSummary {
  const summary = emptySummary();
  const seenInputs = new Set<string>();
  for (const text of texts) {
    visit(summary, text, seenInputs);
  }
  return summary;
}

export function documentTexts(content: DocxContent): string[] {
  const texts: string[] = [];
  for (const element of content.body) {
    if (element.type === 'paragraph') {
      texts.push(element.paragraph.text);
      continue;
    }
    for (const row of element.table.rows) {
      for (const cell of row) {
        texts.push(...cell.map(paragraph => paragraph.text));
      }
    }
  }
  return texts;
}

export async function analyzeDocument(filePath: string): Promise<KeywordSummary> {
  console.log(`🔍 Analyzing keywords in ${filePath}`);
  const summary = analyzeKeywords(documentTexts(await readDocx(filePath)));
  console.log(`  Found ${summary.totalKeywords} keywords, ${summary.inputFields.length} input fields`);
  return summary;
}
