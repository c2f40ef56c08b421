import type { ParseOutcome } from '../types';
import type { SinkParagraph } from '../types/collaborators';
import { KeywordEngine, type KeywordEngineOptions } from '../engine/keywordEngine';
import { scanDirectives } from '../engine/directiveGrammar';
import { DocxAssembler } from './docxGenerator';
import { readDocx, type DocxParagraph, type DocxTable } from './docxReader';

export interface ProcessOptions extends Omit<KeywordEngineOptions, 'sink'> {
  outputPath: string;
}

export interface ProcessResult {
  outputPath: string;
  totalKeywords: number;
  processedParagraphs: number;
}

function hasKeyword(text: string): boolean {
  return text.includes('{{');
}

/**
 * The paragraph's layout with its text replaced; the replacement takes the
 * formatting of the paragraph's first run.
 */
export function replaceParagraphText(paragraph: DocxParagraph, text: string): SinkParagraph {
  const first = paragraph.runs[0] ?? { text: '' };
  return {
    runs: [{ ...first, text }],
    style: paragraph.style,
    alignment: paragraph.alignment,
    indent: paragraph.indent,
    spacing: paragraph.spacing
  };
}

async function processTable(table: DocxTable, engine: KeywordEngine): Promise<{ table: DocxTable; keywords: number }> {
  let keywords = 0;
  const rows: DocxParagraph[][][] = [];

  for (const row of table.rows) {
    const cells: DocxParagraph[][] = [];
    for (const cell of row) {
      const paragraphs: DocxParagraph[] = [];
      for (const paragraph of cell) {
        if (!hasKeyword(paragraph.text)) {
          paragraphs.push(paragraph);
          continue;
        }
        keywords += scanDirectives(paragraph.text).length;
        const text = await engine.parseText(paragraph.text);
        paragraphs.push({ ...replaceParagraphText(paragraph, text), text, styleName: paragraph.styleName });
      }
      cells.push(paragraphs);
    }
    rows.push(cells);
  }

  return { table: { rows }, keywords };
}

async function emitParagraph(
  assembler: DocxAssembler,
  paragraph: DocxParagraph,
  outcome: ParseOutcome
): Promise<void> {
  if (typeof outcome === 'string') {
    assembler.addParagraph(replaceParagraphText(paragraph, outcome));
    return;
  }

  if (outcome.text) {
    assembler.addParagraph(replaceParagraphText(paragraph, outcome.text));
  }
  if (outcome.docxTemplate) {
    await assembler.addSubDocument(outcome.docxTemplate);
  } else if (outcome.table) {
    assembler.addTable(outcome.table);
  }
}

/**
 * Expand every keyword of a Word document and write the result. Body
 * paragraphs may expand into tables or inserted documents, spliced at the
 * paragraph's position; table cells only take text.
 */
export async function processDocument(sourcePath: string, options: ProcessOptions): Promise<ProcessResult> {
  const { outputPath, ...engineOptions } = options;
  const assembler = new DocxAssembler();
  const bodyEngine = new KeywordEngine({ ...engineOptions, sink: assembler });
  const cellEngine = new KeywordEngine(engineOptions);

  let totalKeywords = 0;
  let processedParagraphs = 0;

  try {
    const content = await readDocx(sourcePath);
    console.log(`📝 Processing ${sourcePath} (${content.body.length} body elements)`);

    for (const element of content.body) {
      if (element.type === 'table') {
        const processed = await processTable(element.table, cellEngine);
        totalKeywords += processed.keywords;
        assembler.addCopiedTable(processed.table);
        continue;
      }

      const paragraph = element.paragraph;
      if (!hasKeyword(paragraph.text)) {
        assembler.addParagraph(paragraph);
        continue;
      }

      totalKeywords += scanDirectives(paragraph.text).length;
      processedParagraphs++;
      await emitParagraph(assembler, paragraph, await bodyEngine.parse(paragraph.text));
    }

    await assembler.save(outputPath);
  } finally {
    await Promise.all([bodyEngine.removeGeneratedFiles(), cellEngine.removeGeneratedFiles()]);
  }

  console.log(`✅ Processed ${totalKeywords} keywords in ${processedParagraphs} paragraphs → ${outputPath}`);
  return { outputPath, totalKeywords, processedParagraphs };
}
