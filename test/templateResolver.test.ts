import { beforeAll, describe, it, expect } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { KeywordEngine } from '../src/engine/keywordEngine';
import { readDocx } from '../src/services/docxReader';
import { DocxAssembler } from '../src/services/docxGenerator';
import { createInputValueMap } from '../src/types/collaborators';
import type { DataDirectories } from '../src/engine/resolvers/types';
import type { ParseOutcome } from '../src/types';
import { makeDirs, makeTempDir, writeDocx } from './helpers';

async function sectionParagraphs(outcome: ParseOutcome): Promise<string[]> {
  if (typeof outcome === 'string' || !outcome.docxTemplate) {
    throw new Error(`Expected a document artifact, got ${JSON.stringify(outcome)}`);
  }
  const content = await readDocx(outcome.docxTemplate.path);
  return content.paragraphs.map(paragraph => paragraph.text);
}

describe('TEMPLATE directives', () => {
  let dirs: DataDirectories;
  let engine: KeywordEngine;

  beforeAll(async () => {
    dirs = await makeDirs(await makeTempDir());
    await writeDocx(path.join(dirs.templates, 'guide.docx'), [
      { heading: 'Introduction' },
      { text: 'Welcome to the guide.' },
      { heading: 'Company’s Overview' },
      { text: 'We build tools.' },
      { text: 'We ship often.' },
      { heading: 'Empty' },
      { heading: 'Scope' },
      { text: 'Scope text.' }
    ]);
    engine = new KeywordEngine({ inputs: createInputValueMap(), dirs, sink: new DocxAssembler() });
  });

  it('copies a section under its title', async () => {
    const outcome = await engine.parse("{{TEMPLATE!guide.docx!section=Company's Overview}}");

    expect(typeof outcome === 'string' ? outcome : outcome.text).toBe('');
    expect(await sectionParagraphs(outcome)).toEqual(["Company's Overview", 'We build tools.', 'We ship often.']);
  });

  it('writes section documents to the output directory', async () => {
    const outcome = await engine.parse('{{TEMPLATE!guide.docx!section=Scope}}');
    if (typeof outcome === 'string' || !outcome.docxTemplate) {
      throw new Error('Expected a document artifact');
    }
    expect(path.dirname(outcome.docxTemplate.path)).toBe(dirs.output);
    expect(outcome.keyword).toBe('{{TEMPLATE!guide.docx!section=Scope}}');
  });

  it('deletes the section documents it wrote on request', async () => {
    const outcome = await engine.parse('{{TEMPLATE!guide.docx!section=Scope}}');
    if (typeof outcome === 'string' || !outcome.docxTemplate) {
      throw new Error('Expected a document artifact');
    }
    expect(outcome.docxTemplate.generated).toBe(true);

    await engine.removeGeneratedFiles();
    await expect(fs.access(outcome.docxTemplate.path)).rejects.toThrow();
  });

  it('drops the title on request, also when written as a separate field', async () => {
    expect(await sectionParagraphs(await engine.parse('{{TEMPLATE!guide.docx!section=Introduction&title=false}}')))
      .toEqual(['Welcome to the guide.']);
    expect(await sectionParagraphs(await engine.parse('{{TEMPLATE!guide.docx!section=Introduction!title=false}}')))
      .toEqual(['Welcome to the guide.']);
  });

  it('copies everything between two headings', async () => {
    expect(await sectionParagraphs(await engine.parse('{{TEMPLATE!guide.docx!section=Introduction:Empty}}'))).toEqual([
      'Introduction',
      'Welcome to the guide.',
      'Company’s Overview',
      'We build tools.',
      'We ship often.'
    ]);
  });

  it('references a whole document', async () => {
    const outcome = await engine.parse('See below. {{TEMPLATE!guide.docx}}');
    expect(outcome).toEqual({
      text: 'See below. ',
      keyword: '{{TEMPLATE!guide.docx}}',
      docxTemplate: { path: path.join(dirs.templates, 'guide.docx') }
    });
  });

  it('renders library references as placeholders', async () => {
    expect(await engine.parse('{{TEMPLATE!LIBRARY!Standard!2}}')).toBe('[Template Library: Standard (Version: 2)]');
    expect(await engine.parse('{{TEMPLATE!LIBRARY!Standard}}')).toBe('[Template Library: Standard (Version: DEFAULT)]');
    expect(await engine.parse('{{TEMPLATE!LIBRARY}}')).toBe('[Invalid library template reference]');
  });

  it('reports missing files, sections and parameters', async () => {
    expect(await engine.parse('{{TEMPLATE!nope.docx}}'))
      .toBe(`[Template file not found: ${path.join(dirs.templates, 'nope.docx')}]`);
    expect(await engine.parse('{{TEMPLATE!guide.docx!section=Budget}}')).toBe("[Section 'Budget' not found in guide.docx]");
    expect(await engine.parse('{{TEMPLATE!guide.docx!section=Empty}}')).toBe('[No content found in section]');
    expect(await engine.parse('{{TEMPLATE!guide.docx!foo=bar}}')).toBe('[Unknown parameter: foo=bar]');
    expect(await engine.parse('{{TEMPLATE!}}')).toBe('[Invalid TEMPLATE reference]');
  });
});
