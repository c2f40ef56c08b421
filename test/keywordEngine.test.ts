import { describe, it, expect } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { KeywordEngine, type KeywordEngineOptions } from '../src/engine/keywordEngine';
import { createInputValueMap, type DocumentSink } from '../src/types/collaborators';
import { RecursionLimitError } from '../src/errors';
import { budgetWorkbook, datedWorkbook, makeDirs, makeTempDir } from './helpers';

const recordingSink: DocumentSink = {
  addParagraph: () => undefined,
  addTable: () => undefined,
  addSubDocument: async () => undefined,
  save: async outputPath => outputPath
};

async function createEngine(options: Partial<KeywordEngineOptions> = {}): Promise<KeywordEngine> {
  return new KeywordEngine({
    inputs: createInputValueMap(),
    dirs: await makeDirs(await makeTempDir()),
    workbook: await budgetWorkbook(),
    ...options
  });
}

describe('KeywordEngine', () => {
  it('expands workbook and input keywords in one line', async () => {
    const engine = await createEngine();
    expect(await engine.parse('Total: {{XL!CELL!Budget!D4}}, Name: {{INPUT!text!Name!Joe}}')).toBe('Total: 500, Name: Joe');
  });

  it('renders date cells as dates', async () => {
    const engine = await createEngine({ workbook: await datedWorkbook() });
    expect(await engine.parse('Due: {{XL!CELL!Plan!A1}}')).toBe('Due: 2024-01-15');
  });

  it('returns text without keywords unchanged', async () => {
    const engine = await createEngine();
    expect(await engine.parse('')).toBe('');
    expect(await engine.parse('No keywords { here }')).toBe('No keywords { here }');
  });

  it('lets a collected answer for the raw keyword override any resolver', async () => {
    const engine = await createEngine({ inputs: createInputValueMap({ '{{XL!CELL!Budget!D4}}': 'n/a' }) });
    expect(await engine.parse('Total: {{XL!CELL!Budget!D4}}')).toBe('Total: n/a');
  });

  it('keeps going after a failing keyword', async () => {
    const engine = await createEngine();
    expect(await engine.parse('A {{XL!CELL!Nope!A1}} B {{INPUT!text!Name!Joe}} C {{JSON!x.json}}'))
      .toBe('A [Error processing XL: Sheet not found: Nope] B Joe C [Invalid JSON format: Filename and path required]');
  });

  it('resolves the other keywords when one names a missing file', async () => {
    const engine = await createEngine();
    const text = '1 {{XL!CELL!Budget!D4}} 2 {{INPUT!text!Name!Joe}} 3 {{JSON!missing.json!$.total}} '
      + '4 {{XL!CELL!Budget!A2}} 5 {{INPUT!text!City!Oslo}}';
    expect(await engine.parse(text)).toBe(
      '1 500 2 Joe 3 [JSON file not found: missing.json (checked in current directory and json folder)] 4 North 5 Oslo'
    );
  });

  it('replaces every occurrence of a repeated keyword', async () => {
    const engine = await createEngine();
    expect(await engine.parse('{{XL!B2}} + {{XL!B2}}')).toBe('100 + 100');
  });

  it('returns a table artifact in table mode', async () => {
    const engine = await createEngine({ sink: recordingSink });
    expect(await engine.parse('Figures: {{XL!RANGE!Budget!A1:B2}}')).toEqual({
      text: 'Figures: ',
      keyword: '{{XL!RANGE!Budget!A1:B2}}',
      table: [['Region', 'Q1'], ['North', 100]]
    });
  });

  it('keeps only the first table and empties the other spans', async () => {
    const engine = await createEngine({ sink: recordingSink });
    expect(await engine.parse('x {{XL!RANGE!Budget!A1:A2}} y {{XL!RANGE!Budget!B1:B2}}')).toEqual({
      text: 'x  y ',
      keyword: '{{XL!RANGE!Budget!A1:A2}}',
      table: [['Region'], ['North']]
    });
  });

  it('prefers a document artifact over a table', async () => {
    const dirs = await makeDirs(await makeTempDir());
    await fs.writeFile(path.join(dirs.templates, 'guide.docx'), 'placeholder');
    const engine = await createEngine({ dirs, sink: recordingSink });

    expect(await engine.parse('{{XL!RANGE!Budget!A1:B2}} {{TEMPLATE!guide.docx}}')).toEqual({
      text: '',
      keyword: '{{TEMPLATE!guide.docx}}',
      docxTemplate: { path: path.join(dirs.templates, 'guide.docx') }
    });
  });

  it('renders ranges as text without a sink', async () => {
    const engine = await createEngine();
    expect(await engine.parse('{{XL!RANGE!Budget!A1:A2}}')).toBe('Region\n------\nNorth ');
  });

  it('reports nesting deeper than the limit', async () => {
    const dirs = await makeDirs(await makeTempDir());
    await fs.writeFile(path.join(dirs.json, 'a.json'), JSON.stringify({ a: 'deep' }));
    const inputs = createInputValueMap({ 'INPUT!text!File!a.json': 'a.json' });
    const text = '{{JSON!{{INPUT!text!File!a.json}}!$.a}}';

    expect(await (await createEngine({ dirs, inputs })).parse(text)).toBe('deep');
    expect(await (await createEngine({ dirs, inputs, maxDepth: 0 })).parse(text)).toBe('[Keyword nesting exceeds 0 levels]');
  });

  it('refuses to parse beyond the depth limit', async () => {
    const engine = await createEngine();
    await expect(engine.parse('x', 9)).rejects.toThrow(RecursionLimitError);
    await expect(engine.parseText('{{INPUT!text!a!b}}', 8)).resolves.toBe('b');
  });
});
