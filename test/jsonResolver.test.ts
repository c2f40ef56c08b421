import { beforeAll, describe, it, expect } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { applyTransform, renderJsonValue } from '../src/engine/resolvers/jsonResolver';
import { KeywordEngine } from '../src/engine/keywordEngine';
import { createInputValueMap } from '../src/types/collaborators';
import type { DataDirectories } from '../src/engine/resolvers/types';
import { FormatError, UnsupportedError } from '../src/errors';
import { makeDirs, makeTempDir } from './helpers';

const SALES = {
  monthly_totals: [1, '2,000', '$3'],
  region: { name: 'North', tags: ['a', 'b', null, 'c'] },
  active: 'yes',
  count: 0,
  items: [{ name: 'first' }, { name: 'second' }],
  mixed: [1, 'x'],
  flag: true,
  nothing: null
};

describe('applyTransform', () => {
  it('sums numbers written with separators and currency signs', () => {
    expect(applyTransform([1, '2,000', '$3'], 'SUM')).toBe('2004.0');
    expect(applyTransform([], 'SUM')).toBe('0.0');
    expect(applyTransform([1.5, 2, null], 'sum')).toBe('3.5');
    expect(applyTransform(7, 'SUM')).toBe('7');
  });

  it('refuses to sum non-numeric values', () => {
    expect(() => applyTransform([1, 'x'], 'SUM')).toThrow(new FormatError('Cannot SUM non-numeric values in list'));
    expect(() => applyTransform([1, true], 'SUM')).toThrow(FormatError);
  });

  it('joins lists, skipping nulls', () => {
    expect(applyTransform(['a', null, 'b'], 'JOIN(, )')).toBe('a, b');
    expect(applyTransform([1, 2], 'join(-)')).toBe('1-2');
    expect(applyTransform('single', 'JOIN(;)')).toBe('single');
  });

  it('maps truthy values to words', () => {
    expect(applyTransform(true, 'BOOL(Online/Offline)')).toBe('Online');
    expect(applyTransform('off', 'BOOL(Online/Offline)')).toBe('Offline');
    expect(applyTransform('YES', 'BOOL')).toBe('Yes');
    expect(applyTransform(0, 'BOOL')).toBe('No');
  });

  it('rejects unknown transforms', () => {
    expect(() => applyTransform([], 'UPPER')).toThrow(new UnsupportedError('Unknown JSON transform: UPPER'));
  });
});

describe('renderJsonValue', () => {
  it('renders scalars plainly and structures as JSON', () => {
    expect(renderJsonValue(null)).toBe('');
    expect(renderJsonValue('text')).toBe('text');
    expect(renderJsonValue(false)).toBe('false');
    expect(renderJsonValue({ a: [1] })).toBe('{\n  "a": [\n    1\n  ]\n}');
  });
});

describe('JSON directives', () => {
  let dirs: DataDirectories;

  beforeAll(async () => {
    dirs = await makeDirs(await makeTempDir());
    await fs.writeFile(path.join(dirs.json, 'sales.json'), JSON.stringify(SALES));
    await fs.writeFile(path.join(dirs.json, 'small.json'), JSON.stringify({ a: 1 }));
    await fs.writeFile(path.join(dirs.json, 'roots.json'), JSON.stringify(['x', 'y']));
    await fs.writeFile(path.join(dirs.json, 'broken.json'), '{bad');
  });

  function parse(text: string, inputs: Record<string, string> = {}) {
    return new KeywordEngine({ inputs: createInputValueMap(inputs), dirs }).parse(text);
  }

  it('reads values by path', async () => {
    expect(await parse('{{JSON!sales.json!$.region.name}}')).toBe('North');
    expect(await parse('{{JSON!sales.json!$.items[1].name}}')).toBe('second');
    expect(await parse('{{JSON!sales.json!$.flag}}|{{JSON!sales.json!$.nothing}}')).toBe('true|');
  });

  it('applies transforms', async () => {
    expect(await parse('Total: {{JSON!sales.json!$.monthly_totals!SUM}}')).toBe('Total: 2004.0');
    expect(await parse('{{JSON!sales.json!$.region.tags!JOIN(, )}}')).toBe('a, b, c');
    expect(await parse('{{JSON!sales.json!$.active!BOOL(On/Off)}}')).toBe('On');
    expect(await parse('{{JSON!sales.json!$.count!BOOL}}')).toBe('No');
  });

  it('returns whole documents for the root path', async () => {
    expect(await parse('{{JSON!!small.json}}')).toBe('{\n  "a": 1\n}');
    expect(await parse('{{JSON!small.json!$.}}')).toBe('{\n  "a": 1\n}');
    expect(await parse('{{JSON!!roots.json!$!JOIN(-)}}')).toBe('x-y');
  });

  it('resolves directives nested in the parameters', async () => {
    const text = '{{JSON!{{INPUT!text!File!data.json}}!$.region.name}}';
    expect(await parse(text, { 'INPUT!text!File!data.json': 'sales.json' })).toBe('North');
  });

  it('reports path errors', async () => {
    expect(await parse('{{JSON!sales.json!$.missing}}')).toBe('[JSON key not found: missing]');
    expect(await parse('{{JSON!sales.json!$.items[5].name}}')).toBe('[JSON index out of bounds: 5]');
    expect(await parse('{{JSON!sales.json!$.items[-1]}}')).toBe('[JSON index out of bounds: -1]');
    expect(await parse('{{JSON!sales.json!$.items[x]}}')).toBe('[Invalid JSON array index: x]');
    expect(await parse('{{JSON!sales.json!$.region[0]}}')).toBe('[JSON path error: region is not an array]');
    expect(await parse('{{JSON!sales.json!region.name}}')).toBe('[Invalid JSONPath (must start with $.): region.name]');
    expect(await parse('{{JSON!sales.json!$.mixed!SUM}}')).toBe('[Cannot SUM non-numeric values in list]');
  });

  it('reports file and format errors', async () => {
    expect(await parse('{{JSON!sales.json}}')).toBe('[Invalid JSON format: Filename and path required]');
    expect(await parse('{{JSON!nofile.json!$.a}}'))
      .toBe('[JSON file not found: nofile.json (checked in current directory and json folder)]');
    expect(await parse('{{JSON!broken.json!$.a}}'))
      .toBe(`[Error decoding JSON file: ${path.join(dirs.json, 'broken.json')}]`);
  });
});
