import fs from 'fs/promises';
import { isNestedDirective, splitOutsideBraces } from '../directiveGrammar';
import { FormatError, NotFoundError, UnsupportedError, errorMessage } from '../../errors';
import { locateFile } from '../../utils/fileLookup';
import { isNumericText, parseNumericText } from '../../utils/tableUtils';
import { failure, failureFrom, text, type Resolver, type ResolverContext } from './types';

const INDEXED_SEGMENT = /^(.*)\[([^\]]*)\]$/;
const TRANSFORM = /^([A-Za-z]+)(?:\((.*)\))?$/s;
const TRUTHY = ['true', 'yes', '1', 'on'];

interface JsonReference {
  filename: string;
  path: string;
  transform: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function renderJsonValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value, null, 2);
}

function parseReference(params: string): JsonReference | null {
  const parts = splitOutsideBraces(params, '!').map(part => part.trim());

  // JSON!!file[!path[!transform]] addresses the document root by default
  if (parts[0] === '' && parts.length > 1) {
    return { filename: parts[1], path: parts[2] ?? '$', transform: parts[3] || null };
  }
  if (parts.length < 2) {
    return null;
  }
  return { filename: parts[0], path: parts[1], transform: parts[2] || null };
}

async function resolveSegment(segment: string, depth: number, context: ResolverContext): Promise<string> {
  return isNestedDirective(segment) ? (await context.parseNested(segment, depth + 1)).trim() : segment;
}

function lookupKey(current: unknown, key: string): unknown {
  if (!isRecord(current) || !Object.hasOwn(current, key)) {
    throw new NotFoundError(`JSON key not found: ${key}`);
  }
  return current[key];
}

async function walkPath(data: unknown, path: string, depth: number, context: ResolverContext): Promise<unknown> {
  let current = data;

  for (const rawSegment of splitOutsideBraces(path, '.')) {
    if (!rawSegment) continue;

    const indexed = rawSegment.match(INDEXED_SEGMENT);
    if (!indexed) {
      current = lookupKey(current, await resolveSegment(rawSegment, depth, context));
      continue;
    }

    const key = await resolveSegment(indexed[1], depth, context);
    const indexText = indexed[2].trim();
    if (key) {
      current = lookupKey(current, key);
    }
    if (!Array.isArray(current)) {
      throw new FormatError(`JSON path error: ${key || rawSegment} is not an array`);
    }
    // [*] selects the array itself
    if (indexText === '*') continue;

    if (!/^-?\d+$/.test(indexText)) {
      throw new FormatError(`Invalid JSON array index: ${indexText}`);
    }
    const index = Number(indexText);
    if (index < 0 || index >= current.length) {
      throw new NotFoundError(`JSON index out of bounds: ${index}`);
    }
    current = current[index];
  }

  return current;
}

function joinValues(values: unknown[], delimiter: string): string {
  return values
    .filter(value => value !== null && value !== undefined)
    .map(renderJsonValue)
    .join(delimiter);
}

function toBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return TRUTHY.includes(value.trim().toLowerCase());
  if (typeof value === 'number') return value !== 0;
  return false;
}

/**
 * SUM, JOIN(delim) and BOOL(yes/no). The function name is case-insensitive;
 * its argument is used as written.
 */
export function applyTransform(value: unknown, transform: string): string {
  const match = transform.match(TRANSFORM);
  if (!match) {
    throw new FormatError(`Invalid JSON transform: ${transform}`);
  }
  const name = match[1].toUpperCase();
  const argument = match[2];

  switch (name) {
    case 'SUM': {
      if (!Array.isArray(value)) return renderJsonValue(value);
      let total = 0;
      for (const item of value) {
        if (item === null || item === undefined) continue;
        const itemText = String(item);
        if (typeof item === 'boolean' || !isNumericText(itemText)) {
          throw new FormatError('Cannot SUM non-numeric values in list');
        }
        total += parseNumericText(itemText);
      }
      // a sum is always a decimal total: 2004 renders as 2004.0
      return Number.isInteger(total) ? total.toFixed(1) : String(total);
    }
    case 'JOIN':
      return Array.isArray(value) ? joinValues(value, argument ?? '') : renderJsonValue(value);
    case 'BOOL': {
      const [yes, no] = argument ? argument.split('/') : [];
      return toBoolean(value) ? yes || 'Yes' : no || 'No';
    }
    default:
      throw new UnsupportedError(`Unknown JSON transform: ${name}`);
  }
}

export const resolveJson: Resolver = async (directive, depth, context) => {
  try {
    const reference = parseReference(directive.params);
    if (!reference) {
      return failure('Invalid JSON format: Filename and path required');
    }

    const filename = await resolveSegment(reference.filename, depth, context);
    const filePath = await locateFile(filename, context.dirs.json);
    if (!filePath) {
      return failure(`JSON file not found: ${filename} (checked in current directory and json folder)`);
    }

    let data: unknown;
    try {
      data = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    } catch (error) {
      if (error instanceof SyntaxError) {
        return failure(`Error decoding JSON file: ${filePath}`);
      }
      throw error;
    }

    const jsonPath = reference.path === '' || reference.path === '$.' ? '$' : reference.path;
    if (jsonPath === '$') {
      if (reference.transform && Array.isArray(data) && /^join\(/i.test(reference.transform)) {
        return text(applyTransform(data, reference.transform));
      }
      return text(JSON.stringify(data, null, 2));
    }

    if (!jsonPath.startsWith('$.')) {
      return failure(`Invalid JSONPath (must start with $.): ${jsonPath}`);
    }

    const node = await walkPath(data, jsonPath.slice(2), depth, context);
    return text(reference.transform ? applyTransform(node, reference.transform) : renderJsonValue(node));
  } catch (error) {
    console.warn(`⚠️ JSON keyword failed (${directive.rawSpan}):`, errorMessage(error));
    return failureFrom(error, 'JSON');
  }
};
