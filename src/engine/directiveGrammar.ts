import { DIRECTIVE_TYPES } from '../types';
import type { Directive, DirectiveType, KnownDirectiveType, SectionQuery } from '../types';
import { FormatError } from '../errors';

export interface Classification {
  type: DirectiveType;
  fields: string[];
  params: string;
}

function isKnownType(value: string): value is KnownDirectiveType {
  return DIRECTIVE_TYPES.some(type => type === value);
}

/**
 * Decide which resolver owns a directive body. Returns null for an empty
 * body, which callers leave in place untouched.
 */
export function classify(content: string): Classification | null {
  const fields = content.split('!');
  const head = fields[0].trim().toUpperCase();

  if (isKnownType(head)) {
    return { type: head, fields, params: fields.slice(1).join('!') };
  }

  if (!content.trim()) {
    return null;
  }

  // Bare names such as {{Revenue}} are treated as workbook named ranges
  if (!content.includes('!') && !content.includes(':')) {
    return { type: 'XL', fields: ['XL', 'RANGE', content], params: `RANGE!${content}` };
  }

  // Resolved through the same named-range path, but counted separately
  return { type: 'UNKNOWN', fields, params: `RANGE!${content}` };
}

/**
 * Index of the `}}` closing the `{{` at `openAt`, counting nested pairs.
 */
function findClose(text: string, openAt: number): number {
  let depth = 0;
  for (let i = openAt; i < text.length - 1; i++) {
    if (text.startsWith('{{', i)) {
      depth++;
      i++;
    } else if (text.startsWith('}}', i)) {
      depth--;
      if (depth === 0) return i;
      i++;
    }
  }
  return -1;
}

/**
 * Find every `{{...}}` span left to right. Spans may nest
 * (`{{JSON!{{INPUT!text!File!data.json}}!$.name}}`); an unbalanced opener
 * closes at the first `}}`. Spans never cross a line break.
 */
export function scanDirectives(text: string): Directive[] {
  const directives: Directive[] = [];
  let index = 0;

  while (index < text.length) {
    const open = text.indexOf('{{', index);
    if (open === -1) break;

    let close = findClose(text, open);
    if (close === -1) {
      close = text.indexOf('}}', open + 2);
    }
    if (close === -1) break;

    const content = text.slice(open + 2, close);
    if (content.includes('\n')) {
      index = open + 2;
      continue;
    }

    const classification = classify(content);
    if (classification) {
      directives.push({
        rawSpan: text.slice(open, close + 2),
        content,
        offset: open,
        ...classification
      });
    }
    index = close + 2;
  }

  return directives;
}

export function isNestedDirective(value: string): boolean {
  const trimmed = value.trim();
  return trimmed.startsWith('{{') && trimmed.endsWith('}}');
}

/**
 * Split on `separator`, ignoring separators inside `{{...}}` spans.
 */
export function splitOutsideBraces(text: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  let depth = 0;

  for (let i = 0; i < text.length; i++) {
    if (text.startsWith('{{', i)) {
      depth++;
      current += '{{';
      i++;
    } else if (depth > 0 && text.startsWith('}}', i)) {
      depth--;
      current += '}}';
      i++;
    } else if (depth === 0 && text[i] === separator) {
      parts.push(current);
      current = '';
    } else {
      current += text[i];
    }
  }

  parts.push(current);
  return parts;
}

/**
 * Parse `key=value&key=value` pairs. Keys are lowercased, values trimmed.
 */
export function parseKeyValues(params: string): Map<string, string> {
  const values = new Map<string, string>();
  for (const pair of params.split('&')) {
    const separator = pair.indexOf('=');
    if (separator === -1) continue;
    const key = pair.slice(0, separator).trim().toLowerCase();
    if (key) {
      values.set(key, pair.slice(separator + 1).trim());
    }
  }
  return values;
}

/**
 * `Start` or `Start:End`
 */
export function sectionQuery(section: string, includeTitle = true): SectionQuery {
  const separator = section.indexOf(':');
  const start = (separator === -1 ? section : section.slice(0, separator)).trim();
  const end = separator === -1 ? null : section.slice(separator + 1).trim() || null;

  if (!start) {
    throw new FormatError('Section start heading is empty');
  }
  return { start, end, includeTitle };
}

/**
 * `section=Start[:End][&title=false]`
 */
export function parseSectionParam(params: string): SectionQuery {
  const values = parseKeyValues(params);
  const section = values.get('section');
  if (section === undefined) {
    throw new FormatError(`Unknown parameter: ${params}`);
  }

  const title = values.get('title');
  return sectionQuery(section, title === undefined || title.toLowerCase() !== 'false');
}
