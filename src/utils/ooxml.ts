import { Open } from 'unzipper';
import { Parser } from 'xml2js';

export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  /** Only set on `#text` nodes. */
  text: string;
}

const TEXT_NODE = '#text';

// Ordered children with text chunks kept as nodes, so that whitespace-only
// runs such as <w:t xml:space="preserve"> </w:t> survive parsing.
const PARSER_OPTIONS = {
  explicitChildren: true,
  preserveChildrenOrder: true,
  charsAsChildren: true,
  includeWhiteChars: true
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toElement(name: string, raw: unknown): XmlElement {
  if (name === '__text__') {
    const text = isRecord(raw) && typeof raw._ === 'string' ? raw._ : '';
    return { name: TEXT_NODE, attributes: {}, children: [], text };
  }

  if (typeof raw === 'string') {
    return {
      name,
      attributes: {},
      children: [{ name: TEXT_NODE, attributes: {}, children: [], text: raw }],
      text: ''
    };
  }

  const element: XmlElement = { name, attributes: {}, children: [], text: '' };
  if (!isRecord(raw)) {
    return element;
  }

  if (isRecord(raw.$)) {
    for (const [key, value] of Object.entries(raw.$)) {
      if (typeof value === 'string') {
        element.attributes[key] = value;
      }
    }
  }

  if (Array.isArray(raw.$$)) {
    for (const child of raw.$$) {
      if (isRecord(child) && typeof child['#name'] === 'string') {
        element.children.push(toElement(child['#name'], child));
      }
    }
  }

  return element;
}

export async function parseXml(xml: string): Promise<XmlElement> {
  const result: unknown = await new Parser(PARSER_OPTIONS).parseStringPromise(xml);
  if (!isRecord(result)) {
    throw new Error('XML document has no root element');
  }
  const [rootName] = Object.keys(result);
  if (!rootName) {
    throw new Error('XML document has no root element');
  }
  return toElement(rootName, result[rootName]);
}

export function childrenNamed(element: XmlElement, name: string): XmlElement[] {
  return element.children.filter(child => child.name === name);
}

export function firstChild(element: XmlElement | undefined, name: string): XmlElement | undefined {
  return element?.children.find(child => child.name === name);
}

export function descendantsNamed(element: XmlElement, name: string): XmlElement[] {
  const found: XmlElement[] = [];
  for (const child of element.children) {
    if (child.name === name) {
      found.push(child);
    }
    found.push(...descendantsNamed(child, name));
  }
  return found;
}

export function textContent(element: XmlElement): string {
  if (element.name === TEXT_NODE) {
    return element.text;
  }
  return element.children.map(textContent).join('');
}

export function attribute(element: XmlElement | undefined, name: string): string | undefined {
  return element?.attributes[name];
}

/**
 * Read the XML parts of an OOXML package (docx, xlsx) into memory, keyed by path.
 */
export async function readPackageParts(buffer: Buffer): Promise<Map<string, string>> {
  const directory = await Open.buffer(buffer);
  const parts = new Map<string, string>();

  for (const file of directory.files) {
    if (file.type !== 'File' || !/\.(xml|rels)$/i.test(file.path)) continue;
    const content = await file.buffer();
    parts.set(file.path, content.toString('utf-8'));
  }

  return parts;
}
