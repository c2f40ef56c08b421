import path from 'path';
import { parseSectionParam } from '../directiveGrammar';
import { findSection } from '../sectionLocator';
import { readDocx, paragraphBlocks } from '../../services/docxReader';
import { writeSectionDocument } from '../../services/docxGenerator';
import { isFile } from '../../utils/fileLookup';
import { errorMessage } from '../../errors';
import type { ResolvedValue } from '../../types';
import { failure, failureFrom, text, type Resolver, type ResolverContext } from './types';

function libraryPlaceholder(parts: string[]): ResolvedValue {
  const name = (parts[1] ?? '').trim();
  if (!name) {
    return failure('Invalid library template reference');
  }
  const version = (parts[2] ?? '').trim() || 'DEFAULT';
  return text(`[Template Library: ${name} (Version: ${version})]`);
}

async function extractSection(
  templatePath: string,
  filename: string,
  params: string,
  context: ResolverContext
): Promise<ResolvedValue> {
  const query = parseSectionParam(params);
  const content = await readDocx(templatePath);
  const match = findSection(paragraphBlocks(content.paragraphs), query);

  if (!match) {
    return failure(`Section '${query.start}' not found in ${filename}`);
  }

  const paragraphs = content.paragraphs.slice(match.startIndex, match.endIndex);
  if (!paragraphs.length) {
    return failure('No content found in section');
  }

  console.log(`📄 Section '${match.matchedHeading}' (${match.matchTier}) copied from ${filename}: ${paragraphs.length} paragraphs`);
  const sectionPath = await writeSectionDocument(paragraphs, query.includeTitle ? query.start : null, context.dirs.output);
  return { kind: 'subdocument', document: { path: sectionPath, generated: true } };
}

export const resolveTemplate: Resolver = async (directive, _depth, context) => {
  const parts = directive.params.split('!');
  const filename = parts[0].trim();
  if (!filename) {
    return failure('Invalid TEMPLATE reference');
  }

  try {
    if (filename.toUpperCase() === 'LIBRARY') {
      return libraryPlaceholder(parts);
    }

    const templatePath = path.join(context.dirs.templates, filename);
    if (!(await isFile(templatePath))) {
      return failure(`Template file not found: ${templatePath}`);
    }

    // Extra `!` fields read as further `&` options, e.g. section=Intro!title=false
    const params = parts.slice(1).join('&').trim();
    const isWordFile = filename.toLowerCase().endsWith('.docx');

    if (isWordFile && params.toLowerCase().startsWith('section=')) {
      return await extractSection(templatePath, filename, params, context);
    }
    if (isWordFile && !params) {
      return { kind: 'subdocument', document: { path: templatePath } };
    }
    return failure(`Unknown parameter: ${params}`);
  } catch (error) {
    console.warn(`⚠️ TEMPLATE keyword failed (${directive.rawSpan}):`, errorMessage(error));
    return failureFrom(error, 'TEMPLATE');
  }
};
