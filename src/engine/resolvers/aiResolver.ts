import fs from 'fs/promises';
import path from 'path';
import mammoth from 'mammoth';
import { parseKeyValues, sectionQuery } from '../directiveGrammar';
import { findSection, sectionText } from '../sectionLocator';
import { paragraphBlocks, readDocx } from '../../services/docxReader';
import { BackendError, KeywordError, NotFoundError, UnsupportedError, errorMessage } from '../../errors';
import { locateFile } from '../../utils/fileLookup';
import { segmentParagraphs, truncateWords } from '../../utils/textSegmenter';
import { failure, failureFrom, text, type Resolver } from './types';

const DEFAULT_WORDS = 100;
const SUMMARY_TEMPERATURE = 0.5;

function wordLimit(value: string | undefined): number {
  const words = value === undefined ? NaN : parseInt(value, 10);
  return Number.isInteger(words) && words > 0 ? words : DEFAULT_WORDS;
}

async function readSection(sourcePath: string, sourceName: string, section: string): Promise<string> {
  const query = sectionQuery(section);
  const content = await readDocx(sourcePath);
  const paragraphs = content.paragraphs.filter(paragraph => paragraph.text.trim().length > 0);
  const blocks = paragraphBlocks(paragraphs);

  const match = findSection(blocks, query);
  if (!match) {
    throw new NotFoundError(`Section '${query.start}' not found in ${sourceName}`);
  }
  return sectionText(blocks, match);
}

async function extractText(sourcePath: string, sourceName: string, section: string | undefined): Promise<string> {
  const extension = path.extname(sourcePath).toLowerCase();

  try {
    if (extension === '.docx') {
      if (section) {
        return await readSection(sourcePath, sourceName, section);
      }
      const result = await mammoth.extractRawText({ path: sourcePath });
      if (result.messages.length > 0) {
        console.warn('Mammoth warnings:', result.messages);
      }
      return result.value;
    }
    if (extension === '.txt') {
      return await fs.readFile(sourcePath, 'utf-8');
    }
  } catch (error) {
    if (error instanceof KeywordError) throw error;
    throw new BackendError(`Error extracting text: ${errorMessage(error)}`);
  }

  throw new UnsupportedError(`Unsupported document type: ${sourcePath}. Please use .docx or .txt files`);
}

async function readPrompt(promptRef: string, aiDir: string): Promise<string> {
  if (!promptRef.toLowerCase().endsWith('.txt')) {
    return promptRef;
  }
  const promptPath = await locateFile(promptRef, aiDir);
  if (!promptPath) {
    throw new NotFoundError(`Prompt file not found: ${promptRef} (checked in current directory and ai folder)`);
  }
  return (await fs.readFile(promptPath, 'utf-8')).trim();
}

export const resolveAi: Resolver = async (directive, _depth, context) => {
  const parts = directive.params.split('!');
  if (parts.length < 2 || !parts[0].trim()) {
    return failure('Invalid AI format: Source document and prompt required');
  }

  const sourceName = parts[0].trim();
  const promptRef = parts[1].trim();
  const options = parseKeyValues(parts.slice(2).join('&'));
  const maxWords = wordLimit(options.get('words'));

  try {
    const sourcePath = await locateFile(sourceName, context.dirs.ai);
    if (!sourcePath) {
      return failure(`Source document not found: ${sourceName} (checked in current directory and ai folder)`);
    }

    const documentText = await extractText(sourcePath, sourceName, options.get('section'));
    if (!documentText.trim()) {
      return failure('No text found to summarize');
    }

    const prompt = await readPrompt(promptRef, context.dirs.ai);
    if (!context.summarizer) {
      return failure('AI summarizer not configured');
    }

    let summary: string;
    try {
      summary = await context.summarizer.summarize({
        text: documentText,
        prompt,
        maxWords,
        temperature: SUMMARY_TEMPERATURE
      });
    } catch (error) {
      throw new BackendError(`Error generating summary: ${errorMessage(error)}`);
    }

    summary = truncateWords(summary, maxWords);
    return text(context.segmentSummaries ? segmentParagraphs(summary) : summary);
  } catch (error) {
    console.warn(`⚠️ AI keyword failed (${directive.rawSpan}):`, errorMessage(error));
    return failureFrom(error, 'AI');
  }
};
