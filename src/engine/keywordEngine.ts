import fs from 'fs/promises';
import type { ArtifactOutcome, Directive, DirectiveType, ParseOutcome, ResolvedValue, SubDocumentRef, TableRows } from '../types';
import type { DocumentSink, InputValueMap, SummarizerService, TabularDataSource } from '../types/collaborators';
import { NotFoundError, RecursionLimitError, errorMessage } from '../errors';
import { scanDirectives } from './directiveGrammar';
import { resolveTabular } from './resolvers/tabularResolver';
import { resolveInput } from './resolvers/inputResolver';
import { resolveTemplate } from './resolvers/templateResolver';
import { resolveJson } from './resolvers/jsonResolver';
import { resolveAi } from './resolvers/aiResolver';
import type { DataDirectories, Resolver, ResolverContext, WorkbookProvider } from './resolvers/types';

export const DEFAULT_MAX_DEPTH = 8;

export interface KeywordEngineOptions {
  inputs: InputValueMap;
  dirs: DataDirectories;
  /** Workbook used by XL directives that name no file. */
  workbook?: TabularDataSource | null;
  workbooks?: WorkbookProvider;
  /** With a sink attached, ranges resolve to table artifacts. */
  sink?: DocumentSink | null;
  summarizer?: SummarizerService | null;
  segmentSummaries?: boolean;
  maxDepth?: number;
}

const RESOLVERS: Record<DirectiveType, Resolver> = {
  XL: resolveTabular,
  UNKNOWN: resolveTabular,
  INPUT: resolveInput,
  TEMPLATE: resolveTemplate,
  JSON: resolveJson,
  AI: resolveAi
};

const noWorkbooks: WorkbookProvider = {
  open: async (filename: string) => {
    throw new NotFoundError(`Excel file not found: ${filename}`);
  }
};

interface PendingArtifact {
  directive: Directive;
  table?: TableRows;
  document?: SubDocumentRef;
}

/**
 * Expands `{{TYPE!...}}` directives in a piece of text.
 *
 * Directives resolve one at a time, left to right. Each resolves to text, a
 * table or a sub-document; a text unit carries at most one artifact, and a
 * sub-document wins over a table. Resolver failures become `[message]` in
 * the text and never abort the call.
 */
export class KeywordEngine {
  private readonly context: ResolverContext;
  private readonly maxDepth: number;
  private readonly generatedFiles: string[] = [];

  constructor(options: KeywordEngineOptions) {
    if (!options || !options.inputs) {
      throw new TypeError('KeywordEngine requires an input value map');
    }
    if (!options.dirs) {
      throw new TypeError('KeywordEngine requires data directories');
    }

    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.context = {
      dirs: options.dirs,
      inputs: options.inputs,
      workbook: options.workbook ?? null,
      workbooks: options.workbooks ?? noWorkbooks,
      tableMode: Boolean(options.sink),
      summarizer: options.summarizer ?? null,
      segmentSummaries: options.segmentSummaries ?? false,
      parseNested: (text, depth) => this.parseText(text, depth)
    };
  }

  async parse(text: string, depth = 0): Promise<ParseOutcome> {
    if (depth > this.maxDepth) {
      throw new RecursionLimitError(this.maxDepth);
    }
    if (!text) {
      return text;
    }

    const directives = scanDirectives(text);
    const replacements: string[] = [];
    let table: PendingArtifact | null = null;
    let subDocument: PendingArtifact | null = null;

    for (const directive of directives) {
      const value = await this.resolve(directive, depth);

      switch (value.kind) {
        case 'table':
          if (!table) {
            table = { directive, table: value.rows };
          }
          replacements.push('');
          break;
        case 'subdocument':
          if (value.document.generated) {
            this.generatedFiles.push(value.document.path);
          }
          if (!subDocument) {
            subDocument = { directive, document: value.document };
          }
          replacements.push('');
          break;
        case 'error':
          replacements.push(`[${value.message}]`);
          break;
        default:
          replacements.push(value.text);
      }
    }

    const result = this.substitute(text, directives, replacements);
    const artifact = subDocument ?? table;
    if (!artifact) {
      return result;
    }

    const outcome: ArtifactOutcome = {
      text: result.trim() ? result : '',
      keyword: artifact.directive.rawSpan
    };
    if (artifact.document) {
      outcome.docxTemplate = artifact.document;
    } else if (artifact.table) {
      outcome.table = artifact.table;
    }
    return outcome;
  }

  /**
   * Delete the section documents written while parsing. Call once the
   * output that embeds them has been saved.
   */
  async removeGeneratedFiles(): Promise<void> {
    const files = this.generatedFiles.splice(0);
    await Promise.all(files.map(file => fs.unlink(file).catch(console.error)));
  }

  /**
   * Parse and keep only the text, for directives nested in other directives.
   */
  async parseText(text: string, depth = 0): Promise<string> {
    const outcome = await this.parse(text, depth);
    return typeof outcome === 'string' ? outcome : outcome.text;
  }

  private async resolve(directive: Directive, depth: number): Promise<ResolvedValue> {
    // Collected answers keyed by the raw span short-circuit every resolver
    const override = this.context.inputs.get(directive.rawSpan);
    if (override !== undefined) {
      return { kind: 'text', text: override };
    }

    try {
      return await RESOLVERS[directive.type](directive, depth, this.context);
    } catch (error) {
      if (error instanceof RecursionLimitError) {
        console.warn(`⚠️ ${error.message}: ${directive.rawSpan}`);
        return { kind: 'error', message: error.message };
      }
      console.error(`❌ Unexpected failure resolving ${directive.rawSpan}:`, error);
      return { kind: 'error', message: `Error in ${directive.type}: ${errorMessage(error)}` };
    }
  }

  private substitute(text: string, directives: Directive[], replacements: string[]): string {
    let result = '';
    let cursor = 0;
    directives.forEach((directive, index) => {
      result += text.slice(cursor, directive.offset) + replacements[index];
      cursor = directive.offset + directive.rawSpan.length;
    });
    return result + text.slice(cursor);
  }
}
