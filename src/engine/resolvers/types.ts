import type { Directive, ResolvedValue } from '../../types';
import { KeywordError, errorMessage } from '../../errors';
import type { InputValueMap, SummarizerService, TabularDataSource } from '../../types/collaborators';

export interface DataDirectories {
  templates: string;
  json: string;
  ai: string;
  excel: string;
  /** Where generated section documents are written. */
  output: string;
}

export interface WorkbookProvider {
  open(filename: string): Promise<TabularDataSource>;
}

export interface ResolverContext {
  dirs: DataDirectories;
  inputs: InputValueMap;
  workbook: TabularDataSource | null;
  workbooks: WorkbookProvider;
  /** Ranges come back as table artifacts instead of aligned text. */
  tableMode: boolean;
  summarizer: SummarizerService | null;
  segmentSummaries: boolean;
  /** Re-enter the engine for a directive embedded in another directive's parameters. */
  parseNested(text: string, depth: number): Promise<string>;
}

export type Resolver = (directive: Directive, depth: number, context: ResolverContext) => Promise<ResolvedValue>;

export function text(value: string): ResolvedValue {
  return { kind: 'text', text: value };
}

export function failure(message: string): ResolvedValue {
  return { kind: 'error', message };
}

/**
 * Error value for an exception caught at a resolver boundary. Known keyword
 * errors keep their message; anything else is labelled with the directive type.
 */
export function failureFrom(error: unknown, type: string): ResolvedValue {
  if (error instanceof KeywordError) {
    return failure(error.message);
  }
  return failure(`Error in ${type}: ${errorMessage(error)}`);
}
