import path from 'path';
import type { TabularDataSource } from '../types/collaborators';
import type { WorkbookProvider } from '../engine/resolvers/types';
import { NotFoundError } from '../errors';
import { isFile } from '../utils/fileLookup';
import { Workbook } from './workbook';

type WorkbookLoader = (filePath: string) => Promise<TabularDataSource>;

/**
 * Workbooks referenced by name from XL directives, opened on first use and
 * kept for the rest of the session. Looks in the excel directory first,
 * then relative to the working directory.
 */
export class WorkbookRegistry implements WorkbookProvider {
  private readonly books = new Map<string, Promise<TabularDataSource>>();

  constructor(
    private readonly excelDir: string,
    private readonly loader: WorkbookLoader = filePath => Workbook.load(filePath)
  ) {}

  register(filename: string, source: TabularDataSource): void {
    this.books.set(filename, Promise.resolve(source));
  }

  open(filename: string): Promise<TabularDataSource> {
    const cached = this.books.get(filename);
    if (cached) {
      return cached;
    }

    const opening = this.load(filename);
    this.books.set(filename, opening);
    // a failed open is not cached, so a later directive can retry
    void opening.catch(() => this.books.delete(filename));
    return opening;
  }

  private async load(filename: string): Promise<TabularDataSource> {
    for (const candidate of [path.join(this.excelDir, filename), filename]) {
      if (await isFile(candidate)) {
        console.log(`📊 Opening workbook ${candidate}`);
        return this.loader(candidate);
      }
    }
    throw new NotFoundError(`Excel file not found: ${filename}`);
  }
}
