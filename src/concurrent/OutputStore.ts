import fs from 'fs/promises';
import path from 'path';
import { toSummaryDocument } from './outcomes.js';
import type { CombinedSummary, ProviderSummary } from './types.js';

const OUTPUT_EXTENSION = '.txt';
const RUN_DATE_PATTERN = /^\d{8}$/;

/**
 * Run timestamp shared by every artifact of a run (local date, YYYYMMDD)
 */
export function formatRunDate(date: Date = new Date()): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

/**
 * Output Store
 *
 * One provider's output directory. Raw model output for a record is stored as
 * `<recordId>_<model>_<YYYYMMDD>.txt`; the record id at the front of the name
 * is what later runs use to skip work already done.
 */
export class OutputStore {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  /**
   * Record id as it appears in file names
   */
  static recordKey(recordId: string): string {
    const sanitized = recordId.replace(/[^a-zA-Z0-9._-]+/g, '_');
    return sanitized.length > 0 ? sanitized : '_';
  }

  /**
   * Model id with path-unsafe characters (and the field separator) replaced
   */
  static modelKey(model: string): string {
    return model.replace(/[^a-zA-Z0-9.-]+/g, '-');
  }

  static outputFileName(recordId: string, model: string, timestamp: string): string {
    return `${OutputStore.recordKey(recordId)}_${OutputStore.modelKey(model)}_${timestamp}${OUTPUT_EXTENSION}`;
  }

  /**
   * Record id embedded in an output file name, or null for anything else
   */
  static parseRecordKey(fileName: string): string | null {
    const baseName = path.basename(fileName);
    if (!baseName.endsWith(OUTPUT_EXTENSION)) {
      return null;
    }

    const parts = baseName.slice(0, -OUTPUT_EXTENSION.length).split('_');
    if (parts.length < 3 || !RUN_DATE_PATTERN.test(parts[parts.length - 1] ?? '')) {
      return null;
    }

    return parts.slice(0, -2).join('_');
  }

  static summaryFileName(timestamp: string): string {
    return `summary_${timestamp}.json`;
  }

  static combinedSummaryFileName(timestamp: string): string {
    return `combined_summary_${timestamp}.json`;
  }

  async ensureDirectory(): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
  }

  /**
   * Record keys that already have an output file in this directory
   */
  async listRecordKeys(): Promise<Set<string>> {
    const keys = new Set<string>();
    const files = await fs.readdir(this.directory);

    for (const file of files) {
      const key = OutputStore.parseRecordKey(file);
      if (key !== null) {
        keys.add(key);
      }
    }

    return keys;
  }

  /**
   * Output file names (not paths) in directory order
   */
  async listOutputFiles(): Promise<string[]> {
    const files = await fs.readdir(this.directory);
    return files.filter((file) => file.endsWith(OUTPUT_EXTENSION)).sort();
  }

  /**
   * Write one record's raw output; the file appears only once fully written
   *
   * @returns The output file name
   */
  async saveOutput(recordId: string, model: string, timestamp: string, content: string): Promise<string> {
    const fileName = OutputStore.outputFileName(recordId, model, timestamp);
    await this.writeAtomic(fileName, content);
    return fileName;
  }

  async writeSummary(summary: ProviderSummary): Promise<string> {
    const fileName = OutputStore.summaryFileName(summary.timestamp);
    await this.writeAtomic(fileName, JSON.stringify(toSummaryDocument(summary), null, 2));
    return path.join(this.directory, fileName);
  }

  async writeCombinedSummary(timestamp: string, summary: CombinedSummary): Promise<string> {
    const fileName = OutputStore.combinedSummaryFileName(timestamp);
    const document = Object.fromEntries(
      Object.entries(summary).map(([provider, providerSummary]) => [provider, toSummaryDocument(providerSummary)])
    );
    await this.writeAtomic(fileName, JSON.stringify(document, null, 2));
    return path.join(this.directory, fileName);
  }

  private async writeAtomic(fileName: string, data: string): Promise<void> {
    const target = path.join(this.directory, fileName);
    const temporary = `${target}.${process.pid}.partial`;

    try {
      await fs.writeFile(temporary, data, 'utf-8');
      await fs.rename(temporary, target);
    } catch (error) {
      await fs.rm(temporary, { force: true });
      throw error;
    }
  }
}
