import fs from 'fs/promises';
import path from 'path';
import { OutputStore } from '../concurrent/OutputStore.js';
import type { InputRecord } from '../concurrent/types.js';
import { DatabaseConfig } from '../config/database.js';
import { parseCsvObjects } from './csv.js';
import { cellText, rowsToInputRecords, type RecordColumns, type SourceRow } from './records.js';

/**
 * Identity mapping entry (file id → stable document/case ids)
 */
export interface IdentityEntry {
  document_id: string;
  case_id: string;
}

/**
 * Random subset of the records, keeping their original order
 */
export function sampleRecords<T>(records: readonly T[], size: number, random: () => number = Math.random): T[] {
  if (size >= records.length) {
    return [...records];
  }

  // Partial Fisher-Yates over the indices
  const indices = records.map((_, index) => index);
  for (let i = 0; i < size; i++) {
    const j = i + Math.floor(random() * (indices.length - i));
    const picked = indices[j];
    const current = indices[i];
    if (picked !== undefined && current !== undefined) {
      indices[i] = picked;
      indices[j] = current;
    }
  }

  const chosen = indices.slice(0, size).sort((a, b) => a - b);
  const sample: T[] = [];
  for (const index of chosen) {
    const record = records[index];
    if (record !== undefined) {
      sample.push(record);
    }
  }
  return sample;
}

/**
 * Record Loader
 *
 * Reads complaint records from a CSV or JSON file, or from a read-only query.
 */
export class RecordLoader {
  /**
   * Load rows from a .csv or .json file (relative paths resolve against the working directory)
   */
  static async loadRows(filePath: string): Promise<SourceRow[]> {
    const resolvedPath = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
    const ext = path.extname(resolvedPath).toLowerCase();

    if (ext === '.csv') {
      return this.loadFromCSV(resolvedPath);
    }
    if (ext === '.json') {
      return this.loadFromJSON(resolvedPath);
    }

    throw new Error(`Unsupported file format: ${ext}. Use .json or .csv`);
  }

  static async loadFromFile(filePath: string, columns: RecordColumns): Promise<InputRecord[]> {
    const rows = await this.loadRows(filePath);
    const records = rowsToInputRecords(rows, columns);
    console.log(`✅ Loaded ${records.length} records from ${filePath}`);
    return records;
  }

  static async loadFromQuery(query: string, columns: RecordColumns): Promise<InputRecord[]> {
    const records = await DatabaseConfig.loadRecords(query, columns);
    console.log(`✅ Loaded ${records.length} records from database`);
    return records;
  }

  /**
   * Identity mapping read from a CSV with `file_id`, `document_id`, `case_id`
   *
   * Keys are file ids in the form they take in output file names, so they
   * match the `file_id` the parser reads back. Duplicate keys keep their
   * first entry.
   */
  static async loadIdentityMapping(filePath: string): Promise<Map<string, IdentityEntry>> {
    const rows = await this.loadRows(filePath);
    const mapping = new Map<string, IdentityEntry>();

    for (const row of rows) {
      const fileId = cellText(row.file_id)?.trim() ?? '';
      if (fileId === '') {
        continue;
      }

      const key = OutputStore.recordKey(fileId);
      if (mapping.has(key)) {
        continue;
      }
      mapping.set(key, {
        document_id: cellText(row.document_id) ?? '',
        case_id: cellText(row.case_id) ?? '',
      });
    }

    return mapping;
  }

  private static async loadFromCSV(filePath: string): Promise<SourceRow[]> {
    const content = await fs.readFile(filePath, 'utf-8');
    return parseCsvObjects(content).rows;
  }

  private static async loadFromJSON(filePath: string): Promise<SourceRow[]> {
    const content = await fs.readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);

    if (!Array.isArray(parsed)) {
      throw new Error('JSON record file must contain an array');
    }

    return parsed.map((entry: unknown, index) => {
      if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
        throw new Error(`Invalid entry at index ${index}: must be an object`);
      }
      return Object.fromEntries(Object.entries(entry));
    });
  }
}
