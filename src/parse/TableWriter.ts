import fs from 'fs/promises';
import path from 'path';
import { stringifyCsv } from '../utils/csv.js';
import {
  HARM_COOCCURRENCE_COLUMNS,
  HARM_TYPE_COUNT_COLUMNS,
  INCIDENT_LOCATION_COLUMNS,
  harmCooccurrence,
  harmTypeCounts,
  incidentLocations,
} from './analysis.js';
import {
  DEFENDANT_COLUMNS,
  HARM_COLUMNS,
  HARM_DEFENDANT_COLUMNS,
  HARM_PLAINTIFF_COLUMNS,
  INCIDENT_COLUMNS,
  PARSE_FAILURE_COLUMNS,
  PLAINTIFF_COLUMNS,
  type AssembledTables,
  type ParseFailure,
} from './tables.js';

export const TABLE_FILES = {
  incidents: 'incidents_extract.csv',
  plaintiffs: 'plaintiffs_extract.csv',
  defendants: 'defendants_extract.csv',
  harms: 'harms_extract.csv',
  harmsPlaintiffs: 'harms_plaintiffs.csv',
  harmsDefendants: 'harms_defendants.csv',
  failures: 'parse_failures.csv',
  incidentLocations: 'incident_locations.csv',
  harmTypeCounts: 'harm_type_counts.csv',
  harmCooccurrence: 'harm_cooccurrence.csv',
} as const;

/**
 * Write the emitted tables and the location/harm analysis as CSV
 *
 * @returns Paths written, in a fixed order
 */
export async function writeTables(
  outputDir: string,
  tables: AssembledTables,
  failures: readonly ParseFailure[]
): Promise<string[]> {
  await fs.mkdir(outputDir, { recursive: true });

  const outputs: [string, string][] = [
    [TABLE_FILES.incidents, stringifyCsv(INCIDENT_COLUMNS, tables.incidents)],
    [TABLE_FILES.plaintiffs, stringifyCsv(PLAINTIFF_COLUMNS, tables.plaintiffs)],
    [TABLE_FILES.defendants, stringifyCsv(DEFENDANT_COLUMNS, tables.defendants)],
    [TABLE_FILES.harms, stringifyCsv(HARM_COLUMNS, tables.harms)],
    [TABLE_FILES.harmsPlaintiffs, stringifyCsv(HARM_PLAINTIFF_COLUMNS, tables.harmsPlaintiffs)],
    [TABLE_FILES.harmsDefendants, stringifyCsv(HARM_DEFENDANT_COLUMNS, tables.harmsDefendants)],
    [TABLE_FILES.failures, stringifyCsv(PARSE_FAILURE_COLUMNS, failures)],
    [TABLE_FILES.incidentLocations, stringifyCsv(INCIDENT_LOCATION_COLUMNS, incidentLocations(tables.incidents))],
    [TABLE_FILES.harmTypeCounts, stringifyCsv(HARM_TYPE_COUNT_COLUMNS, harmTypeCounts(tables.harms))],
    [TABLE_FILES.harmCooccurrence, stringifyCsv(HARM_COOCCURRENCE_COLUMNS, harmCooccurrence(tables.harms))],
  ];

  const written: string[] = [];
  for (const [fileName, content] of outputs) {
    const filePath = path.join(outputDir, fileName);
    await fs.writeFile(filePath, content, 'utf-8');
    written.push(filePath);
  }

  return written;
}
