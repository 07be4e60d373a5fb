import fs from 'fs/promises';
import path from 'path';
import type { SchemaObject } from 'ajv';
import { v4 as uuidv4 } from 'uuid';
import { OutputStore } from '../concurrent/OutputStore.js';
import { MalformedExtractionError, describeError } from '../core/errors.js';
import { ComponentLogger } from '../utils/logger.js';
import { validator } from '../utils/validators.js';
import type {
  DefendantField,
  DefendantRow,
  ExtractionTables,
  HarmRow,
  IncidentField,
  IncidentRow,
  ParseFailure,
  PlaintiffField,
  PlaintiffRow,
} from './tables.js';

type ExtractedObject = Record<string, unknown>;

interface ExtractedIncident extends ExtractedObject {
  plaintiffs?: ExtractedObject[] | null;
  defendants?: ExtractedObject[] | null;
  harms?: ExtractedObject[] | null;
}

type ExtractionDocument = ExtractedIncident | ExtractedIncident[];

const entityListSchema: SchemaObject = {
  anyOf: [{ type: 'array', items: { type: 'object' } }, { type: 'null' }],
};

const incidentSchema: SchemaObject = {
  type: 'object',
  properties: {
    plaintiffs: entityListSchema,
    defendants: entityListSchema,
    harms: entityListSchema,
  },
};

const isExtractionDocument = validator.compileSchema<ExtractionDocument>({
  anyOf: [incidentSchema, { type: 'array', items: incidentSchema }],
});

export type IdGenerator = () => string;

export interface DirectoryParseResult {
  tables: ExtractionTables;
  failures: ParseFailure[];
}

/**
 * Text of an extracted field; anything without a scalar reading becomes ""
 */
export function fieldText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.map(fieldText).join(';');
  }
  return '';
}

/**
 * Remove a leading ``` / ```json fence and a trailing ``` fence
 */
export function stripCodeFence(raw: string): string {
  return raw
    .trim()
    .replace(/^```(?:json)?\s*/, '')
    .replace(/\s*```$/, '');
}

function incidentFields(source: ExtractedObject): Record<IncidentField, string> {
  return {
    incident_id: fieldText(source.incident_id),
    location_street: fieldText(source.location_street),
    location_city: fieldText(source.location_city),
    location_county: fieldText(source.location_county),
    location_state: fieldText(source.location_state),
    location_zip: fieldText(source.location_zip),
    location_type: fieldText(source.location_type),
  };
}

function plaintiffFields(source: ExtractedObject): Record<PlaintiffField, string> {
  return {
    plaintiff_id: fieldText(source.plaintiff_id),
    name: fieldText(source.name),
    race: fieldText(source.race),
    gender: fieldText(source.gender),
    disability_status: fieldText(source.disability_status),
    immigration_status: fieldText(source.immigration_status),
  };
}

function defendantFields(source: ExtractedObject): Record<DefendantField, string> {
  return {
    defendant_id: fieldText(source.defendant_id),
    name: fieldText(source.name),
    race: fieldText(source.race),
    gender: fieldText(source.gender),
    doe_status: fieldText(source.doe_status),
    entity_type: fieldText(source.entity_type),
    agency: fieldText(source.agency),
    agency_type: fieldText(source.agency_type),
    role_in_incident: fieldText(source.role_in_incident),
  };
}

/**
 * Extraction Parser
 *
 * Turns raw model output documents into incident, plaintiff, defendant and
 * harm rows. Every row gets a fresh synthetic id; children carry the id of
 * the incident they were nested in.
 */
export class ExtractionParser {
  private generateId: IdGenerator;
  private logger: ComponentLogger;

  constructor(generateId: IdGenerator = () => uuidv4()) {
    this.generateId = generateId;
    this.logger = new ComponentLogger('ExtractionParser');
  }

  /**
   * Parse a document into its incident objects
   *
   * @throws MalformedExtractionError when the text is not JSON or not incident-shaped
   */
  parseDocument(raw: string, file?: string): ExtractedIncident[] {
    let data: unknown;
    try {
      data = JSON.parse(stripCodeFence(raw));
    } catch (error) {
      throw new MalformedExtractionError(`Invalid JSON: ${describeError(error)}`, file, { cause: error });
    }

    const result = validator.validate(isExtractionDocument, data);
    if (!result.valid) {
      throw new MalformedExtractionError(
        `Unexpected document shape: ${validator.formatErrors(result.errors)}`,
        file
      );
    }

    return Array.isArray(result.data) ? result.data : [result.data];
  }

  /**
   * Rows of all four tables for one output document
   */
  toTables(raw: string, sourceFile: string): ExtractionTables {
    const fileId = OutputStore.parseRecordKey(sourceFile) ?? '';
    const source = { source_file: sourceFile, file_id: fileId };
    const tables: ExtractionTables = { incidents: [], plaintiffs: [], defendants: [], harms: [] };

    for (const incident of this.parseDocument(raw, sourceFile)) {
      const incidentUuid = this.generateId();

      const incidentRow: IncidentRow = {
        ...source,
        incident_uuid: incidentUuid,
        ...incidentFields(incident),
      };
      tables.incidents.push(incidentRow);

      for (const plaintiff of incident.plaintiffs ?? []) {
        const row: PlaintiffRow = {
          ...source,
          plaintiff_uuid: this.generateId(),
          incident_uuid: incidentUuid,
          ...plaintiffFields(plaintiff),
        };
        tables.plaintiffs.push(row);
      }

      for (const defendant of incident.defendants ?? []) {
        const row: DefendantRow = {
          ...source,
          defendant_uuid: this.generateId(),
          incident_uuid: incidentUuid,
          ...defendantFields(defendant),
        };
        tables.defendants.push(row);
      }

      for (const harm of incident.harms ?? []) {
        const associatedPlaintiffIds = fieldText(harm.associated_plaintiff_ids);
        const associatedDefendantIds = fieldText(harm.associated_defendant_ids);

        for (const token of fieldText(harm.type).split(';')) {
          const harmType = token.trim();
          if (!harmType) {
            continue;
          }

          const row: HarmRow = {
            ...source,
            harm_uuid: this.generateId(),
            incident_uuid: incidentUuid,
            harm_type: harmType,
            associated_plaintiff_ids: associatedPlaintiffIds,
            associated_defendant_ids: associatedDefendantIds,
          };
          tables.harms.push(row);
        }
      }
    }

    return tables;
  }

  /**
   * Parse every output document in a provider directory
   *
   * Documents that fail are listed in `failures`; the rest are concatenated
   * in file-name order.
   */
  async parseDirectory(directory: string): Promise<DirectoryParseResult> {
    const files = await new OutputStore(directory).listOutputFiles();
    const tables: ExtractionTables = { incidents: [], plaintiffs: [], defendants: [], harms: [] };
    const failures: ParseFailure[] = [];

    for (const file of files) {
      try {
        const raw = await fs.readFile(path.join(directory, file), 'utf-8');
        const parsed = this.toTables(raw, file);
        tables.incidents.push(...parsed.incidents);
        tables.plaintiffs.push(...parsed.plaintiffs);
        tables.defendants.push(...parsed.defendants);
        tables.harms.push(...parsed.harms);
      } catch (error) {
        this.logger.warn(`Could not parse ${file}`, { error: describeError(error) });
        failures.push({ file, error: describeError(error) });
      }
    }

    this.logger.info(`${failures.length} failed, ${tables.incidents.length} incidents loaded`, {
      directory,
      files: files.length,
    });

    return { tables, failures };
  }
}
