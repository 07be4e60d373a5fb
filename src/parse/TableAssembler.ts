import type { IdentityEntry } from '../utils/recordLoader.js';
import { ComponentLogger } from '../utils/logger.js';
import type {
  AssembledTables,
  DefendantRow,
  ExtractionTables,
  HarmDefendantRow,
  HarmPlaintiffRow,
  HarmRow,
  PlaintiffRow,
  WithIdentity,
} from './tables.js';

/**
 * Local ids listed in an association string
 *
 * Tokens are trimmed and empty ones dropped; a list with no ids at all still
 * yields one empty id so the harm keeps a row after the explosion.
 */
export function splitLocalIds(list: string): string[] {
  const ids = list
    .split(';')
    .map((id) => id.trim())
    .filter((id) => id !== '');
  return ids.length > 0 ? ids : [''];
}

// Local ids are only unique inside their incident
function compositeKey(incidentUuid: string, localId: string): string {
  return `${incidentUuid}\u0000${localId}`;
}

function indexBy<Row>(rows: readonly Row[], keyOf: (row: Row) => string): Map<string, Row[]> {
  const index = new Map<string, Row[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      index.set(key, [row]);
    }
  }
  return index;
}

/**
 * Table Assembler
 *
 * Attaches document and case ids from the identity mapping and expands harm
 * associations into one row per (harm, plaintiff) and (harm, defendant).
 */
export class TableAssembler {
  private identity: ReadonlyMap<string, IdentityEntry>;
  private logger: ComponentLogger;

  constructor(identity: ReadonlyMap<string, IdentityEntry>) {
    this.identity = identity;
    this.logger = new ComponentLogger('TableAssembler');
  }

  /**
   * Left join on `file_id`; rows without a mapping get null ids
   */
  attachIdentity<Row extends { file_id: string }>(rows: readonly Row[]): WithIdentity<Row>[] {
    return rows.map((row) => {
      const entry = this.identity.get(row.file_id);
      return {
        ...row,
        document_id: entry?.document_id ?? null,
        case_id: entry?.case_id ?? null,
      };
    });
  }

  joinPlaintiffs(harms: readonly WithIdentity<HarmRow>[], plaintiffs: readonly PlaintiffRow[]): HarmPlaintiffRow[] {
    const index = indexBy(plaintiffs, (row) => compositeKey(row.incident_uuid, row.plaintiff_id));
    const joined: HarmPlaintiffRow[] = [];
    let unmatched = 0;

    for (const harm of harms) {
      for (const plaintiffId of splitLocalIds(harm.associated_plaintiff_ids)) {
        const matches = index.get(compositeKey(harm.incident_uuid, plaintiffId));

        if (!matches) {
          if (plaintiffId !== '') {
            unmatched++;
          }
          joined.push({
            ...harm,
            plaintiff_id: plaintiffId,
            plaintiff_uuid: null,
            plaintiff_name: null,
            plaintiff_race: null,
            plaintiff_gender: null,
            plaintiff_disability_status: null,
            plaintiff_immigration_status: null,
          });
          continue;
        }

        for (const plaintiff of matches) {
          joined.push({
            ...harm,
            plaintiff_id: plaintiffId,
            plaintiff_uuid: plaintiff.plaintiff_uuid,
            plaintiff_name: plaintiff.name,
            plaintiff_race: plaintiff.race,
            plaintiff_gender: plaintiff.gender,
            plaintiff_disability_status: plaintiff.disability_status,
            plaintiff_immigration_status: plaintiff.immigration_status,
          });
        }
      }
    }

    if (unmatched > 0) {
      this.logger.warn(`${unmatched} harm associations reference a plaintiff id not found in their incident`);
    }

    return joined;
  }

  joinDefendants(harms: readonly WithIdentity<HarmRow>[], defendants: readonly DefendantRow[]): HarmDefendantRow[] {
    const index = indexBy(defendants, (row) => compositeKey(row.incident_uuid, row.defendant_id));
    const joined: HarmDefendantRow[] = [];
    let unmatched = 0;

    for (const harm of harms) {
      for (const defendantId of splitLocalIds(harm.associated_defendant_ids)) {
        const matches = index.get(compositeKey(harm.incident_uuid, defendantId));

        if (!matches) {
          if (defendantId !== '') {
            unmatched++;
          }
          joined.push({
            ...harm,
            defendant_id: defendantId,
            defendant_uuid: null,
            defendant_name: null,
            defendant_race: null,
            defendant_gender: null,
            doe_status: null,
            entity_type: null,
            agency: null,
            agency_type: null,
            role_in_incident: null,
          });
          continue;
        }

        for (const defendant of matches) {
          joined.push({
            ...harm,
            defendant_id: defendantId,
            defendant_uuid: defendant.defendant_uuid,
            defendant_name: defendant.name,
            defendant_race: defendant.race,
            defendant_gender: defendant.gender,
            doe_status: defendant.doe_status,
            entity_type: defendant.entity_type,
            agency: defendant.agency,
            agency_type: defendant.agency_type,
            role_in_incident: defendant.role_in_incident,
          });
        }
      }
    }

    if (unmatched > 0) {
      this.logger.warn(`${unmatched} harm associations reference a defendant id not found in their incident`);
    }

    return joined;
  }

  assemble(tables: ExtractionTables): AssembledTables {
    const harms = this.attachIdentity(tables.harms);

    const assembled: AssembledTables = {
      incidents: this.attachIdentity(tables.incidents),
      plaintiffs: this.attachIdentity(tables.plaintiffs),
      defendants: this.attachIdentity(tables.defendants),
      harms,
      harmsPlaintiffs: this.joinPlaintiffs(harms, tables.plaintiffs),
      harmsDefendants: this.joinDefendants(harms, tables.defendants),
    };

    const unmapped = assembled.incidents.filter((row) => row.document_id === null).length;
    if (unmapped > 0) {
      this.logger.warn(`${unmapped} incidents have no identity mapping for their file id`);
    }

    return assembled;
  }
}
