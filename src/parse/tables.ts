/**
 * Row shapes and column orders of the emitted tables
 */

export const INCIDENT_FIELDS = [
  'incident_id',
  'location_street',
  'location_city',
  'location_county',
  'location_state',
  'location_zip',
  'location_type',
] as const;

export const PLAINTIFF_FIELDS = [
  'plaintiff_id',
  'name',
  'race',
  'gender',
  'disability_status',
  'immigration_status',
] as const;

export const DEFENDANT_FIELDS = [
  'defendant_id',
  'name',
  'race',
  'gender',
  'doe_status',
  'entity_type',
  'agency',
  'agency_type',
  'role_in_incident',
] as const;

export type IncidentField = (typeof INCIDENT_FIELDS)[number];
export type PlaintiffField = (typeof PLAINTIFF_FIELDS)[number];
export type DefendantField = (typeof DEFENDANT_FIELDS)[number];

interface SourceColumns {
  source_file: string;
  file_id: string;
}

export type IncidentRow = SourceColumns & { incident_uuid: string } & Record<IncidentField, string>;

export type PlaintiffRow = SourceColumns & {
  plaintiff_uuid: string;
  incident_uuid: string;
} & Record<PlaintiffField, string>;

export type DefendantRow = SourceColumns & {
  defendant_uuid: string;
  incident_uuid: string;
} & Record<DefendantField, string>;

export type HarmRow = SourceColumns & {
  harm_uuid: string;
  incident_uuid: string;
  harm_type: string;
  associated_plaintiff_ids: string;
  associated_defendant_ids: string;
};

export interface ExtractionTables {
  incidents: IncidentRow[];
  plaintiffs: PlaintiffRow[];
  defendants: DefendantRow[];
  harms: HarmRow[];
}

export interface ParseFailure {
  file: string;
  error: string;
}

/** Identity columns attached by the assembler; null when the file id has no mapping */
export interface IdentityColumns {
  document_id: string | null;
  case_id: string | null;
}

export type WithIdentity<Row> = Row & IdentityColumns;

export type HarmPlaintiffRow = WithIdentity<HarmRow> & {
  plaintiff_id: string;
  plaintiff_uuid: string | null;
  plaintiff_name: string | null;
  plaintiff_race: string | null;
  plaintiff_gender: string | null;
  plaintiff_disability_status: string | null;
  plaintiff_immigration_status: string | null;
};

export type HarmDefendantRow = WithIdentity<HarmRow> & {
  defendant_id: string;
  defendant_uuid: string | null;
  defendant_name: string | null;
  defendant_race: string | null;
  defendant_gender: string | null;
  doe_status: string | null;
  entity_type: string | null;
  agency: string | null;
  agency_type: string | null;
  role_in_incident: string | null;
};

export interface AssembledTables {
  incidents: WithIdentity<IncidentRow>[];
  plaintiffs: WithIdentity<PlaintiffRow>[];
  defendants: WithIdentity<DefendantRow>[];
  harms: WithIdentity<HarmRow>[];
  harmsPlaintiffs: HarmPlaintiffRow[];
  harmsDefendants: HarmDefendantRow[];
}

const SOURCE = ['source_file'] as const;
const IDENTITY = ['document_id', 'case_id'] as const;
const HARM_BASE = [
  'harm_uuid',
  'incident_uuid',
  'file_id',
  'harm_type',
  'associated_plaintiff_ids',
  'associated_defendant_ids',
] as const;

export const INCIDENT_COLUMNS = [...SOURCE, 'incident_uuid', 'file_id', ...INCIDENT_FIELDS, ...IDENTITY] as const;

export const PLAINTIFF_COLUMNS = [
  ...SOURCE,
  'plaintiff_uuid',
  'incident_uuid',
  'file_id',
  ...PLAINTIFF_FIELDS,
  ...IDENTITY,
] as const;

export const DEFENDANT_COLUMNS = [
  ...SOURCE,
  'defendant_uuid',
  'incident_uuid',
  'file_id',
  ...DEFENDANT_FIELDS,
  ...IDENTITY,
] as const;

export const HARM_COLUMNS = [...SOURCE, ...HARM_BASE, ...IDENTITY] as const;

export const HARM_PLAINTIFF_COLUMNS = [
  ...SOURCE,
  ...HARM_BASE,
  ...IDENTITY,
  'plaintiff_id',
  'plaintiff_uuid',
  'plaintiff_name',
  'plaintiff_race',
  'plaintiff_gender',
  'plaintiff_disability_status',
  'plaintiff_immigration_status',
] as const;

export const HARM_DEFENDANT_COLUMNS = [
  ...SOURCE,
  ...HARM_BASE,
  ...IDENTITY,
  'defendant_id',
  'defendant_uuid',
  'defendant_name',
  'defendant_race',
  'defendant_gender',
  'doe_status',
  'entity_type',
  'agency',
  'agency_type',
  'role_in_incident',
] as const;

export const PARSE_FAILURE_COLUMNS = ['file', 'error'] as const;
