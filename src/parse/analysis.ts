import type { HarmRow, IncidentRow } from './tables.js';

export const GRANULARITY_LEVELS = ['street', 'zip', 'city', 'county', 'state', 'none'] as const;

export type LocationGranularity = (typeof GRANULARITY_LEVELS)[number];

export interface IncidentLocation {
  incident_uuid: string;
  source_file: string;
  location_street: string;
  location_city: string;
  location_county: string;
  location_state: string;
  location_zip: string;
  location_type: string;
  full_address: string;
  location_granularity: LocationGranularity;
}

export interface HarmTypeCount {
  harm_type: string;
  n: number;
  percent: number;
}

export interface HarmCooccurrence {
  harm1: string;
  harm2: string;
  n: number;
}

export const INCIDENT_LOCATION_COLUMNS = [
  'incident_uuid',
  'source_file',
  'location_street',
  'location_city',
  'location_county',
  'location_state',
  'location_zip',
  'location_type',
  'full_address',
  'location_granularity',
] as const;

export const HARM_TYPE_COUNT_COLUMNS = ['harm_type', 'n', 'percent'] as const;

export const HARM_COOCCURRENCE_COLUMNS = ['harm1', 'harm2', 'n'] as const;

const DEFAULT_TOP_HARMS = 20;

function present(value: string): boolean {
  return value.trim() !== '';
}

function withZip(base: string, zip: string): string {
  return present(zip) ? `${base} ${zip}` : base;
}

/**
 * Most precise address that can be assembled from the location fields ("" when none)
 */
export function fullAddress(incident: Pick<IncidentRow, 'location_street' | 'location_city' | 'location_county' | 'location_state' | 'location_zip'>): string {
  const { location_street: street, location_city: city, location_county: county, location_state: state, location_zip: zip } = incident;

  if (present(street) && present(city) && present(state)) {
    return withZip(`${street}, ${city}, ${state}`, zip);
  }
  if (present(street) && present(state)) {
    return withZip(`${street}, ${state}`, zip);
  }
  if (present(city) && present(state)) {
    return withZip(`${city}, ${state}`, zip);
  }
  if (present(county) && present(state)) {
    return `${county}, ${state}`;
  }
  if (present(zip)) {
    return zip;
  }
  if (present(state)) {
    return state;
  }
  return '';
}

export function locationGranularity(
  incident: Pick<IncidentRow, 'location_street' | 'location_city' | 'location_county' | 'location_state' | 'location_zip'>
): LocationGranularity {
  if (present(incident.location_street)) return 'street';
  if (present(incident.location_zip)) return 'zip';
  if (present(incident.location_city)) return 'city';
  if (present(incident.location_county)) return 'county';
  if (present(incident.location_state)) return 'state';
  return 'none';
}

export function incidentLocations(incidents: readonly IncidentRow[]): IncidentLocation[] {
  return incidents.map((incident) => ({
    incident_uuid: incident.incident_uuid,
    source_file: incident.source_file,
    location_street: incident.location_street,
    location_city: incident.location_city,
    location_county: incident.location_county,
    location_state: incident.location_state,
    location_zip: incident.location_zip,
    location_type: incident.location_type,
    full_address: fullAddress(incident),
    location_granularity: locationGranularity(incident),
  }));
}

/**
 * Harm rows per type, most frequent first (ties by name)
 */
export function harmTypeCounts(harms: readonly Pick<HarmRow, 'harm_type'>[]): HarmTypeCount[] {
  const counts = new Map<string, number>();
  for (const harm of harms) {
    counts.set(harm.harm_type, (counts.get(harm.harm_type) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([harm_type, n]) => ({ harm_type, n, percent: n / harms.length }))
    .sort((a, b) => b.n - a.n || (a.harm_type < b.harm_type ? -1 : a.harm_type > b.harm_type ? 1 : 0));
}

/**
 * Number of incidents in which each pair of the most frequent harm types both occur
 *
 * Types tied with the last place are kept. Each unordered pair appears once,
 * with `harm1` sorting before `harm2`.
 */
export function harmCooccurrence(
  harms: readonly Pick<HarmRow, 'harm_type' | 'incident_uuid'>[],
  top: number = DEFAULT_TOP_HARMS
): HarmCooccurrence[] {
  const ranked = harmTypeCounts(harms);
  const cutoff = ranked[Math.min(top, ranked.length) - 1]?.n ?? 0;
  const topTypes = ranked
    .filter((entry) => entry.n >= cutoff)
    .map((entry) => entry.harm_type)
    .sort();

  const typesByIncident = new Map<string, Set<string>>();
  for (const harm of harms) {
    const types = typesByIncident.get(harm.incident_uuid) ?? new Set<string>();
    types.add(harm.harm_type);
    typesByIncident.set(harm.incident_uuid, types);
  }

  const pairs: HarmCooccurrence[] = [];
  topTypes.forEach((harm1, i) => {
    for (const harm2 of topTypes.slice(i + 1)) {
      let n = 0;
      for (const types of typesByIncident.values()) {
        if (types.has(harm1) && types.has(harm2)) {
          n++;
        }
      }
      pairs.push({ harm1, harm2, n });
    }
  });

  return pairs.sort((a, b) => b.n - a.n);
}
