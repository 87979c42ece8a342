/**
 * Incident Message Parser
 *
 * Messages from the incidents account always have four lines:
 *
 *   INC-42
 *   100 Main St   Downtown
 *   Structure Fire
 *   E1 E1 STN3 STN1
 *
 * i.e. incident id, location (optionally followed by the community after a wide gap),
 * incident type, and the units dispatched. Station units are prefixed with STN.
 */

import { decode } from 'html-entities';
import { ParseError } from '../errors';
import type { Incident } from '../types';

export type ParseResult =
  | { ok: true; incident: Incident }
  | { ok: false; error: ParseError };

const EXPECTED_LINES = 4;
const STATION_PREFIX = 'STN';
// ASCII whitespace only; decoded &nbsp; runs stay part of the location
const WIDE_GAP = /[\t\n\f\r ]{3,}/g;
const COMMUNITY_SEPARATOR = '  ';

/**
 * Split the location line into street and community.
 * Best effort only: a location that itself contains a wide gap ends up
 * unsplit, with an empty community.
 */
function splitLocation(line: string): { location: string; community: string } {
  const collapsed = line.replace(WIDE_GAP, COMMUNITY_SEPARATOR);
  const parts = collapsed.split(COMMUNITY_SEPARATOR);

  if (parts.length === 2) {
    return { location: parts[0].trim(), community: parts[1].trim() };
  }
  return { location: collapsed, community: '' };
}

function classifyUnits(line: string): { apparatuses: string[]; stations: string[] } {
  const apparatuses = new Set<string>();
  const stations = new Set<string>();

  for (const token of line.split(/\s+/)) {
    if (!token) continue;
    if (token.startsWith(STATION_PREFIX)) {
      stations.add(token);
    } else {
      apparatuses.add(token);
    }
  }

  return {
    apparatuses: [...apparatuses].sort(),
    stations: [...stations].sort(),
  };
}

export function parseIncident(text: string): ParseResult {
  const lines = decode(text).split('\n');
  if (lines.length !== EXPECTED_LINES) {
    return { ok: false, error: new ParseError(lines.length) };
  }

  const [id, locationLine, type, unitsLine] = lines;

  return {
    ok: true,
    incident: {
      id,
      ...splitLocation(locationLine),
      type,
      ...classifyUnits(unitsLine),
    },
  };
}
