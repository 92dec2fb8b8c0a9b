/**
 * TCX trackpoint extraction
 *
 * Queries `//tcx:Trackpoint` and reads each trackpoint with TCX_FIELD_MAPPINGS.
 */

import type { TelemetryRow } from '../../schemas/index.js';
import type { FormatExtractor } from '../../normalizers/index.js';
import {
  TCX_FIELD_MAPPINGS,
  TCX_TIME_QUERY,
  TCX_V2_NAMESPACE,
  assignMetric,
  normalizeToUTC,
  parseFloatSafe,
  parseIntSafe,
  sortByTimestamp,
} from '../../normalizers/index.js';
import type { NamespaceMap, QueryOptions, XmlElement } from './document.js';
import { parseXmlDocument, selectFirstText, selectNodes } from './document.js';

const TRACKPOINT_QUERY = '//tcx:Trackpoint';

/**
 * Build the query namespace map from the root element's declarations
 *
 * - Prefixed declarations keep their prefix
 * - The default namespace is registered as `tcx`
 * - Without either, `tcx` is the TCX v2 namespace
 */
export function buildNamespaceMap(root: XmlElement): NamespaceMap {
  const namespaces: NamespaceMap = {};

  for (const [prefix, uri] of Object.entries(root.declarations)) {
    if (uri && prefix !== '') {
      namespaces[prefix] = uri;
    }
  }

  // The default namespace takes the alias even over an explicit `tcx` prefix
  const defaultUri = root.declarations[''];
  if (defaultUri) {
    namespaces.tcx = defaultUri;
  }

  if (!namespaces.tcx) {
    namespaces.tcx = TCX_V2_NAMESPACE;
  }

  return namespaces;
}

/**
 * Normalize a Trackpoint element to a TelemetryRow
 *
 * @returns null when the trackpoint has no parseable Time
 */
export function normalizeTrackpoint(
  trackpoint: XmlElement,
  namespaces: NamespaceMap,
  options: QueryOptions = {}
): TelemetryRow | null {
  const timestamp = normalizeToUTC(selectFirstText(trackpoint, TCX_TIME_QUERY, namespaces, options));
  if (!timestamp) {
    return null;
  }

  const row: TelemetryRow = { timestamp };
  for (const entry of TCX_FIELD_MAPPINGS) {
    const text = selectFirstText(trackpoint, entry.source, namespaces, options);
    assignMetric(row, entry, entry.kind === 'int' ? parseIntSafe(text) : parseFloatSafe(text));
  }
  return row;
}

/**
 * Extract rows from a parsed TCX document
 *
 * Elements in no namespace count as `tcx` elements, so exports that omit
 * the namespace declaration still yield their trackpoints.
 */
export function extractTcxRows(root: XmlElement): TelemetryRow[] {
  const namespaces = buildNamespaceMap(root);
  const options: QueryOptions = { unqualifiedNamespace: namespaces.tcx };
  const rows: TelemetryRow[] = [];

  for (const trackpoint of selectNodes(root, TRACKPOINT_QUERY, namespaces, options)) {
    const row = normalizeTrackpoint(trackpoint, namespaces, options);
    if (row) {
      rows.push(row);
    }
  }

  return sortByTimestamp(rows);
}

const textDecoder = new TextDecoder('utf-8');

/**
 * Parse TCX bytes and extract rows
 * @throws XmlDocumentError when the payload is not well-formed XML
 */
export function parseTcxBytes(bytes: Uint8Array): TelemetryRow[] {
  return extractTcxRows(parseXmlDocument(textDecoder.decode(bytes)));
}

export const tcxExtractor: FormatExtractor = {
  format: 'tcx',
  extract: parseTcxBytes,
};
