import { extractFromText } from './text.extractor';
import { parseCandidate, ProxyCandidate } from '../../candidates';

function readAddressPart(entry: object, key: string): string | undefined {
  const value: unknown = Reflect.get(entry, key);
  if (typeof value === 'string' || typeof value === 'number') {
    return String(value).trim();
  }
  return undefined;
}

/** String entries are read like a line of a text list. */
function entryToCandidates(entry: unknown): ProxyCandidate[] {
  if (typeof entry === 'string') {
    return extractFromText(entry);
  }
  if (typeof entry !== 'object' || entry === null) {
    return [];
  }

  const host = readAddressPart(entry, 'ip') ?? readAddressPart(entry, 'host');
  const port = readAddressPart(entry, 'port');
  if (host === undefined || port === undefined) {
    return [];
  }

  const candidate = parseCandidate(`${host}:${port}`);
  return candidate ? [candidate] : [];
}

/**
 * Accepts `[{ "ip": "...", "port": "..." }]` or `["host:port"]`. Bodies that
 * are not a JSON array are treated as plain text.
 */
export function extractFromJson(content: string): ProxyCandidate[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return extractFromText(content);
  }

  if (!Array.isArray(parsed)) {
    return extractFromText(content);
  }

  const candidates: ProxyCandidate[] = [];
  for (const entry of parsed) {
    for (const candidate of entryToCandidates(entry)) {
      candidates.push(candidate);
    }
  }

  return candidates;
}
