import { parseCandidate, ProxyCandidate } from '../../candidates';

const EMBEDDED_ADDRESS_PATTERN =
  /(?:https?:\/\/)?\b(?:\d{1,3}\.){3}\d{1,3}:\d{1,5}\b/gi;

/**
 * Takes whole-line candidates as they are and scans any other line for
 * `a.b.c.d:port` occurrences.
 */
export function extractFromText(content: string): ProxyCandidate[] {
  const candidates: ProxyCandidate[] = [];

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }

    const whole = parseCandidate(trimmed);
    if (whole) {
      candidates.push(whole);
      continue;
    }

    for (const match of trimmed.matchAll(EMBEDDED_ADDRESS_PATTERN)) {
      const candidate = parseCandidate(match[0]);
      if (candidate) {
        candidates.push(candidate);
      }
    }
  }

  return candidates;
}
